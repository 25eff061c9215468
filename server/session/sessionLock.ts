// SessionLock: per-session mutex so read-modify-write turns on one session never interleave

export class SessionLock {
  private locks = new Map<string, Promise<void>>();

  /**
   * Acquire the lock for a session. Returns a release function.
   * If the lock is already held, waits for it to be released first.
   */
  async acquire(sessionId: string): Promise<() => void> {
    let held = this.locks.get(sessionId);
    while (held) {
      await held;
      held = this.locks.get(sessionId);
    }

    let release: () => void = () => {};
    const promise = new Promise<void>((resolve) => {
      release = () => {
        if (this.locks.get(sessionId) === promise) {
          this.locks.delete(sessionId);
        }
        resolve();
      };
    });

    this.locks.set(sessionId, promise);
    return release;
  }

  /** Run `fn` while holding the session's lock. */
  async run<T>(sessionId: string, fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire(sessionId);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(sessionId: string): boolean {
    return this.locks.has(sessionId);
  }

  /** Session IDs with a turn currently in flight. */
  get activeSessionIds(): string[] {
    return [...this.locks.keys()];
  }
}
