/**
 * Session Store
 *
 * In-memory, process-lifetime state for each conversation:
 * - conversation history (bounded, oldest evicted first)
 * - the authorization handshake token (one per session, single use)
 * - the resolved platform username
 * - pull requests from the last listing (TTL-bound)
 * - at most one pending intent awaiting more slots (TTL-bound)
 *
 * Sessions are created lazily on first write. Expired entries are removed
 * on the next read; nothing sweeps them in the background.
 *
 * Every accessor returns copies. Multi-step read-modify-write sequences go
 * through `withSession`, which serializes them per session.
 */

import { randomBytes } from "crypto";
import type { ConversationMessage } from "@shared/schema";
import { SESSION_CONSTANTS } from "../config/constants";
import type { ActionIntent, IntentArgs, TaskRef } from "../intent/types";
import { SessionLock } from "./sessionLock";

export type PendingIntent = {
  type: ActionIntent;
  args: IntentArgs;
  lastUpdated: number;
};

type TaskRefCache = {
  refs: TaskRef[];
  lastUpdated: number;
};

type SessionRecord = {
  history: ConversationMessage[];
  authHandshakeToken?: string;
  resolvedIdentity?: string;
  taskRefs?: TaskRefCache;
  pendingIntent?: PendingIntent;
};

export type SessionStoreOptions = {
  historyLimit?: number;
  taskRefTtlMs?: number;
  pendingIntentTtlMs?: number;
  /** Clock used for TTL bookkeeping. */
  now?: () => number;
};

export class SessionStore {
  private sessions = new Map<string, SessionRecord>();
  private sessionByHandshake = new Map<string, string>();
  private lock = new SessionLock();
  private readonly historyLimit: number;
  private readonly taskRefTtlMs: number;
  private readonly pendingIntentTtlMs: number;
  private readonly now: () => number;

  constructor(options: SessionStoreOptions = {}) {
    this.historyLimit = options.historyLimit ?? SESSION_CONSTANTS.HISTORY_LIMIT;
    this.taskRefTtlMs = options.taskRefTtlMs ?? SESSION_CONSTANTS.TASK_REF_TTL_MS;
    this.pendingIntentTtlMs = options.pendingIntentTtlMs ?? SESSION_CONSTANTS.PENDING_INTENT_TTL_MS;
    this.now = options.now ?? (() => Date.now());
  }

  private getOrCreate(sessionId: string): SessionRecord {
    let record = this.sessions.get(sessionId);
    if (!record) {
      record = { history: [] };
      this.sessions.set(sessionId, record);
    }
    return record;
  }

  private isExpired(lastUpdated: number, ttlMs: number): boolean {
    return this.now() - lastUpdated > ttlMs;
  }

  /**
   * Run an async read-modify-write sequence with exclusive access to one session.
   * Turns for other sessions are not blocked.
   */
  withSession<T>(sessionId: string, fn: () => Promise<T>): Promise<T> {
    return this.lock.run(sessionId, fn);
  }

  hasSession(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  // Conversation history

  appendMessage(sessionId: string, message: ConversationMessage): void {
    const record = this.getOrCreate(sessionId);
    record.history.push({ role: message.role, content: message.content });
    if (this.historyLimit > 0 && record.history.length > this.historyLimit) {
      record.history.splice(0, record.history.length - this.historyLimit);
    }
  }

  getHistory(sessionId: string): ConversationMessage[] {
    const history = this.sessions.get(sessionId)?.history ?? [];
    return history.map((m) => ({ role: m.role, content: m.content }));
  }

  // Pending intent

  setPendingIntent(sessionId: string, type: ActionIntent, args: IntentArgs): void {
    const record = this.getOrCreate(sessionId);
    record.pendingIntent = { type, args: { ...args }, lastUpdated: this.now() };
  }

  getPendingIntent(sessionId: string): PendingIntent | undefined {
    const record = this.sessions.get(sessionId);
    const pending = record?.pendingIntent;
    if (!record || !pending) return undefined;

    if (this.isExpired(pending.lastUpdated, this.pendingIntentTtlMs)) {
      delete record.pendingIntent;
      return undefined;
    }
    return { type: pending.type, args: { ...pending.args }, lastUpdated: pending.lastUpdated };
  }

  clearPendingIntent(sessionId: string): void {
    const record = this.sessions.get(sessionId);
    if (record) {
      delete record.pendingIntent;
    }
  }

  // Pull requests from the last listing

  setTaskRefs(sessionId: string, refs: TaskRef[]): void {
    const record = this.getOrCreate(sessionId);
    record.taskRefs = {
      refs: refs.map((r) => ({ prNumber: r.prNumber, repo: r.repo })),
      lastUpdated: this.now(),
    };
  }

  getTaskRefs(sessionId: string): TaskRef[] | undefined {
    const record = this.sessions.get(sessionId);
    const cache = record?.taskRefs;
    if (!record || !cache) return undefined;

    if (this.isExpired(cache.lastUpdated, this.taskRefTtlMs)) {
      delete record.taskRefs;
      return undefined;
    }
    return cache.refs.map((r) => ({ prNumber: r.prNumber, repo: r.repo }));
  }

  // Authorization handshake

  /**
   * Start an authorization handshake. Any earlier token for the session is
   * invalidated so only the newest one can complete.
   */
  beginAuthHandshake(sessionId: string): string {
    this.clearAuthHandshake(sessionId);
    const token = randomBytes(24).toString("base64url");
    this.getOrCreate(sessionId).authHandshakeToken = token;
    this.sessionByHandshake.set(token, sessionId);
    return token;
  }

  getAuthHandshake(sessionId: string): string | undefined {
    return this.sessions.get(sessionId)?.authHandshakeToken;
  }

  /**
   * Look up which session started a handshake. Does not clear the link;
   * callers validate first and then call `clearAuthHandshake`.
   */
  resolveAuthHandshake(token: string): string | undefined {
    return this.sessionByHandshake.get(token);
  }

  clearAuthHandshake(sessionId: string): void {
    const record = this.sessions.get(sessionId);
    const token = record?.authHandshakeToken;
    if (record && token !== undefined) {
      this.sessionByHandshake.delete(token);
      delete record.authHandshakeToken;
    }
  }

  // Resolved identity

  setResolvedIdentity(sessionId: string, username: string): void {
    this.getOrCreate(sessionId).resolvedIdentity = username;
  }

  getResolvedIdentity(sessionId: string): string | undefined {
    return this.sessions.get(sessionId)?.resolvedIdentity;
  }

  clearResolvedIdentity(sessionId: string): void {
    const record = this.sessions.get(sessionId);
    if (record) {
      delete record.resolvedIdentity;
    }
  }
}
