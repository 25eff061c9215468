/**
 * In-memory GitHub access tokens keyed by session id.
 *
 * A statically configured token (GITHUB_TOKEN) acts as the fallback for every
 * session, which is how the service runs without the OAuth handshake.
 */
export class CredentialStore {
  private tokens = new Map<string, string>();

  constructor(private readonly staticToken?: string) {}

  set(sessionId: string, token: string): void {
    this.tokens.set(sessionId, token);
  }

  get(sessionId: string): string | undefined {
    return this.tokens.get(sessionId) ?? this.staticToken;
  }

  hasStaticToken(): boolean {
    return Boolean(this.staticToken);
  }
}
