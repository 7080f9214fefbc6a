/**
 * Access token for a single upload. Lives in memory only and is wiped by
 * `revoke()` when the workflow ends.
 */
export class OAuthSession {
  private token: string | null;

  constructor(
    readonly clientId: string,
    accessToken: string,
    readonly scopes: readonly string[],
    readonly expiresAt: Date
  ) {
    this.token = accessToken;
  }

  get accessToken(): string {
    if (this.token === null) {
      throw new Error("OAuth session has been revoked");
    }
    return this.token;
  }

  get revoked(): boolean {
    return this.token === null;
  }

  hasScope(scope: string): boolean {
    return this.scopes.includes(scope);
  }

  revoke(): void {
    this.token = null;
  }
}
