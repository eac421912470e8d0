/** Bearer token plus its expiry. */
export interface AccessToken {
  token: string;
  /** Expiry as epoch milliseconds. */
  expiresOnTimestamp: number;
}

/** Options passed to {@link TokenCredential.getToken}. */
export interface GetTokenOptions {
  /** Aborts token acquisition together with the call that needs it. */
  signal?: AbortSignal;
}

/**
 * Token source injected at client construction and used only by the pipeline's
 * bearer-token policy. Returning `null` means no token is available.
 */
export interface TokenCredential {
  getToken(scopes: string[], options?: GetTokenOptions): Promise<AccessToken | null>;
}

/**
 * Credential that always returns the same token, for local development, tests, and
 * tokens obtained out of band.
 */
export class StaticTokenCredential implements TokenCredential {
  readonly #token: AccessToken;

  constructor(token: string, expiresOnTimestamp: number = Number.MAX_SAFE_INTEGER) {
    this.#token = { token, expiresOnTimestamp };
  }

  async getToken(_scopes?: string[], _options?: GetTokenOptions): Promise<AccessToken | null> {
    return { ...this.#token };
  }
}
