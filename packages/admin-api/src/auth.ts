import {
  InteractiveBrowserCredential,
  type AccessToken,
  type TokenCredential,
} from '@azure/identity';
import {
  ADMIN_API_SCOPE,
  TOKEN_EXPIRY_BUFFER_MS,
  AuthenticationError,
  nullLogger,
  type Logger,
} from '@scan-harvest/shared';

/**
 * Supplies the bearer credential of the signed-in principal.
 */
export interface AccessTokenProvider {
  getToken(): Promise<string>;
}

/**
 * Fixed token, e.g. one pasted into ACCESS_TOKEN for a quick run.
 */
export class StaticTokenProvider implements AccessTokenProvider {
  private readonly token: string;

  constructor(token: string) {
    if (!token.trim()) {
      throw new AuthenticationError('Access token is empty');
    }
    this.token = token.trim();
  }

  async getToken(): Promise<string> {
    return this.token;
  }
}

/**
 * Token provider backed by an @azure/identity credential.
 *
 * Tokens are cached until TOKEN_EXPIRY_BUFFER_MS before expiry; concurrent
 * callers share one in-flight acquisition.
 */
export class CredentialTokenProvider implements AccessTokenProvider {
  private readonly credential: TokenCredential;
  private readonly scope: string;
  private readonly logger: Logger;
  private readonly now: () => number;
  private cached: AccessToken | null = null;
  private pending: Promise<string> | null = null;

  constructor(
    credential: TokenCredential,
    options: { scope?: string; logger?: Logger; now?: () => number } = {}
  ) {
    this.credential = credential;
    this.scope = options.scope ?? ADMIN_API_SCOPE;
    this.logger = options.logger ?? nullLogger;
    this.now = options.now ?? Date.now;
  }

  async getToken(): Promise<string> {
    if (this.cached && this.cached.expiresOnTimestamp > this.now() + TOKEN_EXPIRY_BUFFER_MS) {
      return this.cached.token;
    }

    if (this.pending) {
      return this.pending;
    }

    this.pending = this.acquire();
    try {
      return await this.pending;
    } finally {
      this.pending = null;
    }
  }

  private async acquire(): Promise<string> {
    let token: AccessToken | null;
    try {
      token = await this.credential.getToken(this.scope);
    } catch (error) {
      this.cached = null;
      const message = error instanceof Error ? error.message : String(error);
      throw new AuthenticationError(
        `Sign-in failed: ${message}`,
        error instanceof Error ? error : undefined
      );
    }

    if (!token) {
      throw new AuthenticationError('Sign-in returned no access token');
    }

    this.cached = token;
    this.logger.info('Access token acquired', {
      expiresAt: new Date(token.expiresOnTimestamp).toISOString(),
    });
    return token.token;
  }

  clearTokenCache(): void {
    this.cached = null;
  }
}

export interface InteractiveSignInOptions {
  tenantId?: string;
  clientId?: string;
  logger?: Logger;
}

/**
 * Opens a browser sign-in for the operator on first use.
 */
export function createInteractiveTokenProvider(options: InteractiveSignInOptions = {}): CredentialTokenProvider {
  const credential = new InteractiveBrowserCredential({
    tenantId: options.tenantId,
    clientId: options.clientId,
  });
  return new CredentialTokenProvider(credential, { logger: options.logger });
}
