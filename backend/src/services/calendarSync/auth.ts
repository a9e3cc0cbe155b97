import type { Account, AccountTokens } from '@calsync/shared';
import { CredentialRefreshError, CalendarSyncException } from './errors.js';
import type { ProviderTransport } from './http.js';
import { describeError, type Logger } from './logger.js';
import { tokenResponseSchema } from './remoteSchemas.js';
import type { AuthenticatedAccount, Clock, CredentialStore } from './types.js';

export interface RefreshedToken {
  accessToken: string;
  /** Absent when the provider kept the existing refresh token. */
  refreshToken: string | null;
  expiresAt: Date | null;
}

export interface TokenClient {
  refreshAccessToken(refreshToken: string, signal?: AbortSignal): Promise<RefreshedToken>;
}

function assertClientCredentials(): { clientId: string; clientSecret: string } {
  const clientId = process.env.GOOGLE_OAUTH_CLIENT_ID ?? process.env.GOOGLE_CLIENT_ID;
  const clientSecret = process.env.GOOGLE_OAUTH_CLIENT_SECRET ?? process.env.GOOGLE_CLIENT_SECRET;
  if (!clientId || !clientSecret) {
    throw new CalendarSyncException('Missing Google OAuth client credentials', 500, 'missing_credentials');
  }
  return { clientId, clientSecret };
}

export function createTokenClient(options: {
  transport: ProviderTransport;
  tokenEndpoint: string;
  clock: Clock;
}): TokenClient {
  const { transport, tokenEndpoint, clock } = options;

  return {
    async refreshAccessToken(refreshToken, signal) {
      const { clientId, clientSecret } = assertClientCredentials();
      const params = new URLSearchParams({
        client_id: clientId,
        client_secret: clientSecret,
        grant_type: 'refresh_token',
        refresh_token: refreshToken
      });

      const payload = tokenResponseSchema.parse(await transport.postForm(tokenEndpoint, params, { signal }));

      return {
        accessToken: payload.access_token,
        refreshToken: payload.refresh_token ?? null,
        expiresAt:
          typeof payload.expires_in === 'number'
            ? new Date(clock().getTime() + payload.expires_in * 1000)
            : null
      };
    }
  };
}

export interface CredentialRefresherDeps {
  store: CredentialStore;
  tokenClient: TokenClient;
  logger: Logger;
  clock: Clock;
  refreshSkewMs: number;
}

/**
 * Hands out usable access tokens, refreshing through the refresh-token grant
 * when the stored one is expired, close to expiry, or has no known expiry.
 */
export class CredentialRefresher {
  private readonly store: CredentialStore;
  private readonly tokenClient: TokenClient;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly refreshSkewMs: number;

  constructor(deps: CredentialRefresherDeps) {
    this.store = deps.store;
    this.tokenClient = deps.tokenClient;
    this.logger = deps.logger;
    this.clock = deps.clock;
    this.refreshSkewMs = deps.refreshSkewMs;
  }

  needsRefresh(account: Account): boolean {
    if (!account.accessToken || !account.expiresAt) {
      return true;
    }
    return this.clock().getTime() + this.refreshSkewMs >= account.expiresAt.getTime();
  }

  async ensureAccessToken(account: Account, signal?: AbortSignal): Promise<AuthenticatedAccount> {
    if (!this.needsRefresh(account) && account.accessToken) {
      this.logger.debug('Access token still valid', { userId: account.userId });
      return { account, accessToken: account.accessToken };
    }

    if (!account.expiresAt) {
      this.logger.warn('Access token has no expiry, forcing refresh', { userId: account.userId });
    } else {
      this.logger.info('Access token expired or expiring soon, refreshing', {
        userId: account.userId,
        expiresAt: account.expiresAt.toISOString()
      });
    }

    return this.forceRefresh(account, signal);
  }

  async forceRefresh(account: Account, signal?: AbortSignal): Promise<AuthenticatedAccount> {
    const currentRefreshToken = account.refreshToken;
    if (!currentRefreshToken) {
      throw new CredentialRefreshError(
        `No refresh token available for user ${account.userId}`,
        'missing_refresh_token',
        400,
        { userId: account.userId }
      );
    }

    let refreshed: RefreshedToken;
    try {
      refreshed = await this.tokenClient.refreshAccessToken(currentRefreshToken, signal);
    } catch (error) {
      throw new CredentialRefreshError(
        `Failed to refresh access token for user ${account.userId}: ${describeError(error)}`,
        'refresh_failed',
        error instanceof CalendarSyncException ? error.status : undefined,
        { userId: account.userId }
      );
    }

    if (!refreshed.accessToken) {
      throw new CredentialRefreshError(
        `Received empty access token for user ${account.userId}`,
        'empty_access_token',
        502,
        { userId: account.userId }
      );
    }

    const tokens: AccountTokens = {
      accessToken: refreshed.accessToken,
      refreshToken: refreshed.refreshToken ?? currentRefreshToken,
      expiresAt: refreshed.expiresAt
    };
    const updated = await this.store.updateAccountTokens(account.userId, account.provider, tokens);

    this.logger.info('Refreshed access token', {
      userId: account.userId,
      expiresAt: tokens.expiresAt?.toISOString() ?? null,
      refreshTokenRotated: refreshed.refreshToken !== null
    });

    return { account: updated, accessToken: tokens.accessToken };
  }
}
