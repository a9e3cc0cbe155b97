import { describe, expect, it } from 'vitest';
import { CredentialRefresher, createTokenClient, type TokenClient } from './auth.js';
import { CredentialRefreshError, ProviderRequestError } from './errors.js';
import {
  buildAccount,
  createTestClock,
  InMemoryCredentialStore,
  ScriptedTransport,
  silentLogger,
  StubTokenClient
} from './calendarSync.testDoubles.js';

const MINUTE_MS = 60 * 1000;

function setup(tokenClient?: TokenClient) {
  const clock = createTestClock('2025-10-17T12:00:00.000Z');
  const store = new InMemoryCredentialStore();
  const stub = new StubTokenClient(clock.now);
  const refresher = new CredentialRefresher({
    store,
    tokenClient: tokenClient ?? stub,
    logger: silentLogger,
    clock: clock.now,
    refreshSkewMs: 5 * MINUTE_MS
  });
  return { clock, store, stub, refresher };
}

describe('CredentialRefresher', () => {
  it('refreshes tokens that are missing, undated or inside the skew window', () => {
    const { refresher } = setup();

    expect(refresher.needsRefresh(buildAccount({ expiresAt: new Date('2025-10-17T12:06:00.000Z') }))).toBe(false);
    expect(refresher.needsRefresh(buildAccount({ expiresAt: new Date('2025-10-17T12:05:00.000Z') }))).toBe(true);
    expect(refresher.needsRefresh(buildAccount({ expiresAt: null }))).toBe(true);
    expect(refresher.needsRefresh(buildAccount({ accessToken: null }))).toBe(true);
  });

  it('returns the stored token while it is valid', async () => {
    const { refresher, stub } = setup();
    const account = buildAccount();

    const auth = await refresher.ensureAccessToken(account);

    expect(auth.accessToken).toBe('access-1');
    expect(stub.calls).toEqual([]);
  });

  it('persists refreshed tokens and keeps the old refresh token when none is returned', async () => {
    const { refresher, store } = setup();
    const account = store.seed(buildAccount({ expiresAt: new Date('2025-10-17T11:00:00.000Z') }));

    const auth = await refresher.ensureAccessToken(account);

    expect(auth.accessToken).toBe('fresh-access-1');
    expect(store.tokenUpdates).toEqual([
      {
        accessToken: 'fresh-access-1',
        refreshToken: 'refresh-1',
        expiresAt: new Date('2025-10-17T13:00:00.000Z')
      }
    ]);
    expect(auth.account.accessToken).toBe('fresh-access-1');
  });

  it('fails without a refresh token', async () => {
    const { refresher } = setup();

    await expect(refresher.forceRefresh(buildAccount({ refreshToken: null }))).rejects.toMatchObject({
      reason: 'missing_refresh_token',
      status: 400
    });
  });

  it('wraps token endpoint failures', async () => {
    const failing = new StubTokenClient(() => new Date(), new ProviderRequestError('invalid_grant', 400));
    const { refresher, store } = setup(failing);
    const account = store.seed(buildAccount());

    const failure = await refresher.forceRefresh(account).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(CredentialRefreshError);
    expect(failure).toMatchObject({ reason: 'refresh_failed', status: 400 });
    expect(store.tokenUpdates).toEqual([]);
  });

  it('rejects an empty access token', async () => {
    const empty: TokenClient = {
      refreshAccessToken: async () => ({ accessToken: '', refreshToken: null, expiresAt: null })
    };
    const { refresher, store } = setup(empty);
    const account = store.seed(buildAccount());

    await expect(refresher.forceRefresh(account)).rejects.toMatchObject({ reason: 'empty_access_token', status: 502 });
  });
});

describe('createTokenClient', () => {
  it('posts the refresh-token grant and converts expires_in', async () => {
    process.env.GOOGLE_CLIENT_ID = 'test-client-id';
    process.env.GOOGLE_CLIENT_SECRET = 'test-secret';
    const transport = new ScriptedTransport().onPost('/token', () => ({
      access_token: 'new-access',
      refresh_token: 'rotated',
      expires_in: 3600
    }));
    const client = createTokenClient({
      transport,
      tokenEndpoint: 'https://calendar.test/token',
      clock: () => new Date('2025-10-17T12:00:00.000Z')
    });

    const token = await client.refreshAccessToken('refresh-1');

    expect(token).toEqual({
      accessToken: 'new-access',
      refreshToken: 'rotated',
      expiresAt: new Date('2025-10-17T13:00:00.000Z')
    });
    expect(Object.fromEntries(transport.requests[0]?.body ?? [])).toEqual({
      client_id: 'test-client-id',
      client_secret: 'test-secret',
      grant_type: 'refresh_token',
      refresh_token: 'refresh-1'
    });
  });
});
