import { beforeEach, describe, expect, it, vi } from 'vitest';

const dbMocks = vi.hoisted(() => ({
  query: vi.fn()
}));

vi.mock('../shared.js', () => ({
  db: dbMocks
}));

const { accountRowToAccount, getAccount, updateAccountTokens, upsertAccount } = await import('../accounts.js');

const baseRow = {
  id: 3,
  user_id: 1,
  provider: 'google' as const,
  access_token: 'access-1',
  refresh_token: 'refresh-1',
  expires_at: new Date('2025-10-17T13:00:00.000Z'),
  created_at: new Date('2025-10-01T00:00:00.000Z'),
  updated_at: new Date('2025-10-02T00:00:00.000Z')
};

const tokens = {
  accessToken: 'access-2',
  refreshToken: 'refresh-1',
  expiresAt: new Date('2025-10-17T14:00:00.000Z')
};

beforeEach(() => {
  vi.clearAllMocks();
  dbMocks.query.mockResolvedValue({ rows: [], rowCount: 0 });
});

describe('account queries', () => {
  it('maps raw rows to accounts', () => {
    expect(accountRowToAccount(baseRow)).toEqual({
      id: 3,
      userId: 1,
      provider: 'google',
      accessToken: 'access-1',
      refreshToken: 'refresh-1',
      expiresAt: new Date('2025-10-17T13:00:00.000Z'),
      createdAt: new Date('2025-10-01T00:00:00.000Z'),
      updatedAt: new Date('2025-10-02T00:00:00.000Z')
    });
  });

  it('returns null when the user has no account', async () => {
    await expect(getAccount(1, 'google')).resolves.toBeNull();
    expect(dbMocks.query).toHaveBeenCalledWith('SELECT * FROM accounts WHERE user_id = $1 AND provider = $2', [
      1,
      'google'
    ]);
  });

  it('updates all token columns in one statement', async () => {
    dbMocks.query.mockResolvedValueOnce({ rows: [{ ...baseRow, access_token: 'access-2' }], rowCount: 1 });

    const account = await updateAccountTokens(1, 'google', tokens);

    expect(dbMocks.query).toHaveBeenCalledTimes(1);
    expect(dbMocks.query).toHaveBeenCalledWith(expect.stringContaining('UPDATE accounts'), [
      1,
      'google',
      'access-2',
      'refresh-1',
      new Date('2025-10-17T14:00:00.000Z')
    ]);
    expect(account.accessToken).toBe('access-2');
  });

  it('throws when there is no account to update', async () => {
    await expect(updateAccountTokens(1, 'google', tokens)).rejects.toThrow('No google account for user 1');
  });

  it('upserts on the user and provider pair', async () => {
    dbMocks.query.mockResolvedValueOnce({ rows: [{ ...baseRow }], rowCount: 1 });

    await upsertAccount(1, 'google', tokens);

    expect(dbMocks.query).toHaveBeenCalledWith(
      expect.stringContaining('ON CONFLICT (user_id, provider) DO UPDATE'),
      expect.any(Array)
    );
  });
});
