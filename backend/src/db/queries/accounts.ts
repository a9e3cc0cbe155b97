import type { Account, AccountProvider, AccountTokens } from '@calsync/shared';
import { db } from './shared.js';

interface AccountRow {
  id: number;
  user_id: number;
  provider: AccountProvider;
  access_token: string | null;
  refresh_token: string | null;
  expires_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

export function accountRowToAccount(row: AccountRow): Account {
  return {
    id: row.id,
    userId: row.user_id,
    provider: row.provider,
    accessToken: row.access_token,
    refreshToken: row.refresh_token,
    expiresAt: row.expires_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}

export async function getAccount(userId: number, provider: AccountProvider): Promise<Account | null> {
  const result = await db.query<AccountRow>('SELECT * FROM accounts WHERE user_id = $1 AND provider = $2', [
    userId,
    provider
  ]);
  return result.rows[0] ? accountRowToAccount(result.rows[0]) : null;
}

/** Single UPDATE so access token, refresh token and expiry always move together. */
export async function updateAccountTokens(
  userId: number,
  provider: AccountProvider,
  tokens: AccountTokens
): Promise<Account> {
  const result = await db.query<AccountRow>(
    `UPDATE accounts
        SET access_token = $3,
            refresh_token = $4,
            expires_at = $5,
            updated_at = NOW()
      WHERE user_id = $1 AND provider = $2
      RETURNING *`,
    [userId, provider, tokens.accessToken, tokens.refreshToken, tokens.expiresAt]
  );
  const row = result.rows[0];
  if (!row) {
    throw new Error(`No ${provider} account for user ${userId}`);
  }
  return accountRowToAccount(row);
}

export async function upsertAccount(
  userId: number,
  provider: AccountProvider,
  tokens: AccountTokens
): Promise<Account> {
  const result = await db.query<AccountRow>(
    `INSERT INTO accounts (user_id, provider, access_token, refresh_token, expires_at)
     VALUES ($1, $2, $3, $4, $5)
     ON CONFLICT (user_id, provider) DO UPDATE
       SET access_token = EXCLUDED.access_token,
           refresh_token = EXCLUDED.refresh_token,
           expires_at = EXCLUDED.expires_at,
           updated_at = NOW()
     RETURNING *`,
    [userId, provider, tokens.accessToken, tokens.refreshToken, tokens.expiresAt]
  );
  const row = result.rows[0];
  if (!row) {
    throw new Error(`Failed to store ${provider} account for user ${userId}`);
  }
  return accountRowToAccount(row);
}
