import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { newDb } from 'pg-mem';
import { __setPoolForTests, query, resolveSslConfig, withTransaction } from './client.js';

describe('resolveSslConfig', () => {
  it('stays off outside production unless asked for', () => {
    expect(resolveSslConfig()).toBe(false);
  });

  it('honours an explicit disable flag in production', () => {
    process.env.NODE_ENV = 'production';
    process.env.DATABASE_SSL = 'disable';
    expect(resolveSslConfig()).toBe(false);
  });

  it('requires a CA when verifying certificates in production', () => {
    process.env.NODE_ENV = 'production';
    expect(() => resolveSslConfig()).toThrow('DATABASE_SSL_CA must be provided');
  });

  it('unescapes the CA and keeps verification on', () => {
    process.env.DATABASE_SSL = 'require';
    process.env.DATABASE_SSL_CA = 'line-1\\nline-2';
    expect(resolveSslConfig()).toEqual({ rejectUnauthorized: true, ca: 'line-1\nline-2' });
  });

  it('can skip verification', () => {
    process.env.DATABASE_SSL = 'true';
    process.env.DATABASE_SSL_REJECT_UNAUTHORIZED = 'false';
    expect(resolveSslConfig()).toEqual({ rejectUnauthorized: false });
  });
});

describe('withTransaction', () => {
  beforeEach(() => {
    const mem = newDb();
    mem.public.none('CREATE TABLE notes (id SERIAL PRIMARY KEY, body TEXT NOT NULL)');
    const { Pool } = mem.adapters.createPg();
    __setPoolForTests(new Pool());
  });

  afterEach(() => {
    __setPoolForTests(null);
  });

  it('returns the result of the work once committed', async () => {
    const inserted = await withTransaction(async (client) => {
      const result = await client.query<{ id: number }>("INSERT INTO notes (body) VALUES ('first') RETURNING id");
      return result.rows[0]?.id;
    });

    expect(inserted).toBe(1);
    const stored = await query<{ body: string }>('SELECT body FROM notes');
    expect(stored.rows.map((row) => row.body)).toEqual(['first']);
  });

  it('rethrows what the work throws', async () => {
    await expect(
      withTransaction(async () => {
        throw new Error('work failed');
      })
    ).rejects.toThrow('work failed');
  });
});
