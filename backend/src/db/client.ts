import pg from 'pg';
import type { ConnectionOptions as TlsConnectionOptions } from 'tls';
import { createLogger, describeError } from '../services/calendarSync/logger.js';

const { Pool } = pg;

type PgSslConfig = pg.ConnectionConfig['ssl'];

function normalizeFlag(value: string | undefined): string {
  return value ? value.toLowerCase().trim() : '';
}

export function resolveSslConfig(): PgSslConfig {
  const mode = normalizeFlag(process.env.DATABASE_SSL);
  const disable = ['disable', 'disabled', 'off', 'false', '0'].includes(mode);
  if (disable) {
    return false;
  }

  const enable =
    ['require', 'required', 'verify-full', 'verify_ca', 'true', '1', 'on'].includes(mode) ||
    (!mode && process.env.NODE_ENV === 'production');

  if (!enable) {
    return false;
  }

  const rejectUnauthorized = normalizeFlag(process.env.DATABASE_SSL_REJECT_UNAUTHORIZED) !== 'false';
  const caRaw = process.env.DATABASE_SSL_CA ? process.env.DATABASE_SSL_CA.replace(/\\n/g, '\n') : undefined;

  if (rejectUnauthorized && process.env.NODE_ENV === 'production' && !caRaw) {
    throw new Error('DATABASE_SSL_CA must be provided when TLS verification is enabled in production');
  }

  const sslConfig: TlsConnectionOptions = {
    rejectUnauthorized
  };

  if (caRaw) {
    sslConfig.ca = caRaw;
  }

  return sslConfig;
}

const debugSql = normalizeFlag(process.env.DEBUG_SQL) === 'true';
const logger = createLogger('Database');

function createPool(): pg.Pool {
  const created = new Pool({
    connectionString: process.env.DATABASE_URL,
    ssl: resolveSslConfig()
  });

  created.on('connect', () => {
    if (debugSql) {
      logger.info('Connected to PostgreSQL database');
    }
  });

  created.on('error', (err: Error) => {
    logger.error('Unexpected error on idle client', { error: describeError(err) });
  });

  return created;
}

let pool: pg.Pool | null = null;

function getPool(): pg.Pool {
  if (!pool) {
    pool = createPool();
  }
  return pool;
}

/**
 * Execute a SQL query
 * @param text - SQL query
 * @param params - Query parameters
 */
export async function query<R extends pg.QueryResultRow = pg.QueryResultRow>(
  text: string,
  params?: unknown[]
): Promise<pg.QueryResult<R>> {
  const start = Date.now();
  const res = await getPool().query<R>(text, params);
  const duration = Date.now() - start;
  if (debugSql) {
    logger.info('Executed query', {
      statement: text.replace(/\s+/g, ' ').trim().slice(0, 200),
      duration,
      rows: res.rowCount
    });
  }
  return res;
}

/**
 * Get a client from the pool for transactions
 */
export async function getClient(): Promise<pg.PoolClient> {
  return getPool().connect();
}

/**
 * Run `work` inside BEGIN/COMMIT, rolling back when it throws
 */
export async function withTransaction<T>(work: (client: pg.PoolClient) => Promise<T>): Promise<T> {
  const client = await getClient();
  try {
    await client.query('BEGIN');
    const result = await work(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}

/**
 * End the pool (for cleanup in tests)
 */
export async function end(): Promise<void> {
  if (!pool) {
    return;
  }
  const current = pool;
  pool = null;
  await current.end();
}

export function __setPoolForTests(next: pg.Pool | null): void {
  pool = next;
}

export default { query, getClient, withTransaction, end };
