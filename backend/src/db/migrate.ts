import '../env.js';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import db from './client.js';
import { createLogger, describeError } from '../services/calendarSync/logger.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const logger = createLogger('Migrate');

export function loadSchema(): string {
  return readFileSync(join(__dirname, 'schema.sql'), 'utf8');
}

/** Applies schema.sql. Every statement is idempotent, so reruns are safe. */
export async function migrate(): Promise<void> {
  logger.info('Running database migrations');
  await db.query(loadSchema());
  logger.info('Database migrations completed');
}

if (process.argv[1] === __filename) {
  try {
    await migrate();
    await db.end();
    process.exit(0);
  } catch (error) {
    logger.error('Migration failed', { error: describeError(error) });
    process.exit(1);
  }
}
