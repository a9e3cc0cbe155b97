/**
 * Loads environment files before anything else reads process.env.
 * Import this module first from every entry point.
 */
import dotenv from 'dotenv';
import { existsSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { createLogger } from './services/calendarSync/logger.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const rootDir = join(__dirname, '../../');
const backendDir = join(__dirname, '../');

const logger = createLogger('Env');

const envName = (process.env.CALSYNC_ENV || process.env.NODE_ENV || 'development').trim();
const candidateFiles = [`.env.${envName}`, `.env.${envName}.local`];

const loadedFiles = candidateFiles
  .flatMap((candidate) => [rootDir, backendDir].map((dir) => join(dir, candidate)))
  .filter((fullPath, index, all) => existsSync(fullPath) && all.indexOf(fullPath) === index);

for (const fullPath of loadedFiles) {
  dotenv.config({ path: fullPath, override: true });
}

if (loadedFiles.length > 0) {
  logger.info('Loaded environment files', { files: loadedFiles });
} else {
  logger.warn('No environment files found', { expected: candidateFiles });
}

if (process.env.NODE_ENV === 'test') {
  process.env.AUTH_JWT_SECRET ??= 'test-secret';
  process.env.GOOGLE_CLIENT_ID ??= 'test-client-id';
  process.env.GOOGLE_CLIENT_SECRET ??= 'test-client-secret';
  process.env.DATABASE_URL ??= 'postgres://localhost:5432/calsync_test';
}

const requiredSettings: Array<{ key: string; description: string }> = [
  { key: 'DATABASE_URL', description: 'Postgres connection string' },
  { key: 'AUTH_JWT_SECRET', description: 'HS256 secret used to verify session tokens' },
  { key: 'GOOGLE_CLIENT_ID', description: 'Google OAuth client identifier' },
  { key: 'GOOGLE_CLIENT_SECRET', description: 'Google OAuth client secret' }
];

// Sync tuning knobs fall back to their defaults when unparsable; say so at boot.
const numericSyncSettings = [
  'CALENDAR_SYNC_FRESHNESS_MS',
  'CALENDAR_SYNC_FULL_INTERVAL_MS',
  'CALENDAR_SYNC_TOKEN_SKEW_MS',
  'CALENDAR_SYNC_LOOKBACK_DAYS',
  'CALENDAR_SYNC_LOOKAHEAD_DAYS',
  'CALENDAR_SYNC_REQUEST_TIMEOUT_MS',
  'CALENDAR_SYNC_PAGE_SIZE'
];

const ignored = numericSyncSettings.filter((key) => {
  const value = process.env[key];
  return value !== undefined && value !== '' && !/^\d+$/.test(value.trim());
});
if (ignored.length > 0) {
  logger.warn('Ignoring non-numeric sync settings, defaults apply', { keys: ignored });
}

const missing = requiredSettings
  .filter(({ key }) => !process.env[key])
  .map(({ key, description }) => `${key} (${description})`);

if (missing.length > 0) {
  logger.error('Missing required environment variables', { missing });
  process.exit(1);
}
