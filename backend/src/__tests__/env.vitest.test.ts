import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('dotenv', () => ({
  default: {
    config: vi.fn()
  }
}));

const originalEnv = { ...process.env };

function resetEnv() {
  for (const key of Object.keys(process.env)) {
    delete process.env[key];
  }
  Object.assign(process.env, originalEnv);
}

beforeEach(() => {
  vi.resetModules();
  vi.clearAllMocks();
  resetEnv();
  process.env.LOG_LEVEL = 'info';
});

afterEach(() => {
  resetEnv();
  vi.restoreAllMocks();
});

describe('env bootstrap', () => {
  it('fills deterministic secrets for tests without exiting', async () => {
    process.env.NODE_ENV = 'test';
    process.env.CALSYNC_ENV = 'vitest-missing';
    delete process.env.AUTH_JWT_SECRET;
    delete process.env.DATABASE_URL;

    const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never);
    const consoleSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    await import('../env.js');

    expect(process.env.AUTH_JWT_SECRET).toBe('test-secret');
    expect(process.env.DATABASE_URL).toBe('postgres://localhost:5432/calsync_test');
    expect(exitSpy).not.toHaveBeenCalled();
    expect(consoleSpy).toHaveBeenCalledTimes(1);
  });

  it('exits when required environment variables are missing', async () => {
    process.env.NODE_ENV = 'production';
    process.env.CALSYNC_ENV = 'vitest-missing';
    for (const key of ['DATABASE_URL', 'AUTH_JWT_SECRET', 'GOOGLE_CLIENT_ID', 'GOOGLE_CLIENT_SECRET']) {
      delete process.env[key];
    }

    const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never);
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});

    await import('../env.js');

    expect(exitSpy).toHaveBeenCalledWith(1);
    expect(errorSpy).toHaveBeenCalledWith('[Env] Missing required environment variables', {
      missing: [
        'DATABASE_URL (Postgres connection string)',
        'AUTH_JWT_SECRET (HS256 secret used to verify session tokens)',
        'GOOGLE_CLIENT_ID (Google OAuth client identifier)',
        'GOOGLE_CLIENT_SECRET (Google OAuth client secret)'
      ]
    });
  });

  it('warns about sync settings that are not whole numbers', async () => {
    process.env.NODE_ENV = 'test';
    process.env.CALSYNC_ENV = 'vitest-missing';
    process.env.CALENDAR_SYNC_PAGE_SIZE = 'lots';
    process.env.CALENDAR_SYNC_FRESHNESS_MS = '30000';

    vi.spyOn(process, 'exit').mockImplementation(() => undefined as never);
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    await import('../env.js');

    expect(warnSpy).toHaveBeenCalledWith('[Env] Ignoring non-numeric sync settings, defaults apply', {
      keys: ['CALENDAR_SYNC_PAGE_SIZE']
    });
  });
});
