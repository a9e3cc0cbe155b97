export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(scope: string): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

export function resolveLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.toLowerCase().trim() ?? '';
  return isLogLevel(normalized) ? normalized : 'info';
}

type ConsoleMethod = 'log' | 'warn' | 'error';

const CONSOLE_METHOD: Record<Exclude<LogLevel, 'silent'>, ConsoleMethod> = {
  debug: 'log',
  info: 'log',
  warn: 'warn',
  error: 'error'
};

/**
 * Console-backed logger that prefixes every line with its scope, e.g.
 * `[CalendarSync:Fetcher] Fetched events page`.
 *
 * The threshold is read once from LOG_LEVEL when the logger is created.
 */
export function createLogger(scope: string, level: LogLevel = resolveLogLevel(process.env.LOG_LEVEL)): Logger {
  const threshold = LEVEL_ORDER[level];

  const write = (entryLevel: Exclude<LogLevel, 'silent'>, message: string, meta?: Record<string, unknown>) => {
    if (LEVEL_ORDER[entryLevel] < threshold) {
      return;
    }
    const method = CONSOLE_METHOD[entryLevel];
    if (meta) {
      console[method](`[${scope}] ${message}`, meta);
      return;
    }
    console[method](`[${scope}] ${message}`);
  };

  return {
    debug: (message, meta) => write('debug', message, meta),
    info: (message, meta) => write('info', message, meta),
    warn: (message, meta) => write('warn', message, meta),
    error: (message, meta) => write('error', message, meta),
    child: (childScope) => createLogger(`${scope}:${childScope}`, level)
  };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
