// Offline Core - Logging
// Console logging with a bracketed component prefix, filtered by level

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const IS_TEST = process.env.NODE_ENV === 'test' || process.env.VITEST === 'true';

/**
 * Level used when no configuration is given: silent under tests, info otherwise
 */
export function defaultLogLevel(): LogLevel {
  return IS_TEST ? 'silent' : 'info';
}

/**
 * Creates a logger whose lines read `[Scope] message`
 */
export function createLogger(scope: string, level: LogLevel = defaultLogLevel()): Logger {
  const enabled = (target: LogLevel) => LEVEL_RANK[target] >= LEVEL_RANK[level];
  const prefix = `[${scope}]`;

  const write = (
    target: Exclude<LogLevel, 'silent'>,
    sink: (...args: unknown[]) => void,
    message: string,
    context?: Record<string, unknown>
  ) => {
    if (!enabled(target)) return;
    if (context) {
      sink(`${prefix} ${message}`, context);
    } else {
      sink(`${prefix} ${message}`);
    }
  };

  return {
    debug: (message, context) => write('debug', console.debug, message, context),
    info: (message, context) => write('info', console.log, message, context),
    warn: (message, context) => write('warn', console.warn, message, context),
    error: (message, context) => write('error', console.error, message, context),
  };
}

/**
 * Logger that drops everything
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
