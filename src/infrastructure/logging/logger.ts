/**
 * Logger interface for dependency injection
 */
export interface Logger {
  info(...args: unknown[]): void;
  error(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  debug(...args: unknown[]): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

type LogMethod = keyof Logger;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export interface LoggerOptions {
  /** Messages below this level are dropped (default: debug) */
  level?: LogLevel;
  /** Prefixed to every message as `[scope]` */
  scope?: string;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

/**
 * Creates a logger instance that wraps the provided logger or falls back to console
 * @param providedLogger - Optional logger implementation
 */
export function createLogger(providedLogger?: Partial<Logger>, options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_RANK[options.level ?? 'debug'];
  const prefix = options.scope ? [`[${options.scope}]`] : [];

  const emit = (method: LogMethod, args: unknown[]): void => {
    if (LEVEL_RANK[method] < threshold) {
      return;
    }
    const target = providedLogger?.[method];
    if (typeof target === 'function') {
      target.apply(providedLogger, [...prefix, ...args]);
    } else {
      console[method](...prefix, ...args);
    }
  };

  return {
    info: (...args: unknown[]): void => emit('info', args),
    error: (...args: unknown[]): void => emit('error', args),
    warn: (...args: unknown[]): void => emit('warn', args),
    debug: (...args: unknown[]): void => emit('debug', args),
  };
}

/**
 * Creates a console logger (default implementation)
 */
export function createConsoleLogger(options: LoggerOptions = {}): Logger {
  return createLogger(undefined, options);
}

/**
 * Logger that drops everything; handy when embedding the dispatcher in tests
 */
export function createSilentLogger(): Logger {
  return createLogger(undefined, { level: 'silent' });
}
