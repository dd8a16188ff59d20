/**
 * Structured logger. Each entry is written as one JSON line.
 */
export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * No-op logger, used by tests.
 */
export const noopLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

/**
 * Logger writing JSON lines to the console, dropping entries below `level`.
 */
export function createConsoleLogger(level: string = 'info'): Logger {
  const threshold = LEVEL_ORDER[isLogLevel(level) ? level : 'info'];

  const write = (entryLevel: Exclude<LogLevel, 'silent'>, message: string, data?: Record<string, unknown>) => {
    if (LEVEL_ORDER[entryLevel] < threshold) {
      return;
    }

    const line = JSON.stringify({
      timestamp: new Date().toISOString(),
      level: entryLevel,
      message,
      ...data,
    });

    if (entryLevel === 'error') {
      console.error(line);
    } else if (entryLevel === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug: (message, data) => write('debug', message, data),
    info: (message, data) => write('info', message, data),
    warn: (message, data) => write('warn', message, data),
    error: (message, data) => write('error', message, data),
  };
}

/**
 * Reduce an unknown thrown value to loggable fields.
 */
export function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return { error: error.name, message: error.message, stack: error.stack };
  }
  return { error: String(error) };
}
