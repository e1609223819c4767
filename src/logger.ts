/**
 * Logger - tagged console output
 *
 * Clients and interceptors take any object implementing `Logger`, so an
 * embedding application can route output into its own logging stack.
 *
 * Format: [LEVEL] [TAG] message k=v
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  [key: string]: unknown;
}

/**
 * @example
 * const log = createLogger('SSE');
 * log.info('Connected', { url: 'https://example.com/events', status: 200 });
 * // Output: [INFO ] [SSE] Connected url="https://example.com/events" status=200
 */
export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

export interface LoggerOptions {
  /** Messages below this level are dropped (default: debug) */
  level?: LogLevel;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const WRITERS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

function renderValue(value: unknown): unknown {
  return value instanceof Error ? `${value.name}: ${value.message}` : value;
}

/**
 * Render context as " k=v k=v" when small and flat, otherwise as JSON.
 * Error values are reduced to "Name: message".
 */
export function formatContext(context: LogContext | undefined): string {
  if (!context) {
    return '';
  }
  const entries = Object.entries(context).map(([key, value]): [string, unknown] => [key, renderValue(value)]);
  if (entries.length === 0) {
    return '';
  }

  const flat = entries.every(([, value]) => value === null || typeof value !== 'object');
  if (entries.length <= 3 && flat) {
    return ' ' + entries.map(([key, value]) => `${key}=${JSON.stringify(value)}`).join(' ');
  }
  return ' ' + JSON.stringify(Object.fromEntries(entries));
}

export function createLogger(tag: string, options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_RANK[options.level ?? 'debug'];

  const log = (level: LogLevel, message: string, context?: LogContext): void => {
    if (LEVEL_RANK[level] < threshold) {
      return;
    }
    WRITERS[level](`[${level.toUpperCase().padEnd(5)}] [${tag}] ${message}${formatContext(context)}`);
  };

  return {
    debug: (message, context) => log('debug', message, context),
    info: (message, context) => log('info', message, context),
    warn: (message, context) => log('warn', message, context),
    error: (message, context) => log('error', message, context),
  };
}

/** Discards everything */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export const clientLog = createLogger('SSE');
export const httpLog = createLogger('HTTP');
