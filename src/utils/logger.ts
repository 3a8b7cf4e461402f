/**
 * @fileoverview Leveled, scoped logger writing to stderr
 *
 * Every line goes through `console.error` so stdout stays free for the MCP
 * stdio transport. Lines are prefixed with an ISO timestamp, the level and
 * the scope, e.g. `[2025-01-15T10:30:00.000Z] INFO  [router] AI replied`.
 *
 * @module utils/logger
 * @license MIT
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let currentLevel: LogLevel = 'info';

/**
 * Set the minimum level written by every logger.
 */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

const shouldLog = (level: LogLevel): boolean => LOG_LEVELS[level] >= LOG_LEVELS[currentLevel];

const formatArg = (arg: unknown): string => {
  if (arg instanceof Error) {
    return arg.stack ?? `${arg.name}: ${arg.message}`;
  }
  if (typeof arg === 'string') {
    return arg;
  }
  if (arg === null || arg === undefined || typeof arg !== 'object') {
    return String(arg);
  }
  try {
    return JSON.stringify(arg);
  } catch {
    return '[Unserializable object]';
  }
};

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  child(scope: string): Logger;
}

/**
 * Create a logger whose lines carry `scope`.
 *
 * @example
 * const log = createLogger('webhook');
 * log.info('Buffered message', { phone: '15551234567' });
 * log.error('Buffering failed', err);
 */
export function createLogger(scope: string): Logger {
  const write =
    (level: LogLevel) =>
    (message: string, ...args: unknown[]): void => {
      if (!shouldLog(level)) return;
      const parts = [
        `[${new Date().toISOString()}]`,
        level.toUpperCase().padEnd(5),
        `[${scope}]`,
        message,
        ...args.map(formatArg),
      ];
      console.error(parts.join(' '));
    };

  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
    child: (childScope: string) => createLogger(`${scope}:${childScope}`),
  };
}

/**
 * Writable stream adapter so morgan access logs land in the logger.
 */
export function createAccessLogStream(logger: Logger): { write: (line: string) => void } {
  return {
    write: (line: string) => logger.info(line.trimEnd()),
  };
}
