/**
 * Logger that writes ONLY to stderr.
 *
 * MCP frames travel over stdout for stdio hosts, so nothing here may
 * touch console.log. Output is filtered by LOG_LEVEL (default: info).
 */

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

type LogLevel = (typeof LOG_LEVELS)[number];

interface LogData {
  [key: string]: unknown;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Reads LOG_LEVEL on every call so tests and long-running processes can
 * change verbosity without a restart. Unknown values fall back to info.
 */
function getConfiguredLevel(): LogLevel {
  const level = (process.env.LOG_LEVEL || 'info').toLowerCase();
  return isLogLevel(level) ? level : 'info';
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(getConfiguredLevel());
}

export function formatMessage(level: LogLevel, msg: string, data?: LogData): string {
  const timestamp = new Date().toISOString();
  const levelUpper = level.toUpperCase().padEnd(5);

  if (data && Object.keys(data).length > 0) {
    return `${timestamp} [${levelUpper}] ${msg} ${JSON.stringify(data)}`;
  }
  return `${timestamp} [${levelUpper}] ${msg}`;
}

function write(level: LogLevel, msg: string, data?: LogData): void {
  if (shouldLog(level)) {
    console.error(formatMessage(level, msg, data));
  }
}

/**
 * Usage:
 *   logger.debug('Homebox request', { endpoint: '/v1/items' });
 *   logger.error('search_items error', { error: err.message });
 */
export const logger = {
  debug(msg: string, data?: LogData): void {
    write('debug', msg, data);
  },

  info(msg: string, data?: LogData): void {
    write('info', msg, data);
  },

  warn(msg: string, data?: LogData): void {
    write('warn', msg, data);
  },

  error(msg: string, data?: LogData): void {
    write('error', msg, data);
  },
};

export type { LogLevel, LogData };
