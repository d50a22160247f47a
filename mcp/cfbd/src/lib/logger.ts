/**
 * Logger module that writes ONLY to stderr.
 *
 * Never use console.log in MCP servers - stdout is reserved for protocol
 * traffic whenever a server is run over stdio.
 */

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LogData {
  [key: string]: unknown;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY;
}

/**
 * Resolves the active level. DEBUG=1 wins over LOG_LEVEL so the
 * request-header dump can be switched on without touching LOG_LEVEL.
 */
function getConfiguredLevel(): LogLevel {
  if (process.env.DEBUG === '1') {
    return 'debug';
  }
  const level = (process.env.LOG_LEVEL || 'info').toLowerCase();
  return isLogLevel(level) ? level : 'info';
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[getConfiguredLevel()];
}

function formatMessage(level: LogLevel, msg: string, data?: LogData): string {
  const timestamp = new Date().toISOString();
  const levelUpper = level.toUpperCase().padEnd(5);

  if (data && Object.keys(data).length > 0) {
    return `${timestamp} [${levelUpper}] ${msg} ${JSON.stringify(data)}`;
  }
  return `${timestamp} [${levelUpper}] ${msg}`;
}

/**
 * Logger instance - all output goes to stderr only.
 *
 * Usage:
 *   logger.debug('Cache lookup', { key });
 *   logger.info('Server started', { port: 3000 });
 *   logger.warn('Redis unavailable, continuing without cache');
 *   logger.error('Failed to persist token', { error: err.message });
 */
export const logger = {
  debug(msg: string, data?: LogData): void {
    if (shouldLog('debug')) {
      console.error(formatMessage('debug', msg, data));
    }
  },

  info(msg: string, data?: LogData): void {
    if (shouldLog('info')) {
      console.error(formatMessage('info', msg, data));
    }
  },

  warn(msg: string, data?: LogData): void {
    if (shouldLog('warn')) {
      console.error(formatMessage('warn', msg, data));
    }
  },

  error(msg: string, data?: LogData): void {
    if (shouldLog('error')) {
      console.error(formatMessage('error', msg, data));
    }
  },

  /** True when debug output is enabled; used to skip building expensive payloads */
  isDebugEnabled(): boolean {
    return shouldLog('debug');
  },
};

/**
 * Formats an unknown thrown value for log payloads.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Shortens a secret to a loggable prefix.
 */
export function redact(secret: string, visible = 8): string {
  return secret.length <= visible ? '***' : `${secret.slice(0, visible)}...`;
}

export type { LogLevel, LogData };
