/**
 * Log levels, ordered from most to least verbose.
 */
export enum LogLevel {
  TRACE = 'TRACE',
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_ORDER = [LogLevel.TRACE, LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

/**
 * Parse a level name; unknown names fall back to INFO.
 */
export function parseLogLevel(level: string): LogLevel {
  switch (level.toUpperCase()) {
    case 'TRACE':
      return LogLevel.TRACE;
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'WARN':
    case 'WARNING':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    case 'INFO':
    default:
      return LogLevel.INFO;
  }
}

/**
 * Check if a message at itemLevel passes a filter set to filterLevel
 */
export function shouldDisplayLogLevel(itemLevel: LogLevel, filterLevel: LogLevel): boolean {
  return LEVEL_ORDER.indexOf(itemLevel) >= LEVEL_ORDER.indexOf(filterLevel);
}
