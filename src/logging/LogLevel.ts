/**
 * Log levels, ordered TRACE < DEBUG < INFO < WARN < ERROR.
 */
export enum LogLevel {
  TRACE = 'TRACE',
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_ORDER: readonly LogLevel[] = [
  LogLevel.TRACE,
  LogLevel.DEBUG,
  LogLevel.INFO,
  LogLevel.WARN,
  LogLevel.ERROR,
];

/**
 * Parse log level from string. Unknown values fall back to INFO.
 */
export function parseLogLevel(level: string): LogLevel {
  switch (level.toUpperCase()) {
    case 'TRACE':
      return LogLevel.TRACE;
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'INFO':
    case 'INFORMATION':
      return LogLevel.INFO;
    case 'WARN':
    case 'WARNING':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
}

/**
 * Check if a message at itemLevel passes a filter set at filterLevel.
 */
export function shouldDisplayLogLevel(itemLevel: LogLevel, filterLevel: LogLevel): boolean {
  return LEVEL_ORDER.indexOf(itemLevel) >= LEVEL_ORDER.indexOf(filterLevel);
}
