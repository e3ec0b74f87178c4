/**
 * Log levels shared by the logging subsystem.
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
 * Parse a log level name. Unknown names fall back to INFO.
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
    case 'INFORMATION':
    default:
      return LogLevel.INFO;
  }
}

/**
 * True when a message at `itemLevel` passes a `filterLevel` threshold.
 */
export function shouldDisplayLogLevel(itemLevel: LogLevel, filterLevel: LogLevel): boolean {
  return LEVEL_ORDER.indexOf(itemLevel) >= LEVEL_ORDER.indexOf(filterLevel);
}
