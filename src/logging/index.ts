/**
 * Logging module
 */

export { LogLevel, parseLogLevel, shouldDisplayLogLevel } from './LogLevel.js';
export { Logger, REDACTED, redactMetadata } from './Logger.js';
export {
  initializeLogging,
  getLogger,
  setGlobalLevel,
  getGlobalLevel,
  shutdownLogging,
  resetLogging,
} from './LoggerFactory.js';
export {
  registerComponent,
  setComponentLevel,
  clearComponentLevel,
  getRegisteredComponents,
  resetDebugRegistry,
} from './DebugModeRegistry.js';
export { getLoggingConfig, resetLoggingConfig } from './config.js';
export type { LoggingConfiguration, LogFormat, TimestampFormat } from './config.js';
export { ConsoleTransport, FileTransport, formatLocalTimestamp, formatTextLine } from './transports.js';
export type { LogTransport } from './transports.js';
