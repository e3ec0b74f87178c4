/**
 * Logger Factory
 *
 * Initializes the root winston logger and caches per-component Logger
 * wrappers.
 *
 * Usage:
 *   import { getLogger } from '../logging/index.js';
 *
 *   const logger = getLogger('soap-client');
 *   logger.info('Request sent');
 *
 * initializeLogging() is optional; getLogger() lazily initializes with the
 * environment-derived defaults.
 */

import winston from 'winston';
import { LogLevel } from './LogLevel.js';
import { getLoggingConfig } from './config.js';
import { initFromEnv } from './DebugModeRegistry.js';
import { Logger, setGlobalLevelProvider } from './Logger.js';
import { ConsoleTransport, FileTransport } from './transports.js';
import type { LogTransport } from './transports.js';

/**
 * Winston uses lower numbers for higher priority.
 */
const WINSTON_LEVELS: Record<string, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

function toWinstonLevel(level: LogLevel): string {
  switch (level) {
    case LogLevel.ERROR:
      return 'error';
    case LogLevel.WARN:
      return 'warn';
    case LogLevel.DEBUG:
      return 'debug';
    case LogLevel.TRACE:
      return 'trace';
    case LogLevel.INFO:
    default:
      return 'info';
  }
}

let rootLogger: winston.Logger | null = null;
let currentGlobalLevel: LogLevel = LogLevel.INFO;
const loggerCache = new Map<string, Logger>();

/**
 * Initialize the logging subsystem.
 *
 * @param additionalTransports - extra sinks, e.g. an in-memory capture in tests
 */
export function initializeLogging(additionalTransports?: LogTransport[]): winston.Logger {
  const config = getLoggingConfig();

  currentGlobalLevel = config.logLevel;

  const transports: winston.transport[] = [
    new ConsoleTransport(config.logFormat, config.timestampFormat).createWinstonTransport(),
  ];

  if (config.logFile) {
    transports.push(new FileTransport(config.logFile, config.logFormat).createWinstonTransport());
  }

  for (const t of additionalTransports ?? []) {
    transports.push(t.createWinstonTransport());
  }

  if (rootLogger) {
    rootLogger.close();
  }

  const root = winston.createLogger({
    levels: WINSTON_LEVELS,
    // Filtering happens in Logger against the registry; winston passes everything through.
    level: 'trace',
    transports,
    exitOnError: false,
  });
  rootLogger = root;

  setGlobalLevelProvider(() => currentGlobalLevel);
  initFromEnv(config.debugComponents);

  // Re-wire existing cached loggers to the new root
  for (const component of loggerCache.keys()) {
    loggerCache.set(component, new Logger(component, root));
  }

  return root;
}

function ensureInitialized(): winston.Logger {
  return rootLogger ?? initializeLogging();
}

/**
 * Get (or create) a Logger for a named component.
 */
export function getLogger(component: string): Logger {
  const cached = loggerCache.get(component);
  if (cached) return cached;

  const logger = new Logger(component, ensureInitialized());
  loggerCache.set(component, logger);
  return logger;
}

/**
 * Change the global log level at runtime.
 * Affects all loggers that don't have a per-component override.
 */
export function setGlobalLevel(level: LogLevel): void {
  currentGlobalLevel = level;
}

export function getGlobalLevel(): LogLevel {
  return currentGlobalLevel;
}

/**
 * Flush pending writes and close all transports.
 */
export async function shutdownLogging(): Promise<void> {
  const root = rootLogger;
  if (!root) return;
  rootLogger = null;
  loggerCache.clear();
  await new Promise<void>((resolve) => {
    root.on('finish', () => resolve());
    root.end();
  });
}

/**
 * Reset all logging state (for testing).
 */
export function resetLogging(): void {
  if (rootLogger) {
    rootLogger.close();
  }
  rootLogger = null;
  currentGlobalLevel = LogLevel.INFO;
  loggerCache.clear();
  setGlobalLevelProvider(() => LogLevel.INFO);
}
