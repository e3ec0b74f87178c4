/**
 * Logger
 *
 * Lightweight wrapper around a winston logger instance, bound to a component
 * name. Level filtering goes through DebugModeRegistry so that one component
 * can be turned up to DEBUG/TRACE on its own.
 *
 * Metadata keys that look like credentials are masked before they reach any
 * transport.
 */

import winston from 'winston';
import { LogLevel } from './LogLevel.js';
import { shouldLog } from './DebugModeRegistry.js';

/** Reference to the factory's global level getter, injected to avoid circular imports */
let globalLevelFn: () => LogLevel = () => LogLevel.INFO;

const SECRET_KEY_PATTERN = /pass(word|phrase)?|secret|authorization|credential|token|^key$/i;

export const REDACTED = '***';

/**
 * Set the global level provider function.
 * Called by LoggerFactory during initialization.
 * @internal
 */
export function setGlobalLevelProvider(fn: () => LogLevel): void {
  globalLevelFn = fn;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Replace values of secret-looking keys, recursing into plain objects.
 */
export function redactMetadata(metadata: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(metadata)) {
    if (SECRET_KEY_PATTERN.test(key)) {
      result[key] = REDACTED;
    } else if (isRecord(value)) {
      result[key] = redactMetadata(value);
    } else {
      result[key] = value;
    }
  }
  return result;
}

export class Logger {
  constructor(
    private readonly component: string,
    private readonly winstonLogger: winston.Logger
  ) {}

  trace(message: string, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.TRACE, 'trace', message, undefined, metadata);
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.DEBUG, 'debug', message, undefined, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.INFO, 'info', message, undefined, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.WARN, 'warn', message, undefined, metadata);
  }

  /**
   * Log an ERROR-level message with an optional Error object.
   */
  error(message: string, error?: Error, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.ERROR, 'error', message, error, metadata);
  }

  isDebugEnabled(): boolean {
    return shouldLog(this.component, LogLevel.DEBUG, globalLevelFn());
  }

  isTraceEnabled(): boolean {
    return shouldLog(this.component, LogLevel.TRACE, globalLevelFn());
  }

  /**
   * Create a child logger with a sub-component suffix.
   * e.g. logger.child('ntlm') on "soap-auth" yields "soap-auth.ntlm"
   */
  child(subComponent: string): Logger {
    return new Logger(`${this.component}.${subComponent}`, this.winstonLogger);
  }

  getComponent(): string {
    return this.component;
  }

  private logAt(
    level: LogLevel,
    winstonLevel: string,
    message: string,
    error?: Error,
    metadata?: Record<string, unknown>
  ): void {
    if (!shouldLog(this.component, level, globalLevelFn())) {
      return;
    }

    const meta: Record<string, unknown> = {
      component: this.component,
      ...(metadata ? redactMetadata(metadata) : {}),
    };
    if (error?.stack) {
      meta['errorStack'] = error.stack;
    }
    this.winstonLogger.log(winstonLevel, message, meta);
  }
}
