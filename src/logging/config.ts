/**
 * Logging Configuration
 *
 * Derived from environment variables and cached after the first read.
 */

import { LogLevel, parseLogLevel } from './LogLevel.js';

export type LogFormat = 'text' | 'json';
export type TimestampFormat = 'local' | 'iso';

export interface LoggingConfiguration {
  /** Minimum log level (LOG_LEVEL, default INFO) */
  logLevel: LogLevel;
  /** Per-component overrides (SOAP_DEBUG_COMPONENTS, comma-separated) */
  debugComponents: string[];
  /** Output format (LOG_FORMAT, default 'text') */
  logFormat: LogFormat;
  /** Optional log file path (LOG_FILE) */
  logFile?: string;
  /** Timestamp style for text output (LOG_TIMESTAMP_FORMAT, default 'local') */
  timestampFormat: TimestampFormat;
}

let cachedConfig: LoggingConfiguration | null = null;

function parseFormat(value: string | undefined): LogFormat {
  return value === 'json' ? 'json' : 'text';
}

function parseTimestampFormat(value: string | undefined): TimestampFormat {
  return value === 'iso' ? 'iso' : 'local';
}

function parseDebugComponents(value: string | undefined): string[] {
  if (!value || value.trim() === '') return [];
  return value
    .split(',')
    .map((c) => c.trim())
    .filter((c) => c.length > 0);
}

export function getLoggingConfig(): LoggingConfiguration {
  if (cachedConfig) return cachedConfig;

  cachedConfig = {
    logLevel: parseLogLevel(process.env['LOG_LEVEL'] ?? 'INFO'),
    debugComponents: parseDebugComponents(process.env['SOAP_DEBUG_COMPONENTS']),
    logFormat: parseFormat(process.env['LOG_FORMAT']),
    logFile: process.env['LOG_FILE'] || undefined,
    timestampFormat: parseTimestampFormat(process.env['LOG_TIMESTAMP_FORMAT']),
  };

  return cachedConfig;
}

/**
 * Reset cached configuration (for testing)
 */
export function resetLoggingConfig(): void {
  cachedConfig = null;
}
