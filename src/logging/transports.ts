/**
 * Logging Transports
 *
 * Winston transport wrappers. Text output looks like:
 *   INFO  2026-02-10 14:30:15,042 [soap-transport] POST https://host/service -> 200
 */

import winston from 'winston';
import type { LogFormat, TimestampFormat } from './config.js';

export interface LogTransport {
  name: string;
  createWinstonTransport(): winston.transport;
}

/**
 * Local timestamp: yyyy-MM-dd HH:mm:ss,SSS
 */
export function formatLocalTimestamp(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  const hours = String(date.getHours()).padStart(2, '0');
  const minutes = String(date.getMinutes()).padStart(2, '0');
  const seconds = String(date.getSeconds()).padStart(2, '0');
  const millis = String(date.getMilliseconds()).padStart(3, '0');
  return `${year}-${month}-${day} ${hours}:${minutes}:${seconds},${millis}`;
}

/**
 * Render one log record as a text line. Metadata other than the component
 * and error stack is appended as key=value pairs.
 */
export function formatTextLine(
  level: string,
  message: string,
  meta: Record<string, unknown>,
  timestamp: string
): string {
  const component = typeof meta['component'] === 'string' ? ` [${meta['component']}]` : '';
  const extras = Object.entries(meta)
    .filter(([key]) => key !== 'component' && key !== 'errorStack')
    .map(([key, value]) => `${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`);
  let line = `${level.toUpperCase().padStart(5)} ${timestamp}${component} ${message}`;
  if (extras.length > 0) {
    line += ` (${extras.join(', ')})`;
  }
  const errorStack = meta['errorStack'];
  if (typeof errorStack === 'string') {
    line += '\n' + errorStack;
  }
  return line;
}

function buildTextFormat(timestampFormat: TimestampFormat): winston.Logform.Format {
  return winston.format.printf((info) => {
    const { level, message, ...meta } = info;
    const timestamp =
      timestampFormat === 'iso' ? new Date().toISOString() : formatLocalTimestamp(new Date());
    return formatTextLine(level, String(message), meta, timestamp);
  });
}

function buildJsonFormat(): winston.Logform.Format {
  return winston.format.combine(winston.format.timestamp(), winston.format.json());
}

/**
 * Console transport. Everything goes to stdout, errors included.
 */
export class ConsoleTransport implements LogTransport {
  name = 'console';

  constructor(
    private format: LogFormat,
    private timestampFormat: TimestampFormat
  ) {}

  createWinstonTransport(): winston.transport {
    return new winston.transports.Console({
      format: this.format === 'json' ? buildJsonFormat() : buildTextFormat(this.timestampFormat),
      stderrLevels: [],
    });
  }
}

/**
 * File transport with size-based rotation.
 */
export class FileTransport implements LogTransport {
  name = 'file';

  constructor(
    private filePath: string,
    private format: LogFormat
  ) {}

  createWinstonTransport(): winston.transport {
    return new winston.transports.File({
      filename: this.filePath,
      format: this.format === 'json' ? buildJsonFormat() : buildTextFormat('local'),
      maxsize: 10 * 1024 * 1024, // 10 MB
      maxFiles: 5,
    });
  }
}
