/**
 * Logging Transports
 *
 * Winston transport wrappers. Console output goes to stderr on every level so
 * that command output on stdout stays machine-readable.
 */

import winston from 'winston';
import type { LogFormat, TimestampFormat } from './config.js';

const ALL_LEVELS = ['error', 'warn', 'info', 'debug', 'trace'];

/**
 * Interface for pluggable log transports.
 */
export interface LogTransport {
  name: string;
  createWinstonTransport(): winston.transport;
}

/**
 * Format a Date as yyyy-MM-dd HH:mm:ss,SSS in local time
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
 * Render one log line:
 * WARN  2026-02-10 14:30:15,042 [x12-delimiters] Falling back to configured delimiters
 */
export function formatTextLine(
  info: { level: string; message: unknown; [key: string]: unknown },
  timestamp: string
): string {
  const level = info.level.toUpperCase().padEnd(5);
  const component = info['component'];
  const errorStack = info['errorStack'];
  const componentPart = typeof component === 'string' ? ` [${component}]` : '';
  let line = `${level} ${timestamp}${componentPart} ${String(info.message)}`;
  if (typeof errorStack === 'string') {
    line += '\n' + errorStack;
  }
  return line;
}

function buildTextFormat(timestampFormat: TimestampFormat): winston.Logform.Format {
  return winston.format.printf((info) => {
    const now = new Date();
    const timestamp = timestampFormat === 'iso' ? now.toISOString() : formatLocalTimestamp(now);
    return formatTextLine(info, timestamp);
  });
}

function buildFormat(format: LogFormat, timestampFormat: TimestampFormat): winston.Logform.Format {
  if (format === 'json') {
    return winston.format.combine(winston.format.timestamp(), winston.format.json());
  }
  return buildTextFormat(timestampFormat);
}

export class ConsoleTransport implements LogTransport {
  name = 'console';

  constructor(
    private readonly format: LogFormat,
    private readonly timestampFormat: TimestampFormat
  ) {}

  createWinstonTransport(): winston.transport {
    return new winston.transports.Console({
      format: buildFormat(this.format, this.timestampFormat),
      stderrLevels: ALL_LEVELS,
    });
  }
}

/**
 * File transport with size-based rotation.
 */
export class FileTransport implements LogTransport {
  name = 'file';

  constructor(
    private readonly filePath: string,
    private readonly format: LogFormat,
    private readonly timestampFormat: TimestampFormat
  ) {}

  createWinstonTransport(): winston.transport {
    return new winston.transports.File({
      filename: this.filePath,
      format: buildFormat(this.format, this.timestampFormat),
      maxsize: 10 * 1024 * 1024, // 10 MB
      maxFiles: 5,
    });
  }
}
