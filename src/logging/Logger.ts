/**
 * Logger
 *
 * Component-bound facade over the root winston logger. The root and the
 * global level are looked up on every call, so a Logger taken at module load
 * keeps working after initializeLogging() replaces the root.
 */

import type winston from 'winston';
import { LogLevel } from './LogLevel.js';
import { shouldLog } from './componentLevels.js';

export interface LoggerContext {
  root(): winston.Logger;
  globalLevel(): LogLevel;
}

export class Logger {
  constructor(
    private readonly component: string,
    private readonly context: LoggerContext
  ) {}

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.DEBUG, message, undefined, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.INFO, message, undefined, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.WARN, message, undefined, metadata);
  }

  error(message: string, error?: Error, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.ERROR, message, error, metadata);
  }

  private logAt(
    level: LogLevel,
    message: string,
    error?: Error,
    metadata?: Record<string, unknown>
  ): void {
    if (!shouldLog(this.component, level, this.context.globalLevel())) {
      return;
    }

    const meta: Record<string, unknown> = { component: this.component, ...metadata };
    if (error?.stack) {
      meta['errorStack'] = error.stack;
    }
    this.context.root().log(level.toLowerCase(), message, meta);
  }
}
