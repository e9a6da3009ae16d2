/**
 * Logger Factory
 *
 * Owns the root winston logger and the per-component Logger wrappers.
 *
 * Usage:
 *   const logger = getLogger('x12-delimiters');
 *   logger.debug('Delimiters inferred from ISA header');
 *
 * The root is created from the environment on first use; initializeLogging()
 * is only needed to add transports.
 */

import winston from 'winston';
import { LogLevel } from './LogLevel.js';
import { getLoggingConfig } from './config.js';
import { applyDebugComponents, resetComponentLevels } from './componentLevels.js';
import { Logger } from './Logger.js';
import type { LoggerContext } from './Logger.js';
import { ConsoleTransport, FileTransport } from './transports.js';
import type { LogTransport } from './transports.js';

/**
 * Winston uses lower numbers for higher priority: error=0, trace=4.
 */
const WINSTON_LEVELS: Record<string, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

let rootLogger: winston.Logger | null = null;
// null until setGlobalLevel(); the configured LOG_LEVEL applies meanwhile
let globalLevelOverride: LogLevel | null = null;
const loggerCache = new Map<string, Logger>();

const context: LoggerContext = {
  root: () => rootLogger ?? initializeLogging(),
  globalLevel: () => globalLevelOverride ?? getLoggingConfig().logLevel,
};

/**
 * Initialize the logging subsystem. Calling it again replaces the root;
 * loggers handed out earlier write to the new one.
 */
export function initializeLogging(additionalTransports?: LogTransport[]): winston.Logger {
  const config = getLoggingConfig();

  const transports: winston.transport[] = [
    new ConsoleTransport(config.logFormat, config.timestampFormat).createWinstonTransport(),
  ];

  if (config.logFile) {
    transports.push(
      new FileTransport(config.logFile, config.logFormat, config.timestampFormat).createWinstonTransport()
    );
  }

  for (const t of additionalTransports ?? []) {
    transports.push(t.createWinstonTransport());
  }

  if (rootLogger) {
    rootLogger.close();
  }

  // Per-component filtering happens in Logger; the root accepts everything
  rootLogger = winston.createLogger({
    levels: WINSTON_LEVELS,
    level: 'trace',
    transports,
    exitOnError: false,
  });

  applyDebugComponents(config.debugComponents);

  return rootLogger;
}

/**
 * Get (or create) the Logger for a named component.
 */
export function getLogger(component: string): Logger {
  const cached = loggerCache.get(component);
  if (cached) return cached;

  const logger = new Logger(component, context);
  loggerCache.set(component, logger);
  return logger;
}

/**
 * Change the global log level at runtime. Components with an override keep it.
 */
export function setGlobalLevel(level: LogLevel): void {
  globalLevelOverride = level;
}

/**
 * Flush pending writes and close all transports.
 */
export async function shutdownLogging(): Promise<void> {
  const root = rootLogger;
  if (!root) return;

  await new Promise<void>((resolve) => {
    root.on('finish', () => resolve());
    root.end();
  });
  rootLogger = null;
}

/**
 * Drop the root, the global level override and component overrides (for testing).
 * Cached loggers stay valid.
 */
export function resetLogging(): void {
  if (rootLogger) {
    rootLogger.close();
  }
  rootLogger = null;
  globalLevelOverride = null;
  resetComponentLevels();
}
