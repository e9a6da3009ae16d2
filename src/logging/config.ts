/**
 * Logging configuration, read from the environment through a zod schema.
 * Cached after the first read; resetLoggingConfig() drops the cache.
 */

import { z } from 'zod';
import { LogLevel, parseLogLevel } from './LogLevel.js';

export type LogFormat = 'text' | 'json';
export type TimestampFormat = 'local' | 'iso';

export const loggingEnvSchema = z.object({
  LOG_LEVEL: z
    .string()
    .optional()
    .transform((val): LogLevel => parseLogLevel(val ?? 'INFO')),
  // name[:LEVEL] entries, comma-separated
  X12_DEBUG_COMPONENTS: z
    .string()
    .optional()
    .transform((val) =>
      (val ?? '')
        .split(',')
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0)
    ),
  LOG_FORMAT: z
    .string()
    .optional()
    .transform((val): LogFormat => (val === 'json' ? 'json' : 'text')),
  LOG_FILE: z
    .string()
    .optional()
    .transform((val) => (val ? val : undefined)),
  LOG_TIMESTAMP_FORMAT: z
    .string()
    .optional()
    .transform((val): TimestampFormat => (val === 'iso' ? 'iso' : 'local')),
});

export interface LoggingConfiguration {
  logLevel: LogLevel;
  debugComponents: string[];
  logFormat: LogFormat;
  logFile?: string;
  timestampFormat: TimestampFormat;
}

let cachedConfig: LoggingConfiguration | null = null;

export function getLoggingConfig(): LoggingConfiguration {
  if (cachedConfig) return cachedConfig;

  const env = loggingEnvSchema.parse(process.env);
  cachedConfig = {
    logLevel: env.LOG_LEVEL,
    debugComponents: env.X12_DEBUG_COMPONENTS,
    logFormat: env.LOG_FORMAT,
    logFile: env.LOG_FILE,
    timestampFormat: env.LOG_TIMESTAMP_FORMAT,
  };
  return cachedConfig;
}

export function resetLoggingConfig(): void {
  cachedConfig = null;
}
