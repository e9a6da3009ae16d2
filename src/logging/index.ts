export { LogLevel, parseLogLevel, shouldDisplayLogLevel } from './LogLevel.js';
export { Logger } from './Logger.js';
export { initializeLogging, getLogger, setGlobalLevel, shutdownLogging, resetLogging } from './LoggerFactory.js';
export { setComponentLevel, getEffectiveLevel, applyDebugComponents } from './componentLevels.js';
export { getLoggingConfig, resetLoggingConfig } from './config.js';
export type { LoggingConfiguration, LogFormat, TimestampFormat } from './config.js';
export { ConsoleTransport, FileTransport, formatLocalTimestamp, formatTextLine } from './transports.js';
export type { LogTransport } from './transports.js';
