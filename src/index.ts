/**
 * x12-delimiters
 *
 * Reads the segment terminator, element separator and sub-element separator
 * of an X12 interchange from its ISA header.
 */

export * from './x12/index.js';
export {
  LogLevel,
  getLogger,
  initializeLogging,
  setGlobalLevel,
  setComponentLevel,
  shutdownLogging,
} from './logging/index.js';
export type { LogTransport } from './logging/index.js';
