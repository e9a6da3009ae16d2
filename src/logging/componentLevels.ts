/**
 * Per-component level overrides, so "x12-delimiters" can log at DEBUG while
 * everything else stays at the global level.
 */

import { LogLevel, parseLogLevel, shouldDisplayLogLevel } from './LogLevel.js';

const overrides = new Map<string, LogLevel>();

export function setComponentLevel(component: string, level: LogLevel): void {
  overrides.set(component, level);
}

export function getEffectiveLevel(component: string, globalLevel: LogLevel): LogLevel {
  return overrides.get(component) ?? globalLevel;
}

export function shouldLog(component: string, level: LogLevel, globalLevel: LogLevel): boolean {
  return shouldDisplayLogLevel(level, getEffectiveLevel(component, globalLevel));
}

/**
 * Apply entries like "x12-delimiters" or "cli:TRACE". A bare name means DEBUG.
 */
export function applyDebugComponents(entries: string[]): void {
  for (const entry of entries) {
    const colonIndex = entry.lastIndexOf(':');
    if (colonIndex > 0) {
      setComponentLevel(entry.substring(0, colonIndex), parseLogLevel(entry.substring(colonIndex + 1)));
    } else {
      setComponentLevel(entry, LogLevel.DEBUG);
    }
  }
}

export function resetComponentLevels(): void {
  overrides.clear();
}
