/**
 * Log level names and lookup
 *
 * Levels are pino's. Two aliases are accepted on input: `warning` for
 * `warn` and `critical` for `fatal`, and the rendered names use them.
 */

import pino, { type Level } from 'pino';
import { InvalidLevelNameError } from '../errors.js';

export type LogLevel = Level;

const LEVEL_ALIASES: Record<string, LogLevel> = {
  trace: 'trace',
  debug: 'debug',
  info: 'info',
  warn: 'warn',
  warning: 'warn',
  error: 'error',
  fatal: 'fatal',
  critical: 'fatal',
};

const DISPLAY_NAMES: Record<number, string> = {
  10: 'TRACE',
  20: 'DEBUG',
  30: 'INFO',
  40: 'WARNING',
  50: 'ERROR',
  60: 'CRITICAL',
};

/**
 * Check whether a string names a known level (case-insensitive)
 */
export function isLevelName(name: string): boolean {
  return Object.hasOwn(LEVEL_ALIASES, name.trim().toLowerCase());
}

/**
 * Resolve a level name to its pino label
 *
 * @throws InvalidLevelNameError for unknown names
 */
export function parseLevel(name: string): LogLevel {
  const key = name.trim().toLowerCase();
  const level = Object.hasOwn(LEVEL_ALIASES, key) ? LEVEL_ALIASES[key] : undefined;
  if (level === undefined) {
    throw new InvalidLevelNameError(name);
  }
  return level;
}

/**
 * Numeric severity of a level
 */
export function levelValue(level: LogLevel): number {
  return pino.levels.values[level] ?? 0;
}

/**
 * Return whichever of two levels lets more records through
 */
export function mostVerbose(a: LogLevel, b: LogLevel): LogLevel {
  return levelValue(a) <= levelValue(b) ? a : b;
}

/**
 * Name shown in formatted output for a numeric level
 */
export function levelDisplayName(value: number): string {
  return DISPLAY_NAMES[value] ?? `LEVEL${value}`;
}
