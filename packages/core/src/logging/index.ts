/**
 * @wanwatch/core - Logging
 *
 * One pino root logger for the daemon. Severity is a closed, ordered union so
 * an unknown level can only enter through configuration, where it is rejected.
 */

import pino from 'pino';
import { ConfigError } from '../errors.js';

// ---------------------------------------------------------------------------
// Severity
// ---------------------------------------------------------------------------

export const SEVERITIES = ['debug', 'info', 'warn', 'error'] as const;

export type Severity = (typeof SEVERITIES)[number];

const SEVERITY_NAMES: readonly string[] = SEVERITIES;

export function isSeverity(value: unknown): value is Severity {
  return typeof value === 'string' && SEVERITY_NAMES.includes(value);
}

/**
 * Parse a level name (case-insensitive). Throws ConfigError for anything
 * outside the four known severities.
 */
export function parseSeverity(value: string): Severity {
  const normalised = value.trim().toLowerCase();
  if (!isSeverity(normalised)) {
    throw new ConfigError(`Unknown log level "${value}"`, [
      `logLevel must be one of ${SEVERITIES.join(', ')}`,
    ]);
  }
  return normalised;
}

// ---------------------------------------------------------------------------
// Logger
// ---------------------------------------------------------------------------

/** The part of pino's logger that components call. */
export type Logger = Pick<pino.Logger, 'debug' | 'info' | 'warn' | 'error'>;

const root = pino({ name: 'wanwatch', level: 'info' });

/**
 * Set the root level. Call before building components: pino children copy
 * the level at creation time.
 */
export function setLogLevel(level: Severity): void {
  root.level = level;
}

/** Child logger tagged with the module that owns it. */
export function createLogger(module: string): pino.Logger {
  return root.child({ module });
}

/** The root logger, for fatal reporting in the entry point. */
export const rootLogger: pino.Logger = root;
