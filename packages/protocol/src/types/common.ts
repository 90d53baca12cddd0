// Common types used across the protocol

/**
 * Identifier issued to a piece of equipment.
 * Unique per equipment category, never reused once issued.
 */
export type Identifier = bigint;

/**
 * Largest identifier any category can be issued (2^63 - 1).
 */
export const MAX_IDENTIFIER: Identifier = (1n << 63n) - 1n;

/**
 * Condition of a piece of equipment.
 * Moves from 'good' to 'destroyed' exactly once and never back.
 */
export type Condition = 'good' | 'destroyed';

/**
 * Severity levels understood by runtime loggers
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Log threshold, 'silent' drops everything
 */
export type LogThreshold = LogLevel | 'silent';

export const LOG_THRESHOLDS: readonly LogThreshold[] = [
  'debug',
  'info',
  'warn',
  'error',
  'silent',
];
