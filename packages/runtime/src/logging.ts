// Structured loggers
//
// Combat and looting narrate through an injected Logger. Implementations
// can route to console, a capture buffer, or nowhere.

import { LOG_THRESHOLDS, type LogLevel, type LogThreshold } from '@armory/protocol';
import { getConfig } from './config.js';

export type Logger = {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
};

/**
 * Console logger for development
 */
export const consoleLogger: Logger = {
  debug(message: string, data?: Record<string, unknown>) {
    console.debug(`[DEBUG] ${message}`, data ?? '');
  },
  info(message: string, data?: Record<string, unknown>) {
    console.info(`[INFO] ${message}`, data ?? '');
  },
  warn(message: string, data?: Record<string, unknown>) {
    console.warn(`[WARN] ${message}`, data ?? '');
  },
  error(message: string, data?: Record<string, unknown>) {
    console.error(`[ERROR] ${message}`, data ?? '');
  },
};

/**
 * Silent logger for testing
 */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

/**
 * Whether a message at `level` passes `threshold`
 */
export function isLevelEnabled(level: LogLevel, threshold: LogThreshold): boolean {
  return LOG_THRESHOLDS.indexOf(level) >= LOG_THRESHOLDS.indexOf(threshold);
}

/**
 * Console logger that drops entries below a threshold
 */
export function createConsoleLogger(threshold: LogThreshold): Logger {
  const forward =
    (level: LogLevel) =>
    (message: string, data?: Record<string, unknown>): void => {
      if (isLevelEnabled(level, threshold)) {
        consoleLogger[level](message, data);
      }
    };

  return {
    debug: forward('debug'),
    info: forward('info'),
    warn: forward('warn'),
    error: forward('error'),
  };
}

export type LogEntry = {
  level: LogLevel;
  message: string;
  data?: Record<string, unknown>;
  timestamp: string;
};

/**
 * Create a capturing logger that stores log entries for inspection
 */
export function createCapturingLogger(): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];

  const log = (level: LogLevel) => (message: string, data?: Record<string, unknown>) => {
    entries.push({
      level,
      message,
      data,
      timestamp: new Date().toISOString(),
    });
  };

  return {
    entries,
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error'),
  };
}

let defaultLogger: Logger | null = null;

/**
 * Console logger at the configured ARMORY_LOG_LEVEL
 */
export function getDefaultLogger(): Logger {
  if (!defaultLogger) {
    defaultLogger = createConsoleLogger(getConfig().logLevel);
  }
  return defaultLogger;
}
