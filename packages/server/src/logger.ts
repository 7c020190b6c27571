/**
 * Prefixed console logging
 *
 * Level is taken from LOG_LEVEL (debug | info | warn | error | silent), default info.
 *
 * Usage:
 *   import { createLogger } from './logger.js';
 *   const log = createLogger('WMBus');
 *   log.debug('frame', hex);
 *   log.child('Registry').warn('no decoder');
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVELS, value);
}

function levelFromEnv(): LogLevel {
  const raw = process.env.LOG_LEVEL ?? '';
  return isLogLevel(raw) ? raw : 'info';
}

let threshold: LogLevel = levelFromEnv();

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

function enabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return LEVELS[level] >= LEVELS[threshold];
}

function formatMessage(prefix: string, message: string, timestamp: boolean): string {
  const ts = timestamp ? `[${new Date().toISOString()}] ` : '';
  return `${ts}[${prefix}] ${message}`;
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  child(subPrefix: string): Logger;
}

export function createLogger(prefix: string): Logger {
  return {
    debug(message, ...args) {
      if (enabled('debug')) console.debug(formatMessage(prefix, message, false), ...args);
    },

    info(message, ...args) {
      if (enabled('info')) console.info(formatMessage(prefix, message, false), ...args);
    },

    warn(message, ...args) {
      if (enabled('warn')) console.warn(formatMessage(prefix, message, false), ...args);
    },

    // timestamped
    error(message, ...args) {
      if (enabled('error')) console.error(formatMessage(prefix, message, true), ...args);
    },

    child(subPrefix) {
      return createLogger(`${prefix}:${subPrefix}`);
    },
  };
}

export const log = createLogger('Meterbus');
