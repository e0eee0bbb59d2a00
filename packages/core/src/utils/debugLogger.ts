/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = [
  'debug',
  'info',
  'warn',
  'error',
  'silent',
];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * A simple, centralized logger for developer-facing debug messages.
 *
 * This is a thin wrapper around the native `console` object. Every level is
 * written to stderr: stdout belongs to the result envelope, which callers
 * parse.
 */
class DebugLogger {
  private level: LogLevel = DebugLogger.levelFromEnv();

  private static levelFromEnv(): LogLevel {
    const debug = process.env['DEBUG'];
    if (debug === '1' || debug === 'true') {
      return 'debug';
    }
    const fromEnv = process.env['PLAINEDIT_LOG_LEVEL']?.toLowerCase();
    return fromEnv && isLogLevel(fromEnv) ? fromEnv : 'warn';
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  log(...args: unknown[]): void {
    if (this.enabled('info')) {
      console.error(...args);
    }
  }

  warn(...args: unknown[]): void {
    if (this.enabled('warn')) {
      console.warn(...args);
    }
  }

  error(...args: unknown[]): void {
    if (this.enabled('error')) {
      console.error(...args);
    }
  }

  debug(...args: unknown[]): void {
    if (this.enabled('debug')) {
      console.error('[DEBUG]', ...args);
    }
  }
}

export const debugLogger = new DebugLogger();
