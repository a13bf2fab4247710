/**
 * stderr logger for the askai CLI.
 *
 * Lines look like `[askai] debug: spawning claude with 7 arguments`.
 * The threshold comes from resolveLogLevel.
 */

import type { Logger as CoreLogger } from '../logger.js';

/** Ordered from most to least verbose. */
const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const LOG_LEVEL_ENV = 'ASKAI_LOG_LEVEL';

/** Case-insensitive; undefined for anything that is not a level name. */
export function parseLogLevel(value: string): LogLevel | undefined {
  const lower = value.toLowerCase();
  return LOG_LEVELS.find(level => level === lower);
}

/**
 * Threshold for this run: a valid ASKAI_LOG_LEVEL, else debug under
 * --verbose, else info.
 */
export function resolveLogLevel(verbose: boolean): LogLevel {
  const fromEnv = process.env[LOG_LEVEL_ENV];
  const parsed = fromEnv === undefined ? undefined : parseLogLevel(fromEnv);
  return parsed ?? (verbose ? 'debug' : 'info');
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Sink for formatted lines. Defaults to stderr; tests capture here. */
  writeFn?: (line: string) => void;
}

export class Logger implements CoreLogger {
  readonly level: LogLevel;
  private readonly write: (line: string) => void;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.write = options.writeFn ?? (line => process.stderr.write(line));
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level);
  }

  debug(message: string): void {
    this.emit('debug', message);
  }

  info(message: string): void {
    this.emit('info', message);
  }

  warn(message: string): void {
    this.emit('warn', message);
  }

  error(message: string): void {
    this.emit('error', message);
  }

  private emit(level: LogLevel, message: string): void {
    if (!this.isEnabled(level)) return;
    this.write(`[askai] ${level}: ${message}\n`);
  }
}
