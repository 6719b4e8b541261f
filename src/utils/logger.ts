/**
 * Leveled logger that writes to stderr.
 *
 * stdout carries the MCP stdio transport, so nothing here may write to it.
 */

import type { LogLevel } from '../types.js';

export interface ILogger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, error?: unknown, data?: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

type Sink = (line: string) => void;

export class Logger implements ILogger {
  private level: LogLevel;
  private prefix: string;
  private sink: Sink;

  constructor(options: { level?: LogLevel; prefix?: string; sink?: Sink } = {}) {
    this.level = options.level ?? 'info';
    this.prefix = options.prefix ?? 'lorebinder';
    this.sink = options.sink ?? (line => console.error(line));
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Derive a logger whose lines carry an extra scope, e.g. [lorebinder:merge]
   */
  child(scope: string): Logger {
    return new Logger({ level: this.level, prefix: `${this.prefix}:${scope}`, sink: this.sink });
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.write('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write('warn', message, data);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    const errorData = error === undefined
      ? data
      : { ...data, error: error instanceof Error ? error.message : String(error) };
    this.write('error', message, errorData);
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;
    const suffix = data && Object.keys(data).length > 0 ? ` ${JSON.stringify(data)}` : '';
    this.sink(`[${this.prefix}] ${level.toUpperCase()} ${message}${suffix}`);
  }
}

/**
 * Logger that discards everything. Default for library callers.
 */
export const silentLogger: ILogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

let rootLogger: Logger | null = null;

export function getLogger(): Logger {
  if (!rootLogger) {
    rootLogger = new Logger();
  }
  return rootLogger;
}

export function resetLogger(): void {
  rootLogger = null;
}
