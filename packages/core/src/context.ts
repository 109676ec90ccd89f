/**
 * @module context
 * What every collaborator receives on each call: configuration, the run's
 * identity, a logger, progress events and the cancellation signal.
 */

import type { PipelineConfig } from './config.js';
import type { PipelineEmitter } from './events.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(msg: string, ...args: unknown[]): void;
  info(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  error(msg: string, ...args: unknown[]): void;
}

const WRITERS: Record<LogLevel, (...data: unknown[]) => void> = {
  debug: (...data) => console.debug(...data),
  info: (...data) => console.info(...data),
  warn: (...data) => console.warn(...data),
  error: (...data) => console.error(...data),
};

/** Writes `[level] [scope] message` to the console; debug lines only when enabled. */
export class ConsoleLogger implements Logger {
  constructor(
    private readonly debugEnabled = false,
    private readonly scope = '',
  ) { }

  /** Nested scopes read `parent:child`. */
  child(scope: string): ConsoleLogger {
    return new ConsoleLogger(this.debugEnabled, this.scope ? `${this.scope}:${scope}` : scope);
  }

  debug(msg: string, ...args: unknown[]): void {
    if (this.debugEnabled) this.write('debug', msg, args);
  }

  info(msg: string, ...args: unknown[]): void {
    this.write('info', msg, args);
  }

  warn(msg: string, ...args: unknown[]): void {
    this.write('warn', msg, args);
  }

  error(msg: string, ...args: unknown[]): void {
    this.write('error', msg, args);
  }

  private write(level: LogLevel, msg: string, args: unknown[]): void {
    const tag = `[${level}]`.padEnd(7);
    const scope = this.scope ? `[${this.scope}] ` : '';
    WRITERS[level](`${tag} ${scope}${msg}`, ...args);
  }
}

const noop = (): void => { };

export const silentLogger: Logger = { debug: noop, info: noop, warn: noop, error: noop };

export interface PipelineContext {
  readonly config: PipelineConfig;
  readonly emitter: PipelineEmitter;
  readonly runId: string;
  /** Aborted when the caller cancels the run; pass it to every request and child process. */
  readonly signal: AbortSignal;
  readonly logger: Logger;
}

/** A context scoped to one resolved article and its artifact directory. */
export interface StageContext extends PipelineContext {
  readonly articleId: number;
  readonly artifactDir: string;
}
