/**
 * @module ui/logger
 * Core `Logger` rendered through @clack/prompts, so pipeline log lines share
 * the terminal with the spinner.
 */

import * as clack from '@clack/prompts';
import type { Logger } from '@article2video/core';

function render(msg: string, args: unknown[]): string {
  if (args.length === 0) return msg;
  return [msg, ...args.map((a) => (a instanceof Error ? a.message : typeof a === 'string' ? a : JSON.stringify(a)))].join(' ');
}

export class ClackLogger implements Logger {
  /** `verbose` shows info and debug lines; warnings and errors always show. */
  constructor(private readonly verbose = false) { }

  debug(msg: string, ...args: unknown[]): void {
    if (this.verbose) clack.log.message(render(msg, args));
  }
  info(msg: string, ...args: unknown[]): void {
    if (this.verbose) clack.log.info(render(msg, args));
  }
  warn(msg: string, ...args: unknown[]): void {
    clack.log.warn(render(msg, args));
  }
  error(msg: string, ...args: unknown[]): void {
    clack.log.error(render(msg, args));
  }
}
