/**
 * @module utils/args
 * Flag lookup over an argument list (`--flag value` or `--flag=value`).
 */

import { UsageError } from './errors.js';

export function arg(args: readonly string[], flag: string, fallback = ''): string {
  for (let i = 0; i < args.length; i++) {
    const item = args[i];
    if (item === flag) return args[i + 1] ?? fallback;
    if (item.startsWith(`${flag}=`)) return item.slice(flag.length + 1);
  }
  return fallback;
}

export function hasFlag(args: readonly string[], flag: string): boolean {
  return args.some((item) => item === flag || item.startsWith(`${flag}=`));
}

/** A flag holding a positive integer; undefined when the flag is absent. */
export function intFlag(args: readonly string[], flag: string): number | undefined {
  if (!hasFlag(args, flag)) return undefined;
  const raw = arg(args, flag);
  if (!/^\d+$/.test(raw) || Number(raw) <= 0) {
    throw new UsageError(`${flag} expects a positive integer, got "${raw}"`, flag);
  }
  return Number(raw);
}
