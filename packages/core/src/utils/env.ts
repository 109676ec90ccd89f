/**
 * @module utils/env
 * `.env` loader for the CLI entry point.
 */

import fs from 'node:fs';
import path from 'node:path';
import type { EnvSource } from '../config.js';

/**
 * Parse `key=value` lines. Supports # comments, `export` prefixes, quoted
 * values and empty lines.
 */
export function parseDotenv(content: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim().replace(/^export\s+/, '');
    if (!trimmed || trimmed.startsWith('#')) continue;
    const eqIdx = trimmed.indexOf('=');
    if (eqIdx === -1) continue;

    const key = trimmed.slice(0, eqIdx).trim();
    const val = trimmed
      .slice(eqIdx + 1)
      .trim()
      .replace(/^(["'])(.*)\1$/, '$2');
    if (key) out[key] = val;
  }
  return out;
}

/**
 * Load a `.env` file into `target` (process.env by default).
 * Keys already present win. Returns the names of the keys it set.
 */
export function loadDotenv(dir: string = process.cwd(), target: EnvSource = process.env): string[] {
  let content: string;
  try {
    content = fs.readFileSync(path.resolve(dir, '.env'), 'utf8');
  } catch {
    return [];
  }

  const loaded: string[] = [];
  for (const [key, val] of Object.entries(parseDotenv(content))) {
    if (target[key] === undefined) {
      target[key] = val;
      loaded.push(key);
    }
  }
  return loaded;
}
