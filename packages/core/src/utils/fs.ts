/**
 * @module utils/fs
 * File system helpers for the artifact tree.
 */

import fs from 'node:fs';
import path from 'node:path';
import crypto from 'node:crypto';

/** Ensure a directory exists (recursive). */
export function ensureDir(dirPath: string): void {
  fs.mkdirSync(dirPath, { recursive: true });
}

/** ISO timestamp safe for filenames (colons/dots replaced with dashes). */
export function nowStamp(): string {
  return new Date().toISOString().replace(/[:.]/g, '-');
}

/** Run identifier: timestamp plus a short random suffix. */
export function newRunId(): string {
  return `${nowStamp()}-${crypto.randomBytes(3).toString('hex')}`;
}

/**
 * Write a file through a sibling temp file and a rename, so readers only ever
 * see the previous content or the complete new one. Creates parent dirs.
 */
export async function writeFileAtomic(filepath: string, data: string | Uint8Array): Promise<void> {
  ensureDir(path.dirname(filepath));
  const tmp = `${filepath}.${process.pid}.${crypto.randomBytes(4).toString('hex')}.tmp`;
  try {
    await fs.promises.writeFile(tmp, data);
    await fs.promises.rename(tmp, filepath);
  } catch (err) {
    await fs.promises.rm(tmp, { force: true });
    throw err;
  }
}

/** Pretty JSON through {@link writeFileAtomic}. */
export function writeJsonAtomic(filepath: string, data: unknown): Promise<void> {
  return writeFileAtomic(filepath, JSON.stringify(data, null, 2));
}

/** Read and parse a JSON file. Returns `null` if the file is missing or invalid. */
export async function readJsonSafe(filepath: string): Promise<unknown> {
  try {
    return JSON.parse(await fs.promises.readFile(filepath, 'utf8'));
  } catch {
    return null;
  }
}

/** Size in bytes, or 0 when the file does not exist. */
export async function fileSize(filepath: string): Promise<number> {
  try {
    const stat = await fs.promises.stat(filepath);
    return stat.isFile() ? stat.size : 0;
  } catch {
    return 0;
  }
}
