/**
 * @module utils/shell
 * Async process execution with timeout and abort signal.
 *
 * Commands are spawned with an argument array (no shell, no quoting), so
 * artifact paths with spaces or quotes pass through untouched.
 */

import { spawn } from 'node:child_process';

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface CommandOptions {
  /** Working directory. Default: process.cwd() */
  cwd?: string;
  /** Timeout in ms. Default: 300_000 (5 min). Use 0 for no timeout. */
  timeoutMs?: number;
  /** AbortSignal for cancellation. */
  signal?: AbortSignal;
}

/** Signature shared by {@link runCommand} and the stand-ins used in tests. */
export type CommandRunner = (
  bin: string,
  args: string[],
  opts?: CommandOptions,
) => Promise<CommandResult>;

/**
 * Run a command and collect its output.
 * Resolves even on non-zero exit code (check result.exitCode); a command killed
 * by the timeout resolves with exit code 124.
 * Rejects only on signal abort or spawn failure.
 */
export const runCommand: CommandRunner = (bin, args, opts = {}) => {
  const { cwd, timeoutMs = 300_000, signal } = opts;

  return new Promise<CommandResult>((resolve, reject) => {
    if (signal?.aborted) {
      return reject(new Error(`Command aborted before start: ${bin}`));
    }

    const child = spawn(bin, args, { cwd, stdio: ['ignore', 'pipe', 'pipe'] });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let killed = false;

    const kill = () => {
      killed = true;
      child.kill('SIGTERM');
      setTimeout(() => { if (child.exitCode === null) child.kill('SIGKILL'); }, 5000).unref();
    };

    const timer = timeoutMs > 0 ? setTimeout(kill, timeoutMs) : undefined;
    signal?.addEventListener('abort', kill, { once: true });

    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

    child.on('error', (err) => {
      if (timer) clearTimeout(timer);
      signal?.removeEventListener('abort', kill);
      reject(err);
    });

    child.on('close', (code, sig) => {
      if (timer) clearTimeout(timer);
      signal?.removeEventListener('abort', kill);

      if (signal?.aborted) {
        return reject(new Error(`Command aborted: ${bin}`));
      }

      resolve({
        stdout: Buffer.concat(stdout).toString('utf8'),
        stderr: Buffer.concat(stderr).toString('utf8'),
        exitCode: killed || sig ? 124 : code ?? 0,
      });
    });
  });
};

/** Run a command through `runner` and throw if the exit code is non-zero. */
export async function runStrict(
  runner: CommandRunner,
  bin: string,
  args: string[],
  opts: CommandOptions = {},
): Promise<CommandResult> {
  const result = await runner(bin, args, opts);
  if (result.exitCode !== 0) {
    throw new Error(
      `Command failed (exit ${result.exitCode}): ${bin} ${args.join(' ')}\nstderr: ${result.stderr.slice(-500)}`,
    );
  }
  return result;
}

/** Check if a CLI tool is available on PATH. */
export async function hasCommand(name: string, runner: CommandRunner = runCommand): Promise<boolean> {
  try {
    const result = await runner(name, ['-version'], { timeoutMs: 5000 });
    return result.exitCode === 0;
  } catch {
    return false;
  }
}
