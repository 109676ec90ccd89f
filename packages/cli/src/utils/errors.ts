/**
 * @module utils/errors
 * Errors raised by the command surface itself.
 *
 * Pipeline failures come back as failed runs; these cover what goes wrong
 * before a run starts.
 */

/** Bad command-line input. The entry point prints the message and exits with 2. */
export class UsageError extends Error {
  /** The flag or argument at fault. */
  readonly flag: string;

  constructor(message: string, flag: string) {
    super(message);
    this.name = 'UsageError';
    this.flag = flag;
  }
}
