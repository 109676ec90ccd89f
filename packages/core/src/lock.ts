/**
 * @module lock
 * At most one run per article id inside this process.
 */

import { RunInProgressError } from './errors.js';

export type ReleaseFn = () => void;

export class RunLock {
  private readonly held = new Set<number>();

  /** Take the lock or throw {@link RunInProgressError}. The returned release is idempotent. */
  acquire(articleId: number): ReleaseFn {
    if (this.held.has(articleId)) throw new RunInProgressError(articleId);
    this.held.add(articleId);
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.held.delete(articleId);
    };
  }

  isHeld(articleId: number): boolean {
    return this.held.has(articleId);
  }
}
