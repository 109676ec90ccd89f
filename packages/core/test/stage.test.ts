import { describe, expect, it } from 'vitest';
import {
  RunInProgressError,
  RunLock,
  TransientAPIError,
  UpstreamAPIError,
  executeWithRetry,
  isTransientStatus,
} from '../src/index.js';

const signal = new AbortController().signal;

describe('executeWithRetry', () => {
  it('retries transient errors until the call succeeds', async () => {
    let calls = 0;
    const events: string[] = [];

    const value = await executeWithRetry(
      async () => {
        calls++;
        if (calls < 3) throw new TransientAPIError('HTTP 503', 503);
        return 'ok';
      },
      { maxAttempts: 3, backoffMs: 0 },
      signal,
      {
        onAttempt: (attempt) => events.push(`attempt ${attempt}`),
        onError: (error, willRetry) => events.push(`${error.message} retry=${willRetry}`),
      },
    );

    expect(value).toBe('ok');
    expect(events).toEqual([
      'attempt 1',
      'HTTP 503 retry=true',
      'attempt 2',
      'HTTP 503 retry=true',
      'attempt 3',
    ]);
  });

  it('gives up after the last attempt', async () => {
    let calls = 0;
    await expect(
      executeWithRetry(
        async () => {
          calls++;
          throw new TransientAPIError('HTTP 429', 429);
        },
        { maxAttempts: 2, backoffMs: 0 },
        signal,
      ),
    ).rejects.toThrow('HTTP 429');
    expect(calls).toBe(2);
  });

  it('does not retry other errors', async () => {
    let calls = 0;
    await expect(
      executeWithRetry(
        async () => {
          calls++;
          throw new UpstreamAPIError('HTTP 400', 400);
        },
        { maxAttempts: 5, backoffMs: 0 },
        signal,
      ),
    ).rejects.toBeInstanceOf(UpstreamAPIError);
    expect(calls).toBe(1);
  });
});

describe('isTransientStatus', () => {
  it('treats 429 and 5xx as transient', () => {
    expect([400, 404, 429, 500, 503].map(isTransientStatus)).toEqual([false, false, true, true, true]);
  });
});

describe('RunLock', () => {
  it('admits one holder per article', () => {
    const lock = new RunLock();
    const release = lock.acquire(123);

    expect(() => lock.acquire(123)).toThrow(RunInProgressError);
    const other = lock.acquire(124);

    release();
    release();
    expect(lock.isHeld(123)).toBe(false);
    expect(lock.isHeld(124)).toBe(true);
    other();
    lock.acquire(123)();
  });
});
