import { describe, expect, it, vi } from 'vitest';
import { computeBackoffDelayMs, withRetries } from '../src/retry.js';
import { Semaphore } from '../src/semaphore.js';
import { TimeoutError, withTimeout } from '../src/timeout.js';

class FlakyError extends Error {
  readonly code = 'ECONNRESET';
}

describe('computeBackoffDelayMs', () => {
  const cfg = { attempts: 4, baseDelayMs: 100, maxDelayMs: 250, jitter: 0 };

  it('doubles the delay per attempt up to the cap', () => {
    expect([1, 2, 3, 4].map((attempt) => computeBackoffDelayMs(cfg, attempt))).toEqual([0, 100, 200, 250]);
  });

  it('applies jitter around the delay', () => {
    expect(computeBackoffDelayMs({ ...cfg, jitter: 0.5 }, 2, () => 1)).toBe(150);
    expect(computeBackoffDelayMs({ ...cfg, jitter: 0.5 }, 2, () => 0)).toBe(50);
  });
});

describe('withRetries', () => {
  it('retries retryable failures with backoff', async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new FlakyError('reset'))
      .mockRejectedValueOnce(new FlakyError('reset'))
      .mockResolvedValue('rows');
    const sleep = vi.fn(async () => undefined);
    const onRetry = vi.fn();

    const result = await withRetries(fn, { attempts: 3, baseDelayMs: 10, jitter: 0 }, {
      isRetryable: (err) => err instanceof FlakyError,
      onRetry,
      sleep,
    });

    expect(result).toBe('rows');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[10], [20]]);
    expect(onRetry.mock.calls.map(([, next]) => next)).toEqual([
      { attempt: 2, attempts: 3 },
      { attempt: 3, attempts: 3 },
    ]);
  });

  it('rethrows non-retryable failures immediately', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error('syntax error'));

    await expect(withRetries(fn, { attempts: 5 }, { isRetryable: () => false })).rejects.toThrow('syntax error');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('gives up after the last attempt', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new FlakyError('reset'));

    await expect(
      withRetries(fn, { attempts: 2, baseDelayMs: 0 }, { isRetryable: () => true })
    ).rejects.toBeInstanceOf(FlakyError);
    expect(fn).toHaveBeenCalledTimes(2);
  });
});

describe('withTimeout', () => {
  it('rejects when the promise does not settle in time', async () => {
    const never = new Promise<string>(() => undefined);

    await expect(withTimeout(never, 10)).rejects.toThrow(new TimeoutError('Operation timed out after 10ms'));
  });

  it('uses the supplied error factory', async () => {
    const never = new Promise<string>(() => undefined);

    await expect(withTimeout(never, 10, () => new Error('describe timed out'))).rejects.toThrow('describe timed out');
  });

  it('passes results through when disabled', async () => {
    await expect(withTimeout(Promise.resolve(42), 0)).resolves.toBe(42);
    await expect(withTimeout(Promise.resolve(42), undefined)).resolves.toBe(42);
  });
});

describe('Semaphore', () => {
  it('queues work beyond the concurrency limit', async () => {
    const semaphore = new Semaphore(1);
    let releaseFirst: () => void = () => undefined;
    const order: string[] = [];

    const first = semaphore.run(
      () =>
        new Promise<void>((resolve) => {
          releaseFirst = () => {
            order.push('first');
            resolve();
          };
        })
    );
    const second = semaphore.run(async () => {
      order.push('second');
    });

    expect(semaphore.inFlight).toBe(1);
    expect(semaphore.queueDepth).toBe(1);

    await new Promise((resolve) => setTimeout(resolve, 0));
    releaseFirst();
    await Promise.all([first, second]);

    expect(order).toEqual(['first', 'second']);
    expect(semaphore.inFlight).toBe(0);
    expect(semaphore.queueDepth).toBe(0);
  });

  it('rejects a non-positive limit', () => {
    expect(() => new Semaphore(0)).toThrow('Semaphore maxConcurrency must be >= 1 (got 0)');
  });
});
