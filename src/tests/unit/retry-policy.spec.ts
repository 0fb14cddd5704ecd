import { describe, expect, it } from 'vitest';

import type { RetryEvent } from '../../llm-providers/retry-policy.js';

import { APIKeyError, CancelledError, RetryError, TransientProviderError } from '../../errors.js';
import { DEFAULT_BACKOFF, computeBackoffMs, withRetry } from '../../llm-providers/retry-policy.js';

const recordingSleep = (delays: number[], result: 'completed' | 'aborted' = 'completed') =>
  (ms: number): Promise<'completed' | 'aborted'> => {
    delays.push(ms);
    return Promise.resolve(result);
  };

describe('computeBackoffMs', () => {
  it('grows exponentially from the base delay up to the cap', () => {
    expect([1, 2, 3, 4, 5, 6].map((attempt) => computeBackoffMs(attempt))).toEqual([1000, 2000, 4000, 8000, 16_000, 30_000]);
  });

  it('honours a longer retry-after but never exceeds the cap', () => {
    expect(computeBackoffMs(1, DEFAULT_BACKOFF, 5000)).toBe(5000);
    expect(computeBackoffMs(1, DEFAULT_BACKOFF, 100)).toBe(1000);
    expect(computeBackoffMs(1, DEFAULT_BACKOFF, 120_000)).toBe(30_000);
  });

  it('uses a custom policy', () => {
    expect(computeBackoffMs(3, { baseDelayMs: 10, multiplier: 3, maxDelayMs: 1000 })).toBe(90);
  });
});

describe('withRetry', () => {
  it('retries transient failures with backoff and returns the first success', async () => {
    const delays: number[] = [];
    const events: RetryEvent[] = [];
    let calls = 0;
    const result = await withRetry(() => {
      calls += 1;
      if (calls < 3) return Promise.reject(new TransientProviderError('network', `reset ${String(calls)}`, { provider: 'p' }));
      return Promise.resolve('ok');
    }, { provider: 'p', attempts: 3, sleep: recordingSleep(delays), onAttemptFailed: (event) => { events.push(event); } });
    expect(result).toBe('ok');
    expect(calls).toBe(3);
    expect(delays).toEqual([1000, 2000]);
    expect(events.map((event) => [event.attempt, event.delayMs, event.error.message])).toEqual([[1, 1000, 'reset 1'], [2, 2000, 'reset 2']]);
  });

  it('throws a RetryError listing every failure once attempts run out', async () => {
    const delays: number[] = [];
    const promise = withRetry(() => Promise.reject(new TransientProviderError('timeout', 'slow', { provider: 'p' })), {
      provider: 'p',
      attempts: 3,
      sleep: recordingSleep(delays),
    });
    await expect(promise).rejects.toBeInstanceOf(RetryError);
    await expect(promise).rejects.toMatchObject({ message: 'p: all 3 attempts failed: slow', provider: 'p' });
    const error = await promise.catch((e: unknown) => e);
    expect(error instanceof RetryError ? error.failures.length : 0).toBe(3);
    // no sleep after the final attempt
    expect(delays).toEqual([1000, 2000]);
  });

  it('gives up at once on non-retryable errors', async () => {
    let calls = 0;
    const promise = withRetry(() => {
      calls += 1;
      return Promise.reject(new APIKeyError('bad key', { provider: 'p' }));
    }, { provider: 'p', attempts: 5, sleep: recordingSleep([]) });
    await expect(promise).rejects.toBeInstanceOf(APIKeyError);
    expect(calls).toBe(1);
  });

  it('maps foreign errors before deciding', async () => {
    let calls = 0;
    const promise = withRetry(() => {
      calls += 1;
      return Promise.reject(Object.assign(new Error('unauthorized'), { statusCode: 401 }));
    }, { provider: 'p', attempts: 3, sleep: recordingSleep([]) });
    await expect(promise).rejects.toBeInstanceOf(APIKeyError);
    expect(calls).toBe(1);
  });

  it('always makes at least one attempt', async () => {
    let calls = 0;
    await expect(withRetry(() => {
      calls += 1;
      return Promise.reject(new Error('connection refused'));
    }, { provider: 'p', attempts: 0, sleep: recordingSleep([]) })).rejects.toBeInstanceOf(RetryError);
    expect(calls).toBe(1);
  });

  it('stops with CancelledError when the backoff sleep is interrupted', async () => {
    await expect(withRetry(() => Promise.reject(new Error('connection refused')), {
      provider: 'p',
      attempts: 3,
      sleep: recordingSleep([], 'aborted'),
    })).rejects.toBeInstanceOf(CancelledError);
  });

  it('does not call the operation when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    let calls = 0;
    await expect(withRetry(() => {
      calls += 1;
      return Promise.resolve('never');
    }, { provider: 'p', attempts: 3, abortSignal: controller.signal })).rejects.toBeInstanceOf(CancelledError);
    expect(calls).toBe(0);
  });
});
