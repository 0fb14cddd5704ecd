import type { SleepFn } from '../utils.js';

import { AgentError, CancelledError, RetryError, TransientProviderError, isNonRetryable } from '../errors.js';
import { sleepWithAbort } from '../utils.js';

import { mapProviderError } from './llm-error-mapping.js';

export interface BackoffPolicy {
  baseDelayMs: number;
  multiplier: number;
  maxDelayMs: number;
}

export const DEFAULT_BACKOFF: Readonly<BackoffPolicy> = Object.freeze({
  baseDelayMs: 1000,
  multiplier: 2,
  maxDelayMs: 30_000,
});

/**
 * Delay to wait after `failedAttempt` (1-based) before the next one.
 * A larger provider-supplied retry-after wins, still capped.
 */
export function computeBackoffMs(failedAttempt: number, policy: Readonly<BackoffPolicy> = DEFAULT_BACKOFF, retryAfterMs?: number): number {
  const exponent = Math.max(0, failedAttempt - 1);
  const scheduled = policy.baseDelayMs * policy.multiplier ** exponent;
  const wanted = retryAfterMs !== undefined && retryAfterMs > scheduled ? retryAfterMs : scheduled;
  return Math.min(policy.maxDelayMs, wanted);
}

export interface RetryEvent {
  provider: string;
  attempt: number;
  delayMs: number;
  error: AgentError;
}

export interface RetryOptions {
  provider: string;
  attempts: number;
  backoff?: Readonly<BackoffPolicy>;
  sleep?: SleepFn;
  abortSignal?: AbortSignal;
  onAttemptFailed?: (event: RetryEvent) => void;
}

/**
 * Run `operation` up to `attempts` times. Retriable failures back off and
 * try again; a non-retriable failure is thrown as-is at once. When every
 * attempt fails the caller gets a RetryError listing each failure in order.
 */
export async function withRetry<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const attempts = Math.max(1, Math.trunc(options.attempts));
  const sleep = options.sleep ?? sleepWithAbort;
  const failures: AgentError[] = [];
  // eslint-disable-next-line functional/no-loop-statements
  for (let attempt = 1; attempt <= attempts; attempt++) {
    if (options.abortSignal?.aborted === true) {
      throw new CancelledError();
    }
    try {
      return await operation(attempt);
    } catch (error) {
      const mapped = mapProviderError(error, options.provider);
      if (mapped.kind === 'cancelled' || isNonRetryable(mapped)) {
        throw mapped;
      }
      failures.push(mapped);
      const last = attempt === attempts;
      const delayMs = last
        ? 0
        : computeBackoffMs(attempt, options.backoff, mapped instanceof TransientProviderError ? mapped.retryAfterMs : undefined);
      options.onAttemptFailed?.({ provider: options.provider, attempt, delayMs, error: mapped });
      if (last) break;
      const slept = await sleep(delayMs, options.abortSignal);
      if (slept === 'aborted') {
        throw new CancelledError();
      }
    }
  }
  const lastFailure = failures.at(-1);
  throw new RetryError(
    `${options.provider}: all ${String(attempts)} attempts failed${lastFailure !== undefined ? `: ${lastFailure.message}` : ''}`,
    failures,
    { provider: options.provider }
  );
}
