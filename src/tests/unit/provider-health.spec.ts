import { describe, expect, it } from 'vitest';

import { APIKeyError, EmptyResponseError, TransientProviderError } from '../../errors.js';
import { ProviderHealth } from '../../llm-providers/provider-health.js';

const transient = (): TransientProviderError => new TransientProviderError('network', 'reset', { provider: 'p' });

describe('ProviderHealth', () => {
  it('treats unknown providers as healthy', () => {
    expect(new ProviderHealth().isHealthy('anything')).toBe(true);
  });

  it('accumulates latency and tokens', () => {
    const health = new ProviderHealth();
    health.recordSuccess('p', 100, { inputTokens: 10, outputTokens: 4, totalTokens: 14 });
    health.recordSuccess('p', 50);
    expect(health.get('p')).toEqual({ requests: 2, failures: 0, totalLatencyMs: 150, inputTokens: 10, outputTokens: 4 });
  });

  it('marks a provider unhealthy after an empty response', () => {
    const health = new ProviderHealth();
    health.recordFailure('p', new EmptyResponseError('nothing', { provider: 'p' }));
    expect(health.isHealthy('p')).toBe(false);
    expect(health.get('p')?.unhealthyReason).toBe('returned an empty response');
  });

  it('marks a provider unhealthy after an authentication failure', () => {
    const health = new ProviderHealth();
    health.recordFailure('p', new APIKeyError('bad key', { provider: 'p' }));
    expect(health.get('p')?.unhealthyReason).toBe('authentication failed');
  });

  it('tolerates a 20% failure rate and trips above it', () => {
    const health = new ProviderHealth();
    [1, 2, 3, 4].forEach(() => { health.recordSuccess('p', 1); });
    health.recordFailure('p', transient());
    expect(health.isHealthy('p')).toBe(true);
    health.recordFailure('p', transient());
    expect(health.isHealthy('p')).toBe(false);
    expect(health.get('p')?.unhealthyReason).toBe('failure rate 33% over 6 requests');
  });

  it('needs a minimum number of requests before judging the rate', () => {
    const health = new ProviderHealth();
    [1, 2, 3, 4].forEach(() => { health.recordFailure('p', transient()); });
    expect(health.isHealthy('p')).toBe(true);
    health.recordFailure('p', transient());
    expect(health.isHealthy('p')).toBe(false);
    expect(health.get('p')?.lastError).toEqual({ kind: 'transient_error', message: 'reset' });
  });

  it('snapshots are detached copies', () => {
    const health = new ProviderHealth();
    health.recordSuccess('p', 5);
    const snapshot = health.snapshot();
    health.recordSuccess('p', 5);
    expect(snapshot.p.requests).toBe(1);
  });
});
