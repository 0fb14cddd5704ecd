import type { AgentError } from '../errors.js';
import type { TokenUsage } from '../types.js';

export interface ProviderStats {
  requests: number;
  failures: number;
  totalLatencyMs: number;
  inputTokens: number;
  outputTokens: number;
  lastError?: { kind: AgentError['kind']; message: string };
  unhealthyReason?: string;
}

const UNHEALTHY_FAILURE_RATE = 0.2;
const MIN_REQUESTS_FOR_RATE = 5;

/**
 * Per-run provider health. Unhealthy providers are skipped by the fallback
 * chain until the run ends; the next run starts from a fresh tracker.
 */
export class ProviderHealth {
  private readonly stats = new Map<string, ProviderStats>();

  private entry(provider: string): ProviderStats {
    let current = this.stats.get(provider);
    if (current === undefined) {
      current = { requests: 0, failures: 0, totalLatencyMs: 0, inputTokens: 0, outputTokens: 0 };
      this.stats.set(provider, current);
    }
    return current;
  }

  recordSuccess(provider: string, latencyMs: number, tokens?: TokenUsage): void {
    const current = this.entry(provider);
    current.requests += 1;
    current.totalLatencyMs += latencyMs;
    if (tokens !== undefined) {
      current.inputTokens += tokens.inputTokens;
      current.outputTokens += tokens.outputTokens;
    }
  }

  recordFailure(provider: string, error: AgentError): void {
    const current = this.entry(provider);
    current.requests += 1;
    current.failures += 1;
    current.lastError = { kind: error.kind, message: error.message };
    if (current.unhealthyReason !== undefined) return;
    if (error.kind === 'empty_response_error') {
      current.unhealthyReason = 'returned an empty response';
    } else if (error.kind === 'api_key_error') {
      current.unhealthyReason = 'authentication failed';
    } else if (current.requests >= MIN_REQUESTS_FOR_RATE && current.failures / current.requests > UNHEALTHY_FAILURE_RATE) {
      current.unhealthyReason = `failure rate ${(100 * current.failures / current.requests).toFixed(0)}% over ${String(current.requests)} requests`;
    }
  }

  isHealthy(provider: string): boolean {
    return this.stats.get(provider)?.unhealthyReason === undefined;
  }

  get(provider: string): Readonly<ProviderStats> | undefined {
    const current = this.stats.get(provider);
    return current !== undefined ? { ...current } : undefined;
  }

  snapshot(): Record<string, ProviderStats> {
    return Object.fromEntries(Array.from(this.stats.entries()).map(([name, value]) => [name, { ...value }]));
  }
}
