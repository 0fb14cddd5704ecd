import { z } from 'zod';

import type { BackoffPolicy } from './retry-policy.js';
import type { ChunkCallback, Completion, LLMProvider, LogCallback, LogEntry, Message, ProviderConfig, ProviderKind, StepKind } from '../types.js';
import type { SleepFn } from '../utils.js';

import { APIKeyError, AgentError, CancelledError, ConfigError, EmptyResponseError, RetryError, TemperatureError, isNonRetryable } from '../errors.js';
import { toProviderPayload } from '../messages.js';
import { previewText } from '../utils.js';

import { AnthropicProvider } from './anthropic.js';
import { GoogleProvider } from './google.js';
import { mapProviderError } from './llm-error-mapping.js';
import { assertKnownModel, defaultModelFor } from './model-catalog.js';
import { OllamaProvider } from './ollama.js';
import { OpenAIProvider } from './openai.js';
import { ProviderHealth } from './provider-health.js';
import { DEFAULT_BACKOFF, withRetry } from './retry-policy.js';
import { TestLLMProvider } from './test-llm.js';

export type ProviderBuilder = (name: string, config: ProviderConfig, tracedFetch?: typeof fetch) => LLMProvider;

export type ProviderConfigSchema = z.ZodType<ProviderConfig, z.ZodTypeDef, unknown>;

export interface ProviderRegistration {
  name: string;
  kind: ProviderKind;
  builder: ProviderBuilder;
  schema: ProviderConfigSchema;
  defaults: Readonly<Partial<ProviderConfig>>;
}

export const baseProviderConfigSchema = z.object({
  model: z.string().min(1),
  temperature: z.number().min(0).max(1),
  maxTokens: z.number().int().positive(),
  timeoutMs: z.number().int().positive(),
  retryCount: z.number().int().nonnegative(),
  apiKey: z.string().min(1).optional(),
  baseUrl: z.string().url().optional(),
}).strict();

const hostedProviderConfigSchema = baseProviderConfigSchema.extend({
  apiKey: z.string().min(1),
});

export const PROVIDER_SCHEMAS: Readonly<Record<ProviderKind, ProviderConfigSchema>> = {
  google: hostedProviderConfigSchema,
  openai: hostedProviderConfigSchema,
  anthropic: hostedProviderConfigSchema,
  ollama: baseProviderConfigSchema,
  'test-llm': baseProviderConfigSchema,
};

export const PROVIDER_BUILDERS: Readonly<Record<ProviderKind, ProviderBuilder>> = {
  google: (name, config, tracedFetch) => new GoogleProvider(name, config, tracedFetch),
  openai: (name, config, tracedFetch) => new OpenAIProvider(name, config, tracedFetch),
  anthropic: (name, config, tracedFetch) => new AnthropicProvider(name, config, tracedFetch),
  ollama: (name, config, tracedFetch) => new OllamaProvider(name, config, tracedFetch),
  'test-llm': (name, config) => new TestLLMProvider(name, config),
};

export const PROVIDER_KINDS: readonly ProviderKind[] = ['google', 'openai', 'anthropic', 'ollama', 'test-llm'];

export const isProviderKind = (value: string): value is ProviderKind => PROVIDER_KINDS.some((kind) => kind === value);

export const DEFAULT_PROVIDER_SETTINGS: Readonly<Omit<ProviderConfig, 'model' | 'apiKey' | 'baseUrl'>> = Object.freeze({
  temperature: 0.7,
  maxTokens: 2048,
  timeoutMs: 60_000,
  retryCount: 3,
});

export interface ProviderFactoryOptions {
  sleep?: SleepFn;
  backoff?: Readonly<BackoffPolicy>;
  onLog?: LogCallback;
  traceLLM?: boolean;
}

export interface FallbackOptions {
  health?: ProviderHealth;
  overrides?: Readonly<Partial<ProviderConfig>>;
  abortSignal?: AbortSignal;
  onLog?: LogCallback;
  runId?: string;
  step?: StepKind;
}

export interface StreamFallbackOptions extends FallbackOptions {
  onChunk?: ChunkCallback;
}

export interface FallbackResult {
  completion: Completion;
  // one entry per provider that gave up before the successful one
  failures: AgentError[];
}

const REDACTED_HEADERS = new Set(['authorization', 'x-api-key', 'api-key', 'x-goog-api-key']);

const configFieldOf = (issue: z.ZodIssue): string => {
  if (issue.code === 'unrecognized_keys') return issue.keys.join(', ');
  const head = issue.path[0];
  return head !== undefined ? String(head) : 'config';
};

/**
 * Registry of provider variants plus the retry and fallback policy that
 * sits between the workflow and the backing services. Registrations are
 * fixed once the factory is sealed; the active provider is one reference
 * that `setActive()` swaps only after the new one validated.
 */
export class ProviderFactory {
  private readonly registrations = new Map<string, ProviderRegistration>();
  private readonly instances = new Map<string, LLMProvider>();
  private activeProvider?: LLMProvider;
  private sealed = false;
  private readonly options: ProviderFactoryOptions;

  constructor(options: ProviderFactoryOptions = {}) {
    this.options = options;
  }

  register(name: string, kind: ProviderKind, opts: { builder?: ProviderBuilder; schema?: ProviderConfigSchema; defaults?: Partial<ProviderConfig> } = {}): void {
    if (this.sealed) {
      throw new ConfigError(`provider registry is sealed; cannot register '${name}'`, { field: 'name' });
    }
    if (name.trim().length === 0) {
      throw new ConfigError('provider name cannot be empty', { field: 'name' });
    }
    const schema = opts.schema ?? PROVIDER_SCHEMAS[kind];
    const existing = this.registrations.get(name);
    if (existing !== undefined) {
      if (existing.schema === schema && existing.kind === kind) return;
      throw new ConfigError(`provider '${name}' is already registered with a different schema`, { field: 'name' });
    }
    this.registrations.set(name, {
      name,
      kind,
      builder: opts.builder ?? PROVIDER_BUILDERS[kind],
      schema,
      defaults: Object.freeze({ ...(opts.defaults ?? {}) }),
    });
  }

  /** Freeze the registration table; later register() calls fail. */
  seal(): void {
    this.sealed = true;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  has(name: string): boolean {
    return this.registrations.has(name);
  }

  list(): ProviderRegistration[] {
    return Array.from(this.registrations.values());
  }

  /**
   * Validate `config` (merged over the registration defaults) and build a
   * provider. Nothing in the factory changes when validation fails.
   */
  create(name: string, config: unknown = {}): LLMProvider {
    const registration = this.registrationFor(name);
    const validated = this.validate(registration, config);
    return registration.builder(name, validated, this.tracedFetchFor(name));
  }

  /** Provider used by fallback chains for `name`; built from defaults on first use. */
  resolve(name: string): LLMProvider {
    const cached = this.instances.get(name);
    if (cached !== undefined) return cached;
    const created = this.create(name);
    this.instances.set(name, created);
    return created;
  }

  /** Create with `config` and keep the instance for fallback chains. */
  configure(name: string, config: unknown): LLMProvider {
    const created = this.create(name, config);
    this.instances.set(name, created);
    return created;
  }

  getActive(): LLMProvider {
    if (this.activeProvider === undefined) {
      throw new ConfigError('no active provider selected', { field: 'provider' });
    }
    return this.activeProvider;
  }

  setActive(name: string, config?: unknown): LLMProvider {
    const next = config !== undefined ? this.configure(name, config) : this.resolve(name);
    this.activeProvider = next;
    return next;
  }

  /**
   * The configuration a call on `name` would use with `overrides` applied.
   * Runs the same validation as create(), so callers can reject bad
   * overrides before any provider call.
   */
  callConfig(name: string, overrides: Readonly<Partial<ProviderConfig>> = {}): ProviderConfig {
    const provider = this.resolve(name);
    const registration = this.registrationFor(name);
    const applied = Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined));
    if (Object.keys(applied).length === 0) return { ...provider.config };
    return this.validate(registration, { ...provider.config, ...applied }, false);
  }

  async generateWithFallback(messages: readonly Message[], chain: readonly string[], opts: FallbackOptions = {}): Promise<FallbackResult> {
    return await this.runChain(chain, opts, async (provider, config, attempt) => {
      this.logCall(opts, 'VRB', 'request', provider, config, `messages ${String(messages.length)}, ${String(payloadBytes(messages))} bytes, attempt ${String(attempt)}`);
      const completion = await provider.generate(messages, config, { abortSignal: opts.abortSignal });
      if (completion.text.trim().length === 0) {
        throw new EmptyResponseError(`${provider.name}: provider returned an empty completion`, { provider: provider.name });
      }
      return completion;
    });
  }

  /**
   * Like generateWithFallback, forwarding chunks as they arrive. A throwing
   * `onChunk` stops the chain and its error reaches the caller unchanged.
   */
  async streamWithFallback(messages: readonly Message[], chain: readonly string[], opts: StreamFallbackOptions = {}): Promise<FallbackResult> {
    let callbackFailure: { error: unknown } | undefined;
    try {
      return await this.runChain(chain, opts, async (provider, config, attempt) => {
        this.logCall(opts, 'VRB', 'request', provider, config, `messages ${String(messages.length)}, ${String(payloadBytes(messages))} bytes, attempt ${String(attempt)}, streaming`);
        const startTime = Date.now();
        let text = '';
        // eslint-disable-next-line functional/no-loop-statements
        for await (const chunk of provider.stream(messages, config, { abortSignal: opts.abortSignal })) {
          text += chunk;
          try {
            opts.onChunk?.(chunk, { provider: provider.name, attempt });
          } catch (error) {
            callbackFailure = { error };
            throw new CancelledError('chunk callback failed');
          }
        }
        if (text.trim().length === 0) {
          throw new EmptyResponseError(`${provider.name}: provider streamed no content`, { provider: provider.name });
        }
        return { text, provider: provider.name, model: config.model, latencyMs: Date.now() - startTime };
      });
    } catch (error) {
      if (callbackFailure !== undefined) throw callbackFailure.error;
      throw error;
    }
  }

  private async runChain(
    chain: readonly string[],
    opts: FallbackOptions,
    call: (provider: LLMProvider, config: ProviderConfig, attempt: number) => Promise<Completion>
  ): Promise<FallbackResult> {
    if (chain.length === 0) {
      throw new ConfigError('fallback chain is empty', { field: 'chain' });
    }
    const health = opts.health ?? new ProviderHealth();
    const failures: AgentError[] = [];
    const skipped: string[] = [];
    // eslint-disable-next-line functional/no-loop-statements
    for (const name of chain) {
      if (!health.isHealthy(name)) {
        skipped.push(name);
        this.emit(opts, 'WRN', 'event', `${name}:-`, `skipping unhealthy provider: ${health.get(name)?.unhealthyReason ?? 'unhealthy'}`);
        continue;
      }
      const provider = this.resolve(name);
      const config = this.callConfig(name, opts.overrides);
      try {
        const completion = await withRetry(async (attempt) => {
          try {
            const result = await call(provider, config, attempt);
            health.recordSuccess(name, result.latencyMs, result.tokens);
            this.logCall(opts, 'VRB', 'response', provider, config, describeCompletion(result));
            return result;
          } catch (error) {
            const mapped = mapProviderError(error, name, config.model);
            if (mapped.kind !== 'cancelled') health.recordFailure(name, mapped);
            throw mapped;
          }
        }, {
          provider: name,
          attempts: Math.max(1, config.retryCount),
          backoff: this.options.backoff ?? DEFAULT_BACKOFF,
          sleep: this.options.sleep,
          abortSignal: opts.abortSignal,
          onAttemptFailed: (event) => {
            const retrying = event.delayMs > 0 ? `, retrying in ${String(event.delayMs)}ms` : '';
            this.logCall(opts, 'WRN', 'response', provider, config,
              `attempt ${String(event.attempt)} failed [${event.error.kind.toUpperCase()}] ${event.error.message}${retrying}`);
          },
        });
        return { completion, failures };
      } catch (error) {
        const mapped = mapProviderError(error, name, config.model);
        const endsLink = mapped instanceof RetryError || mapped instanceof APIKeyError;
        if (mapped.kind === 'cancelled' || (isNonRetryable(mapped) && !endsLink)) {
          this.logCall(opts, 'ERR', 'response', provider, config, `[${mapped.kind.toUpperCase()}] ${mapped.message}`, true);
          throw mapped;
        }
        failures.push(mapped);
        this.logCall(opts, 'ERR', 'response', provider, config, `gave up: ${mapped.message}`);
      }
    }
    // a chain where every tried provider rejected its credentials reports the last rejection itself
    const lastFailure = failures.at(-1);
    if (lastFailure instanceof APIKeyError && failures.every((failure) => failure instanceof APIKeyError)) {
      throw lastFailure;
    }
    const tried = chain.filter((name) => !skipped.includes(name));
    const summary = tried.length > 0 ? `tried ${tried.join(', ')}` : 'no healthy provider left';
    const skippedNote = skipped.length > 0 ? `; skipped unhealthy ${skipped.join(', ')}` : '';
    throw new RetryError(`all providers in the fallback chain failed (${summary}${skippedNote})`, failures);
  }

  private registrationFor(name: string): ProviderRegistration {
    const registration = this.registrations.get(name);
    if (registration === undefined) {
      const known = Array.from(this.registrations.keys()).join(', ');
      throw new ConfigError(`unknown provider '${name}' (registered: ${known.length > 0 ? known : 'none'})`, { field: 'provider' });
    }
    return registration;
  }

  private validate(registration: ProviderRegistration, config: unknown, withDefaults = true): ProviderConfig {
    if (config === null || typeof config !== 'object' || Array.isArray(config)) {
      throw new ConfigError(`configuration for provider '${registration.name}' must be an object`, { field: 'config' });
    }
    const candidate: Record<string, unknown> = withDefaults
      ? { model: defaultModelFor(registration.kind), ...DEFAULT_PROVIDER_SETTINGS, ...registration.defaults, ...config }
      : { ...config };
    const parsed = registration.schema.safeParse(candidate);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const field = issue !== undefined ? configFieldOf(issue) : 'config';
      const detail = issue !== undefined ? issue.message : 'invalid configuration';
      const message = `provider '${registration.name}': invalid ${field}: ${detail}`;
      if (field === 'temperature') throw new TemperatureError(message, { cause: parsed.error });
      throw new ConfigError(message, { field, cause: parsed.error });
    }
    assertKnownModel(registration.kind, parsed.data.model, registration.name);
    return parsed.data;
  }

  private tracedFetchFor(name: string): typeof fetch | undefined {
    const onLog = this.options.onLog;
    if (this.options.traceLLM !== true || onLog === undefined) return undefined;
    return async (input: RequestInfo | URL, init?: RequestInit) => {
      const url = typeof input === 'string' ? input : (input instanceof URL ? input.toString() : input.url);
      const method = init?.method ?? 'GET';
      const headers: string[] = [];
      new Headers(init?.headers).forEach((value, key) => {
        headers.push(`${key}: ${REDACTED_HEADERS.has(key.toLowerCase()) ? '[REDACTED]' : value}`);
      });
      const body = typeof init?.body === 'string' ? init.body : '';
      onLog(traceEntry(name, 'request', `${method} ${url}\n${headers.join('\n')}\n\n${body}`));
      const response = await fetch(input, init);
      onLog(traceEntry(name, 'response', `${method} ${url} -> ${String(response.status)} ${response.statusText}`));
      return response;
    };
  }

  private logCall(opts: FallbackOptions, severity: LogEntry['severity'], direction: LogEntry['direction'], provider: LLMProvider, config: ProviderConfig, message: string, fatal = false): void {
    this.emit(opts, severity, direction, `${provider.name}:${config.model}`, message, fatal);
  }

  private emit(opts: FallbackOptions, severity: LogEntry['severity'], direction: LogEntry['direction'], remoteIdentifier: string, message: string, fatal = false): void {
    const onLog = opts.onLog ?? this.options.onLog;
    if (onLog === undefined) return;
    const entry: LogEntry = {
      timestamp: Date.now(),
      severity,
      type: 'llm',
      direction,
      remoteIdentifier,
      fatal,
      message,
    };
    if (opts.runId !== undefined) entry.runId = opts.runId;
    if (opts.step !== undefined) entry.step = opts.step;
    onLog(entry);
  }
}

const payloadBytes = (messages: readonly Message[]): number =>
  new TextEncoder().encode(JSON.stringify(toProviderPayload(messages))).length;

const describeCompletion = (completion: Completion): string => {
  const bytes = new TextEncoder().encode(completion.text).length;
  const tokens = completion.tokens !== undefined
    ? `input ${String(completion.tokens.inputTokens)}, output ${String(completion.tokens.outputTokens)} tokens, `
    : '';
  return `${tokens}${String(completion.latencyMs)}ms, ${String(bytes)} bytes: ${previewText(completion.text, 60)}`;
};

const traceEntry = (name: string, direction: LogEntry['direction'], message: string): LogEntry => ({
  timestamp: Date.now(),
  severity: 'TRC',
  type: 'llm',
  direction,
  remoteIdentifier: `${name}:http`,
  fatal: false,
  message,
});

/** Register every built-in provider kind under its own name. */
export function registerBuiltinProviders(factory: ProviderFactory, defaults: Partial<Record<ProviderKind, Partial<ProviderConfig>>> = {}): void {
  PROVIDER_KINDS.forEach((kind) => {
    factory.register(kind, kind, { defaults: defaults[kind] });
  });
}
