import type { CallOptions, Completion, LLMProvider, LogEntry, Message, ProviderConfig, ProviderKind } from '../../types.js';

import { ProviderFactory } from '../../llm-providers/provider-factory.js';

export type StubOutcome = string | Error;

export interface StubCall {
  provider: string;
  step?: string;
  attempt: number;
  config: ProviderConfig;
  messages: readonly Message[];
}

export type StubScript = (call: StubCall) => StubOutcome;

const stepOf = (messages: readonly Message[]): string | undefined => {
  const last = messages.at(-1);
  const step = last?.metadata.step;
  return typeof step === 'string' ? step : undefined;
};

/** In-process provider whose replies come from a script keyed by step and call number. */
export class StubProvider implements LLMProvider {
  readonly kind: ProviderKind = 'test-llm';
  readonly name: string;
  readonly config: Readonly<ProviderConfig>;
  private readonly script: StubScript;
  private readonly journal: StubCall[];

  constructor(name: string, config: ProviderConfig, script: StubScript, journal: StubCall[]) {
    this.name = name;
    this.config = config;
    this.script = script;
    this.journal = journal;
  }

  private next(messages: readonly Message[], config: Readonly<ProviderConfig>): StubOutcome {
    const call: StubCall = {
      provider: this.name,
      step: stepOf(messages),
      attempt: this.journal.filter((entry) => entry.provider === this.name).length + 1,
      config: { ...config },
      messages: [...messages],
    };
    this.journal.push(call);
    return this.script(call);
  }

  generate(messages: readonly Message[], config: Readonly<ProviderConfig> = this.config, _options?: CallOptions): Promise<Completion> {
    const outcome = this.next(messages, config);
    if (outcome instanceof Error) return Promise.reject(outcome);
    return Promise.resolve({
      text: outcome,
      provider: this.name,
      model: config.model,
      latencyMs: 1,
      tokens: { inputTokens: 10, outputTokens: 5, totalTokens: 15 },
    });
  }

  async *stream(messages: readonly Message[], config: Readonly<ProviderConfig> = this.config, _options?: CallOptions): AsyncGenerator<string, void, undefined> {
    const outcome = this.next(messages, config);
    if (outcome instanceof Error) throw outcome;
    // eslint-disable-next-line functional/no-loop-statements
    for (const piece of outcome.split(/(?<= )/)) {
      await Promise.resolve();
      yield piece;
    }
  }
}

export interface StubFactory {
  factory: ProviderFactory;
  calls: StubCall[];
  logs: LogEntry[];
  sleeps: number[];
}

/**
 * Factory with one stub provider per entry, sealed, the first entry active.
 * Backoff sleeps are recorded instead of waited.
 */
export function createStubFactory(scripts: Record<string, StubScript>, defaults: Partial<ProviderConfig> = {}): StubFactory {
  const calls: StubCall[] = [];
  const logs: LogEntry[] = [];
  const sleeps: number[] = [];
  const factory = new ProviderFactory({
    sleep: (ms) => {
      sleeps.push(ms);
      return Promise.resolve('completed');
    },
    onLog: (entry) => { logs.push(entry); },
  });
  Object.entries(scripts).forEach(([name, script]) => {
    factory.register(name, 'test-llm', {
      builder: (providerName, config) => new StubProvider(providerName, config, script, calls),
      defaults: { model: 'scripted', retryCount: 3, ...defaults },
    });
  });
  factory.seal();
  const first = Object.keys(scripts)[0];
  if (first !== undefined) factory.setActive(first);
  return { factory, calls, logs, sleeps };
}

export const CANNED = {
  UNDERSTAND: 'The task asks for a greeting.',
  PLAN: '1. Write the greeting.',
  EXECUTE: 'Hello, world.',
  VERIFY: 'Looks right.\nVERDICT: PASS\nSCORE: 8',
} as const;

/** Script answering each step with its canned reply. */
export const cannedScript: StubScript = (call) => {
  switch (call.step) {
    case 'UNDERSTAND':
    case 'PLAN':
    case 'EXECUTE':
    case 'VERIFY':
      return CANNED[call.step];
    default:
      return 'unexpected call';
  }
};

export class HttpStatusError extends Error {
  readonly statusCode: number;

  constructor(statusCode: number, message: string) {
    super(message);
    this.name = 'APICallError';
    this.statusCode = statusCode;
  }
}
