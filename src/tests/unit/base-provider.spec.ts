import { simulateReadableStream } from 'ai';
import { MockLanguageModelV2 } from 'ai/test';
import { describe, expect, it } from 'vitest';

import type { ProviderConfig, ProviderKind } from '../../types.js';
import type { LanguageModelV2, LanguageModelV2StreamPart } from '@ai-sdk/provider';

import { APIKeyError, CancelledError, EmptyResponseError, TransientProviderError } from '../../errors.js';
import { BaseLLMProvider } from '../../llm-providers/base.js';
import { normalizeOllamaBaseUrl } from '../../llm-providers/ollama.js';
import { systemMessage, toolMessage, userMessage } from '../../messages.js';
import { HttpStatusError } from '../fixtures/stub-provider.js';

const CONFIG: ProviderConfig = { model: 'mock-model', temperature: 0.3, maxTokens: 256, timeoutMs: 5000, retryCount: 1 };

class MockBackedProvider extends BaseLLMProvider {
  readonly kind: ProviderKind = 'test-llm';
  private readonly model: LanguageModelV2;
  private readonly systemRole: boolean;

  constructor(model: LanguageModelV2, config: ProviderConfig = CONFIG, systemRole = true) {
    super('mock', config);
    this.model = model;
    this.systemRole = systemRole;
  }

  protected createModel(): LanguageModelV2 {
    return this.model;
  }

  protected override supportsSystemRole(): boolean {
    return this.systemRole;
  }
}

const textResult = (text: string) => ({
  content: text.length > 0 ? [{ type: 'text' as const, text }] : [],
  finishReason: 'stop' as const,
  usage: { inputTokens: 12, outputTokens: 3, totalTokens: 15 },
  warnings: [],
});

const streamOf = (deltas: string[]): ReadableStream<LanguageModelV2StreamPart> => {
  const chunks: LanguageModelV2StreamPart[] = [{ type: 'stream-start', warnings: [] }];
  if (deltas.length > 0) {
    chunks.push({ type: 'text-start', id: 't1' });
    deltas.forEach((delta) => { chunks.push({ type: 'text-delta', id: 't1', delta }); });
    chunks.push({ type: 'text-end', id: 't1' });
  }
  chunks.push({ type: 'finish', finishReason: 'stop', usage: { inputTokens: 4, outputTokens: 2, totalTokens: 6 } });
  return simulateReadableStream({ chunks });
};

const history = [systemMessage('rules'), userMessage('question')];

describe('BaseLLMProvider.generate', () => {
  it('returns the text with usage and passes the sampling settings', async () => {
    const model = new MockLanguageModelV2({ doGenerate: () => Promise.resolve(textResult('answer')) });
    const completion = await new MockBackedProvider(model).generate(history);
    expect(completion).toMatchObject({ text: 'answer', provider: 'mock', model: 'mock-model', tokens: { inputTokens: 12, outputTokens: 3, totalTokens: 15 } });
    expect(model.doGenerateCalls[0]).toMatchObject({ temperature: 0.3, maxOutputTokens: 256 });
  });

  it('sends system turns natively or demoted to user turns', async () => {
    const native = new MockLanguageModelV2({ doGenerate: () => Promise.resolve(textResult('a')) });
    await new MockBackedProvider(native).generate(history);
    expect(native.doGenerateCalls[0].prompt.map((message) => message.role)).toEqual(['system', 'user']);

    const demoted = new MockLanguageModelV2({ doGenerate: () => Promise.resolve(textResult('a')) });
    await new MockBackedProvider(demoted, CONFIG, false).generate(history);
    expect(demoted.doGenerateCalls[0].prompt.map((message) => message.role)).toEqual(['user', 'user']);
  });

  it('passes tool results as tagged user text', async () => {
    const model = new MockLanguageModelV2({ doGenerate: () => Promise.resolve(textResult('a')) });
    await new MockBackedProvider(model).generate([...history, toolMessage('42', 'call-1')]);
    expect(model.doGenerateCalls[0].prompt.at(-1)).toMatchObject({ role: 'user', content: [{ type: 'text', text: '[tool result call-1]\n42' }] });
  });

  it('raises EmptyResponseError for a blank completion', async () => {
    const model = new MockLanguageModelV2({ doGenerate: () => Promise.resolve(textResult('')) });
    await expect(new MockBackedProvider(model).generate(history)).rejects.toBeInstanceOf(EmptyResponseError);
  });

  it('classifies provider failures', async () => {
    const model = new MockLanguageModelV2({ doGenerate: () => Promise.reject(new HttpStatusError(401, 'bad key')) });
    const error = await new MockBackedProvider(model).generate(history).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(APIKeyError);
    expect(error).toMatchObject({ message: 'mock (401): bad key', provider: 'mock' });
  });

  it('turns a call that outlives timeoutMs into a transient timeout', async () => {
    const model = new MockLanguageModelV2({
      doGenerate: (options) => new Promise<never>((_resolve, reject) => {
        options.abortSignal?.addEventListener('abort', () => { reject(new Error('The operation was aborted')); });
      }),
    });
    const error = await new MockBackedProvider(model, { ...CONFIG, timeoutMs: 20 }).generate(history).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(TransientProviderError);
    expect(error).toMatchObject({ reason: 'timeout', message: 'mock: call exceeded 20ms' });
  });

  it('reports caller cancellation as CancelledError', async () => {
    const controller = new AbortController();
    controller.abort();
    const model = new MockLanguageModelV2({
      doGenerate: (options) => (options.abortSignal?.aborted === true
        ? Promise.reject(new Error('The operation was aborted'))
        : Promise.resolve(textResult('late'))),
    });
    await expect(new MockBackedProvider(model).generate(history, CONFIG, { abortSignal: controller.signal })).rejects.toBeInstanceOf(CancelledError);
  });
});

describe('BaseLLMProvider.stream', () => {
  it('yields text deltas in order', async () => {
    const model = new MockLanguageModelV2({ doStream: () => Promise.resolve({ stream: streamOf(['Hel', 'lo', ' there']) }) });
    const chunks: string[] = [];
    // eslint-disable-next-line functional/no-loop-statements
    for await (const chunk of new MockBackedProvider(model).stream(history)) chunks.push(chunk);
    expect(chunks).toEqual(['Hel', 'lo', ' there']);
  });

  it('fails with EmptyResponseError when nothing was streamed', async () => {
    const model = new MockLanguageModelV2({ doStream: () => Promise.resolve({ stream: streamOf([]) }) });
    const drain = async (): Promise<void> => {
      // eslint-disable-next-line functional/no-loop-statements
      for await (const _chunk of new MockBackedProvider(model).stream(history)) { /* drain */ }
    };
    await expect(drain()).rejects.toBeInstanceOf(EmptyResponseError);
  });

  it('classifies stream failures', async () => {
    const model = new MockLanguageModelV2({ doStream: () => Promise.reject(new HttpStatusError(429, 'rate limit exceeded')) });
    const drain = async (): Promise<void> => {
      // eslint-disable-next-line functional/no-loop-statements
      for await (const _chunk of new MockBackedProvider(model).stream(history)) { /* drain */ }
    };
    await expect(drain()).rejects.toMatchObject({ kind: 'transient_error', reason: 'rate_limit' });
  });
});

describe('normalizeOllamaBaseUrl', () => {
  it('points at the native API', () => {
    expect(normalizeOllamaBaseUrl(undefined)).toBe('http://localhost:11434/api');
    expect(normalizeOllamaBaseUrl('http://gpu-box:11434/v1')).toBe('http://gpu-box:11434/api');
    expect(normalizeOllamaBaseUrl('http://gpu-box:11434/')).toBe('http://gpu-box:11434/api');
    expect(normalizeOllamaBaseUrl('http://gpu-box:11434/api')).toBe('http://gpu-box:11434/api');
  });
});
