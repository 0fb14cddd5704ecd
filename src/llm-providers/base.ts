import { generateText, streamText } from 'ai';

import type { CallOptions, Completion, LLMProvider, Message, ProviderConfig, ProviderKind, TokenUsage } from '../types.js';
import type { LanguageModel, LanguageModelUsage, ModelMessage } from 'ai';

import { AgentError, CancelledError, EmptyResponseError, TransientProviderError } from '../errors.js';
import { demoteSystemMessages } from '../messages.js';

import { mapProviderError } from './llm-error-mapping.js';

interface CallController {
  signal: AbortSignal;
  timedOut: () => boolean;
  dispose: () => void;
}

/**
 * Shared plumbing for providers backed by the AI SDK: message conversion,
 * per-call timeout, usage extraction and error classification. Subclasses
 * only supply the SDK model for a model id.
 */
export abstract class BaseLLMProvider implements LLMProvider {
  abstract readonly kind: ProviderKind;
  readonly name: string;
  readonly config: Readonly<ProviderConfig>;

  protected constructor(name: string, config: ProviderConfig) {
    this.name = name;
    this.config = Object.freeze({ ...config });
  }

  protected abstract createModel(modelId: string, config: Readonly<ProviderConfig>): LanguageModel;

  // Models without a native system role receive system turns as user turns
  protected supportsSystemRole(_modelId: string): boolean {
    return true;
  }

  async generate(messages: readonly Message[], config: Readonly<ProviderConfig> = this.config, options: CallOptions = {}): Promise<Completion> {
    const startTime = Date.now();
    const call = this.createCallController(config.timeoutMs, options.abortSignal);
    try {
      const result = await generateText({
        model: this.createModel(config.model, config),
        messages: this.convertMessages(messages, config.model),
        temperature: config.temperature,
        maxOutputTokens: config.maxTokens,
        maxRetries: 0,
        abortSignal: call.signal,
      });
      const text = result.text;
      if (text.trim().length === 0) {
        throw new EmptyResponseError(`${this.name}: provider returned an empty completion`, { provider: this.name });
      }
      const completion: Completion = {
        text,
        provider: this.name,
        model: config.model,
        latencyMs: Date.now() - startTime,
      };
      const tokens = this.extractTokenUsage(result.usage);
      if (tokens !== undefined) completion.tokens = tokens;
      return completion;
    } catch (error) {
      throw this.mapError(error, config, call, options.abortSignal);
    } finally {
      call.dispose();
    }
  }

  async *stream(messages: readonly Message[], config: Readonly<ProviderConfig> = this.config, options: CallOptions = {}): AsyncGenerator<string, void, undefined> {
    const call = this.createCallController(config.timeoutMs, options.abortSignal);
    let streamError: unknown;
    try {
      const result = streamText({
        model: this.createModel(config.model, config),
        messages: this.convertMessages(messages, config.model),
        temperature: config.temperature,
        maxOutputTokens: config.maxTokens,
        maxRetries: 0,
        abortSignal: call.signal,
        onError: ({ error }) => { streamError = error; },
      });
      let emitted = false;
      // eslint-disable-next-line functional/no-loop-statements
      for await (const part of result.fullStream) {
        if (part.type === 'error') {
          throw part.error;
        }
        if (part.type === 'text-delta' && part.text.length > 0) {
          emitted = true;
          yield part.text;
        }
      }
      if (streamError !== undefined) throw streamError;
      if (!emitted) {
        throw new EmptyResponseError(`${this.name}: provider streamed no content`, { provider: this.name });
      }
    } catch (error) {
      throw this.mapError(error, config, call, options.abortSignal);
    } finally {
      call.dispose();
    }
  }

  protected convertMessages(messages: readonly Message[], modelId: string): ModelMessage[] {
    const source = this.supportsSystemRole(modelId) ? messages : demoteSystemMessages(messages);
    return source.map((message): ModelMessage => {
      switch (message.role) {
        case 'system':
          return { role: 'system', content: message.content };
        case 'assistant':
          return { role: 'assistant', content: message.content };
        case 'tool':
          // no tool schema is exposed to the model; results travel as user text
          return { role: 'user', content: `[tool result ${message.toolCallId ?? 'unknown'}]\n${message.content}` };
        case 'user':
          return { role: 'user', content: message.content };
      }
    });
  }

  protected extractTokenUsage(usage: LanguageModelUsage | undefined): TokenUsage | undefined {
    if (usage === undefined) return undefined;
    const inputTokens = usage.inputTokens ?? 0;
    const outputTokens = usage.outputTokens ?? 0;
    if (inputTokens === 0 && outputTokens === 0 && usage.totalTokens === undefined) return undefined;
    return { inputTokens, outputTokens, totalTokens: usage.totalTokens ?? inputTokens + outputTokens };
  }

  protected mapError(error: unknown, config: Readonly<ProviderConfig>, call: CallController, external?: AbortSignal): AgentError {
    if (external?.aborted === true) {
      return new CancelledError(`${this.name}: call cancelled by caller`);
    }
    if (call.timedOut()) {
      return new TransientProviderError('timeout', `${this.name}: call exceeded ${String(config.timeoutMs)}ms`, { provider: this.name, cause: error });
    }
    return mapProviderError(error, this.name, config.model);
  }

  protected createCallController(timeoutMs: number, external?: AbortSignal): CallController {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onAbort = (): void => { controller.abort(); };
    if (external !== undefined) {
      if (external.aborted) controller.abort();
      else external.addEventListener('abort', onAbort, { once: true });
    }
    return {
      signal: controller.signal,
      timedOut: () => timedOut,
      dispose: () => {
        clearTimeout(timer);
        external?.removeEventListener('abort', onAbort);
      },
    };
  }
}
