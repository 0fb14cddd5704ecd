import type { ProviderConfig, ProviderKind } from '../types.js';
import type { LanguageModelV2, LanguageModelV2CallOptions, LanguageModelV2Content, LanguageModelV2Prompt, LanguageModelV2StreamPart, LanguageModelV2Usage } from '@ai-sdk/provider';

import { BaseLLMProvider } from './base.js';

const PROVIDER_NAME = 'test-llm';

/**
 * Offline scripted models. The model id picks the behaviour:
 * - `scripted`: every step succeeds, verification passes
 * - `scripted-fail-verify`: verification always fails, scores rise per attempt
 * - `scripted-empty`: every reply is empty
 * - `scripted-flaky`: the first delivery of an UNDERSTAND request fails with a
 *   network error; its retry and every later call behave like `scripted`
 */
export type ScriptedModel = 'scripted' | 'scripted-fail-verify' | 'scripted-empty' | 'scripted-flaky';

const SCRIPTED_MODELS: readonly ScriptedModel[] = ['scripted', 'scripted-fail-verify', 'scripted-empty', 'scripted-flaky'];

const isScriptedModel = (value: string): value is ScriptedModel => SCRIPTED_MODELS.some((model) => model === value);

const STEP_LEADS: readonly { pattern: RegExp; step: 'UNDERSTAND' | 'PLAN' | 'EXECUTE' | 'VERIFY' }[] = [
  { pattern: /^Analyze the task:/, step: 'UNDERSTAND' },
  { pattern: /^Create a plan/, step: 'PLAN' },
  { pattern: /^Execute the plan/, step: 'EXECUTE' },
  { pattern: /^Verify the result/, step: 'VERIFY' },
];

export interface ScriptContext {
  model: ScriptedModel;
  verifyCount: number;
}

const promptText = (message: LanguageModelV2Prompt[number]): string => {
  if (message.role === 'system') return message.content;
  let text = '';
  // eslint-disable-next-line functional/no-loop-statements
  for (const part of message.content) {
    if (part.type === 'text') text += part.text;
  }
  return text;
};

const lastUserText = (prompt: LanguageModelV2Prompt): string => {
  const user = prompt.filter((message) => message.role === 'user');
  const last = user.length > 0 ? user[user.length - 1] : undefined;
  return last !== undefined ? promptText(last).trim() : '';
};

const extractTask = (text: string): string => {
  const inline = /^Analyze the task:\s*(.+)$/m.exec(text);
  if (inline !== null) return inline[1].trim();
  const line = /^Task:\s*(.+)$/m.exec(text);
  return line !== null ? line[1].trim() : 'the task';
};

/** VERIFY requests in the prompt, the current one included. */
export const countVerifyRequests = (prompt: LanguageModelV2Prompt): number => (
  prompt.filter((message) => message.role === 'user' && /^Verify the result/.test(promptText(message).trim())).length
);

export function scriptedReply(prompt: LanguageModelV2Prompt, context: ScriptContext): string {
  if (context.model === 'scripted-empty') return '';
  const text = lastUserText(prompt);
  const task = extractTask(text);
  const step = STEP_LEADS.find((lead) => lead.pattern.test(text))?.step;
  switch (step) {
    case 'UNDERSTAND':
      return `Goal: ${task}\nConstraints: none stated.\nA correct answer states the outcome plainly.`;
    case 'PLAN':
      return '1. Work out the answer.\n2. Write it down.\n3. Double-check it.';
    case 'EXECUTE':
      return `Answer for: ${task}\n[CODE]\nconsole.log(${JSON.stringify(task)});\n[/CODE]`;
    case 'VERIFY':
      if (context.model === 'scripted-fail-verify') {
        return `The result misses part of the task.\nVERDICT: FAIL\nSCORE: ${String(Math.min(9, context.verifyCount + 2))}`;
      }
      return 'The result addresses the task.\nVERDICT: PASS\nSCORE: 9';
    case undefined:
      return `Acknowledged: ${task}`;
  }
}

const usageFor = (prompt: LanguageModelV2Prompt, reply: string): LanguageModelV2Usage => {
  const count = (value: string): number => value.split(/\s+/).filter((word) => word.length > 0).length;
  const inputTokens = prompt.reduce((sum, message) => sum + count(promptText(message)), 0);
  const outputTokens = count(reply);
  return { inputTokens, outputTokens, totalTokens: inputTokens + outputTokens };
};

const toStreamParts = (reply: string, usage: LanguageModelV2Usage): LanguageModelV2StreamPart[] => {
  const parts: LanguageModelV2StreamPart[] = [{ type: 'stream-start', warnings: [] }];
  if (reply.length > 0) {
    parts.push({ type: 'text-start', id: 'text-1' });
    reply.split(/(?<=\s)/).forEach((delta) => {
      parts.push({ type: 'text-delta', id: 'text-1', delta });
    });
    parts.push({ type: 'text-end', id: 'text-1' });
  }
  parts.push({ type: 'finish', finishReason: 'stop', usage });
  return parts;
};

export class TestLLMProvider extends BaseLLMProvider {
  readonly kind: ProviderKind = 'test-llm';
  // UNDERSTAND prompts that failed once and await their retry
  private readonly droppedOnce = new Set<string>();

  constructor(name: string, config: ProviderConfig) {
    super(name, config);
  }

  protected createModel(modelId: string): LanguageModelV2 {
    const model: ScriptedModel = isScriptedModel(modelId) ? modelId : 'scripted';
    const next = (options: LanguageModelV2CallOptions): string => {
      if (options.abortSignal?.aborted === true) {
        throw new Error('scripted call aborted');
      }
      const text = lastUserText(options.prompt);
      if (model === 'scripted-flaky' && /^Analyze the task:/.test(text)) {
        const key = `${String(options.prompt.length)}:${text}`;
        if (this.droppedOnce.delete(key)) return scriptedReply(options.prompt, { model, verifyCount: 0 });
        this.droppedOnce.add(key);
        throw new Error('network connection reset by scripted model');
      }
      return scriptedReply(options.prompt, { model, verifyCount: countVerifyRequests(options.prompt) });
    };
    return {
      specificationVersion: 'v2',
      provider: PROVIDER_NAME,
      modelId,
      supportedUrls: {},
      doGenerate: (options: LanguageModelV2CallOptions) => {
        const reply = next(options);
        const content: LanguageModelV2Content[] = reply.length > 0 ? [{ type: 'text', text: reply }] : [];
        return Promise.resolve({
          content,
          finishReason: 'stop' as const,
          usage: usageFor(options.prompt, reply),
          warnings: [],
        });
      },
      doStream: (options: LanguageModelV2CallOptions) => {
        const reply = next(options);
        const parts = toStreamParts(reply, usageFor(options.prompt, reply));
        const stream = new ReadableStream<LanguageModelV2StreamPart>({
          start(controller) {
            parts.forEach((part) => {
              controller.enqueue(part);
            });
            controller.close();
          },
        });
        return Promise.resolve({ stream });
      },
    };
  }
}
