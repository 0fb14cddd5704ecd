import type { AgentState } from './agent-state.js';
import type { FallbackResult, ProviderFactory } from './llm-providers/provider-factory.js';
import type { ProviderHealth } from './llm-providers/provider-health.js';
import type { ChunkCallback, Completion, LogCallback, Message, MetadataValue, ProviderConfig, StepResult, WorkingStepKind } from './types.js';

import { ConfigError, toErrorInfo } from './errors.js';
import { assistantMessage, userMessage } from './messages.js';
import { renderStepPrompt } from './prompts/templates.js';
import { isPlainObject, previewText } from './utils.js';
import { parseVerdict } from './verdict.js';

/** Everything a step needs besides the run state; shared by all steps of one run. */
export interface StepContext {
  factory: ProviderFactory;
  chain: readonly string[];
  overrides: Readonly<Partial<ProviderConfig>>;
  health: ProviderHealth;
  stream: boolean;
  verifyRetries: number;
  runId: string;
  abortSignal?: AbortSignal;
  onChunk?: ChunkCallback;
  onLog?: LogCallback;
}

export interface Step {
  readonly kind: WorkingStepKind;
  execute: (state: AgentState, context: StepContext) => Promise<StepResult>;
}

export interface ExecutionAttempt {
  attempt: number;
  result: string;
  passed?: boolean;
  score?: number;
}

const isExecutionAttempt = (value: unknown): value is ExecutionAttempt => (
  isPlainObject(value)
  && typeof value.attempt === 'number'
  && typeof value.result === 'string'
  && (value.score === undefined || typeof value.score === 'number')
  && (value.passed === undefined || typeof value.passed === 'boolean')
);

export const readAttempts = (state: AgentState): ExecutionAttempt[] => {
  const raw = state.getContext('attempts');
  return Array.isArray(raw) ? raw.filter(isExecutionAttempt) : [];
};

/** Highest score wins; the latest attempt breaks ties. Unscored attempts rank lowest. */
export const selectBestAttempt = (attempts: readonly ExecutionAttempt[]): ExecutionAttempt | undefined => (
  attempts.reduce<ExecutionAttempt | undefined>((best, candidate) => {
    if (best === undefined) return candidate;
    return (candidate.score ?? -1) >= (best.score ?? -1) ? candidate : best;
  }, undefined)
);

const requireContext = (state: AgentState, key: string, step: WorkingStepKind): string => {
  const value = state.getContextString(key);
  if (value === undefined) {
    throw new ConfigError(`${step} needs '${key}' from an earlier step`, { field: key });
  }
  return value;
};

const tokensMetadata = (completion: Completion): MetadataValue => (
  completion.tokens !== undefined
    ? { input: completion.tokens.inputTokens, output: completion.tokens.outputTokens, total: completion.tokens.totalTokens }
    : null
);

/**
 * Send the run history plus this step's instruction down the fallback
 * chain, then record both turns. History is only touched once the
 * provider answered.
 */
async function converse(state: AgentState, context: StepContext, step: WorkingStepKind, prompt: string, opts: { attempt?: number; stream?: boolean } = {}): Promise<Completion> {
  const attempt = opts.attempt ?? 1;
  const request = userMessage(prompt, { step, timestamp: new Date().toISOString(), attempt });
  const messages: Message[] = [...state.messages, request];
  const callOptions = {
    health: context.health,
    overrides: context.overrides,
    abortSignal: context.abortSignal,
    onLog: context.onLog,
    runId: context.runId,
    step,
  };
  const outcome: FallbackResult = opts.stream === true
    ? await context.factory.streamWithFallback(messages, context.chain, { ...callOptions, onChunk: context.onChunk })
    : await context.factory.generateWithFallback(messages, context.chain, callOptions);
  const { completion } = outcome;
  state.append(request);
  state.append(assistantMessage(completion.text, {
    step,
    timestamp: new Date().toISOString(),
    attempt,
    provider: completion.provider,
    model: completion.model,
    tokens: tokensMetadata(completion),
  }));
  return completion;
}

const failure = (step: WorkingStepKind, error: unknown): StepResult => {
  const info = toErrorInfo(error);
  return { success: false, message: `${step} failed: ${info.message}`, next: 'END', error: info };
};

export const understandStep: Step = {
  kind: 'UNDERSTAND',
  async execute(state, context) {
    try {
      const task = requireContext(state, 'task', 'UNDERSTAND');
      const completion = await converse(state, context, 'UNDERSTAND', renderStepPrompt('UNDERSTAND', { task }));
      state.setContext('understanding', completion.text);
      return { success: true, message: 'requirements understood', next: 'PLAN', data: { provider: completion.provider } };
    } catch (error) {
      return failure('UNDERSTAND', error);
    }
  },
};

export const planStep: Step = {
  kind: 'PLAN',
  async execute(state, context) {
    try {
      const task = requireContext(state, 'task', 'PLAN');
      const understanding = requireContext(state, 'understanding', 'PLAN');
      const completion = await converse(state, context, 'PLAN', renderStepPrompt('PLAN', { task, understanding }));
      state.setContext('plan', completion.text);
      return { success: true, message: 'plan ready', next: 'EXECUTE', data: { provider: completion.provider } };
    } catch (error) {
      return failure('PLAN', error);
    }
  },
};

export const executeStep: Step = {
  kind: 'EXECUTE',
  async execute(state, context) {
    try {
      const task = requireContext(state, 'task', 'EXECUTE');
      const plan = requireContext(state, 'plan', 'EXECUTE');
      const attempts = readAttempts(state);
      const attempt = attempts.length + 1;
      const feedback = state.getContextString('verifyFeedback') ?? '';
      const prompt = renderStepPrompt('EXECUTE', { task, plan, feedback, previous_attempt: attempt - 1 });
      const completion = await converse(state, context, 'EXECUTE', prompt, { attempt, stream: context.stream });
      state.setResult(completion.text);
      state.setContext('attempts', [...attempts, { attempt, result: completion.text }]);
      return { success: true, message: `attempt ${String(attempt)} produced a result`, next: 'VERIFY', data: { attempt, provider: completion.provider } };
    } catch (error) {
      return failure('EXECUTE', error);
    }
  },
};

export const verifyStep: Step = {
  kind: 'VERIFY',
  async execute(state, context) {
    try {
      const task = requireContext(state, 'task', 'VERIFY');
      const attempts = readAttempts(state);
      const current = attempts.at(-1);
      if (current === undefined || state.result === undefined) {
        throw new ConfigError('VERIFY needs a result from EXECUTE', { field: 'result' });
      }
      const completion = await converse(state, context, 'VERIFY', renderStepPrompt('VERIFY', { task, result: state.result }), { attempt: current.attempt });
      const verdict = parseVerdict(completion.text);
      const scored: ExecutionAttempt = { ...current, passed: verdict.passed };
      if (verdict.score !== undefined) scored.score = verdict.score;
      const updated = [...attempts.slice(0, -1), scored];
      state.setContext('attempts', updated);
      const scoreNote = verdict.score !== undefined ? ` (score ${String(verdict.score)})` : '';
      if (verdict.passed) {
        return { success: true, message: `attempt ${String(current.attempt)} passed verification${scoreNote}`, next: 'END', data: { attempt: current.attempt, passed: true } };
      }
      // EXECUTE runs at most 1 + verifyRetries times
      if (current.attempt <= context.verifyRetries) {
        state.setContext('verifyFeedback', verdict.feedback.length > 0 ? verdict.feedback : 'The reviewer rejected the result without details.');
        return { success: true, message: `attempt ${String(current.attempt)} failed verification${scoreNote}; retrying`, next: 'EXECUTE', data: { attempt: current.attempt, passed: false } };
      }
      const best = selectBestAttempt(updated) ?? scored;
      state.setResult(best.result);
      return {
        success: true,
        message: `verification failed ${String(updated.length)} times; accepting attempt ${String(best.attempt)}: ${previewText(best.result, 60)}`,
        next: 'END',
        data: { attempt: best.attempt, passed: false },
      };
    } catch (error) {
      return failure('VERIFY', error);
    }
  },
};

export const STEPS: Readonly<Record<WorkingStepKind, Step>> = {
  UNDERSTAND: understandStep,
  PLAN: planStep,
  EXECUTE: executeStep,
  VERIFY: verifyStep,
};
