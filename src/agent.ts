import { z } from 'zod';

import type { AgentStateSnapshot } from './agent-state.js';
import type { ProviderFactory } from './llm-providers/provider-factory.js';
import type { ProviderStats } from './llm-providers/provider-health.js';
import type { ChunkCallback, ErrorInfo, LogCallback, LogEntry, ProviderConfig, RunOverrides, StepKind, StepResult, WorkingStepKind } from './types.js';

import { AgentState } from './agent-state.js';
import { CancelledError, ConfigError, TemperatureError, toErrorInfo } from './errors.js';
import { ProviderHealth } from './llm-providers/provider-health.js';
import { systemMessage } from './messages.js';
import { renderSystemPrompt } from './prompts/templates.js';
import { extractSolution } from './solution.js';
import { STEPS, type StepContext } from './steps.js';
import { previewText } from './utils.js';

export const DEFAULT_VERIFY_RETRIES = 2;

export interface AgentOptions {
  factory: ProviderFactory;
  // providers tried in order; defaults to the factory's active provider
  chain?: readonly string[];
  verifyRetries?: number;
  stream?: boolean;
  onLog?: LogCallback;
}

export interface RunOptions {
  abortSignal?: AbortSignal;
  onChunk?: ChunkCallback;
}

export interface StepRecord {
  step: WorkingStepKind;
  success: boolean;
  message: string;
  durationMs: number;
  next: StepKind;
}

export interface RunReport {
  runId: string;
  result?: string;
  error?: ErrorInfo;
  code?: string;
  state: AgentStateSnapshot;
  steps: StepRecord[];
  providers: Record<string, ProviderStats>;
}

const RunOverridesSchema = z.object({
  temperature: z.number().optional(),
  maxTokens: z.number().optional(),
  max_tokens: z.number().optional(),
  provider: z.string().min(1).optional(),
  stream: z.boolean().optional(),
  model: z.string().min(1).optional(),
}).strict();

/** Validate caller overrides; unknown keys and wrong types raise ConfigError. */
export function parseRunOverrides(raw: unknown): RunOverrides {
  if (raw === undefined || raw === null) return {};
  const parsed = RunOverridesSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    if (issue !== undefined && issue.code === 'unrecognized_keys') {
      throw new ConfigError(`unrecognized option(s): ${issue.keys.join(', ')}`, { field: issue.keys.join(', ') });
    }
    const field = issue !== undefined && issue.path.length > 0 ? String(issue.path[0]) : 'options';
    const message = `invalid option ${field}: ${issue?.message ?? 'invalid value'}`;
    if (field === 'temperature') throw new TemperatureError(message);
    throw new ConfigError(message, { field });
  }
  const { max_tokens: snakeMaxTokens, ...rest } = parsed.data;
  if (snakeMaxTokens !== undefined && rest.maxTokens !== undefined && snakeMaxTokens !== rest.maxTokens) {
    throw new ConfigError('maxTokens and max_tokens disagree', { field: 'maxTokens' });
  }
  const overrides: RunOverrides = { ...rest };
  const maxTokens = rest.maxTokens ?? snakeMaxTokens;
  if (maxTokens !== undefined) overrides.maxTokens = maxTokens;
  return overrides;
}

/**
 * Drives one task through UNDERSTAND, PLAN, EXECUTE and VERIFY. Each run
 * owns a fresh AgentState and provider health tracker; the factory is the
 * only thing runs share.
 */
export class Agent {
  private static readonly REMOTE_RUN = 'agent:run';
  private readonly factory: ProviderFactory;
  private readonly chain?: readonly string[];
  private readonly verifyRetries: number;
  private readonly stream: boolean;
  private readonly onLog?: LogCallback;

  constructor(options: AgentOptions) {
    const verifyRetries = options.verifyRetries ?? DEFAULT_VERIFY_RETRIES;
    if (!Number.isInteger(verifyRetries) || verifyRetries < 0) {
      throw new ConfigError('verifyRetries must be a non-negative integer', { field: 'verifyRetries' });
    }
    if (options.chain?.length === 0) {
      throw new ConfigError('fallback chain cannot be empty', { field: 'chain' });
    }
    this.factory = options.factory;
    this.chain = options.chain;
    this.verifyRetries = verifyRetries;
    this.stream = options.stream ?? false;
    this.onLog = options.onLog;
  }

  /**
   * Invalid input (empty task, bad overrides) rejects before any provider
   * call. Everything after that resolves to a report carrying either a
   * result or an error.
   */
  async run(task: string, rawOverrides: unknown = {}, options: RunOptions = {}): Promise<RunReport> {
    if (task.trim().length === 0) {
      throw new ConfigError('task cannot be empty', { field: 'task' });
    }
    const overrides = parseRunOverrides(rawOverrides);
    const chain = overrides.provider !== undefined ? [overrides.provider] : this.resolveChain();
    const providerOverrides: Partial<ProviderConfig> = {};
    if (overrides.temperature !== undefined) providerOverrides.temperature = overrides.temperature;
    if (overrides.maxTokens !== undefined) providerOverrides.maxTokens = overrides.maxTokens;
    if (overrides.model !== undefined) providerOverrides.model = overrides.model;
    chain.forEach((name) => { this.factory.callConfig(name, providerOverrides); });

    const state = new AgentState();
    const health = new ProviderHealth();
    const context: StepContext = {
      factory: this.factory,
      chain,
      overrides: providerOverrides,
      health,
      stream: overrides.stream ?? this.stream,
      verifyRetries: this.verifyRetries,
      runId: state.runId,
      abortSignal: options.abortSignal,
      onChunk: options.onChunk,
      onLog: this.onLog,
    };
    state.setContext('task', task.trim());
    state.append(systemMessage(renderSystemPrompt(), { timestamp: new Date().toISOString() }));
    this.log(state, 'VRB', 'event', Agent.REMOTE_RUN, `run started: chain ${chain.join(' > ')}, task: ${previewText(task, 80)}`);

    const steps: StepRecord[] = [];
    const startedAt = Date.now();
    // eslint-disable-next-line functional/no-loop-statements
    while (!state.isTerminal) {
      const current = state.currentStep;
      if (current === 'END') break;
      const stepStart = Date.now();
      const outcome = await this.executeStep(current, state, context);
      const durationMs = Date.now() - stepStart;
      steps.push({ step: current, success: outcome.success, message: outcome.message, durationMs, next: outcome.next });
      this.log(state, outcome.success ? 'VRB' : 'ERR', 'event', `step:${current}`, `${outcome.message} (${String(durationMs)}ms)`, !outcome.success, current);
      if (!outcome.success) {
        state.fail(outcome.error ?? { kind: 'transient_error', message: outcome.message, retriable: true });
        break;
      }
      if (options.abortSignal?.aborted === true) {
        state.fail(new CancelledError(`run cancelled after ${current}`).toInfo());
        break;
      }
      state.advance(outcome.next);
    }

    const report: RunReport = {
      runId: state.runId,
      state: state.snapshot(),
      steps,
      providers: health.snapshot(),
    };
    if (state.error !== undefined) {
      report.error = state.error;
    } else if (state.result !== undefined) {
      report.result = state.result;
      const code = extractSolution(state.result);
      if (code !== undefined) report.code = code;
    }
    const elapsed = Date.now() - startedAt;
    const summary = report.error !== undefined
      ? `run failed [${report.error.kind.toUpperCase()}] ${report.error.message}`
      : `run completed: ${String(steps.length)} steps`;
    this.log(state, 'FIN', 'event', Agent.REMOTE_RUN, `${summary} in ${String(elapsed)}ms`, report.error !== undefined);
    return report;
  }

  private resolveChain(): readonly string[] {
    if (this.chain !== undefined) return this.chain;
    return [this.factory.getActive().name];
  }

  private async executeStep(step: WorkingStepKind, state: AgentState, context: StepContext): Promise<StepResult> {
    this.log(state, 'VRB', 'request', `step:${step}`, 'step started', false, step);
    try {
      return await STEPS[step].execute(state, context);
    } catch (error) {
      const info = toErrorInfo(error);
      return { success: false, message: `${step} failed: ${info.message}`, next: 'END', error: info };
    }
  }

  private log(state: AgentState, severity: LogEntry['severity'], direction: LogEntry['direction'], remoteIdentifier: string, message: string, fatal = false, step?: StepKind): void {
    if (this.onLog === undefined) return;
    const entry: LogEntry = {
      timestamp: Date.now(),
      severity,
      type: remoteIdentifier.startsWith('step:') ? 'step' : 'agent',
      direction,
      remoteIdentifier,
      fatal,
      message,
      runId: state.runId,
    };
    if (step !== undefined) entry.step = step;
    this.onLog(entry);
  }
}
