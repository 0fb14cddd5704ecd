import { randomUUID } from 'node:crypto';

import type { ErrorInfo, Message, StepKind } from './types.js';

import { ConfigError } from './errors.js';

export interface AgentStateSnapshot {
  runId: string;
  messages: readonly Message[];
  currentStep: StepKind;
  context: Readonly<Record<string, unknown>>;
  error?: ErrorInfo;
  result?: string;
}

/**
 * Mutable record threaded through one run. History is append-only;
 * once the run reaches END exactly one of `result` / `error` is set.
 * Owned by a single run and never shared.
 */
export class AgentState {
  readonly runId: string;
  private readonly history: Message[] = [];
  private readonly contextData = new Map<string, unknown>();
  private step: StepKind = 'UNDERSTAND';
  private errorInfo?: ErrorInfo;
  private resultText?: string;

  constructor(opts: { runId?: string } = {}) {
    this.runId = opts.runId ?? randomUUID();
  }

  get messages(): readonly Message[] {
    return [...this.history];
  }

  get currentStep(): StepKind {
    return this.step;
  }

  get error(): ErrorInfo | undefined {
    return this.errorInfo;
  }

  get result(): string | undefined {
    return this.resultText;
  }

  get isTerminal(): boolean {
    return this.step === 'END';
  }

  get context(): Readonly<Record<string, unknown>> {
    return Object.fromEntries(this.contextData.entries());
  }

  append(message: Message): void {
    this.assertOpen('append a message');
    if (message.role === 'assistant' && message.content.trim().length === 0) {
      throw new ConfigError('empty assistant content cannot be recorded in history', { field: 'content' });
    }
    this.history.push(message);
  }

  getContext(key: string): unknown {
    return this.contextData.get(key);
  }

  getContextString(key: string): string | undefined {
    const value = this.contextData.get(key);
    return typeof value === 'string' ? value : undefined;
  }

  setContext(key: string, value: unknown): void {
    this.assertOpen('update context');
    this.contextData.set(key, value);
  }

  setResult(text: string): void {
    this.assertOpen('set a result');
    this.resultText = text;
  }

  advance(next: StepKind): void {
    this.assertOpen(`advance to ${next}`);
    if (next === 'END' && this.resultText === undefined) {
      throw new ConfigError('cannot finish a run without a result or an error', { field: 'result' });
    }
    this.step = next;
  }

  /** Terminal failure: records the error, drops any partial result, moves to END. */
  fail(error: ErrorInfo): void {
    this.assertOpen('record an error');
    this.errorInfo = error;
    this.resultText = undefined;
    this.step = 'END';
  }

  snapshot(): AgentStateSnapshot {
    const snapshot: AgentStateSnapshot = {
      runId: this.runId,
      messages: this.messages,
      currentStep: this.step,
      context: this.context,
    };
    if (this.errorInfo !== undefined) snapshot.error = this.errorInfo;
    if (this.resultText !== undefined) snapshot.result = this.resultText;
    return snapshot;
  }

  private assertOpen(action: string): void {
    if (this.step === 'END') {
      throw new ConfigError(`cannot ${action}: run already finished`, { field: 'currentStep' });
    }
  }
}
