export type MessageRole = 'system' | 'user' | 'assistant' | 'tool';

export type MetadataValue =
  | string
  | number
  | boolean
  | null
  | MetadataValue[]
  | { [key: string]: MetadataValue };

export type MessageMetadata = Readonly<Record<string, MetadataValue>>;

export interface Message {
  readonly role: MessageRole;
  readonly content: string;
  readonly metadata: MessageMetadata;
  readonly toolCallId?: string;
}

export const STEP_KINDS = ['UNDERSTAND', 'PLAN', 'EXECUTE', 'VERIFY', 'END'] as const;

export type StepKind = typeof STEP_KINDS[number];

export type WorkingStepKind = Exclude<StepKind, 'END'>;

export type ProviderKind = 'google' | 'openai' | 'anthropic' | 'ollama' | 'test-llm';

export interface ProviderConfig {
  model: string;
  temperature: number;          // 0..1
  maxTokens: number;            // max output tokens
  timeoutMs: number;            // per-call cancellation bound
  retryCount: number;           // attempts granted to one fallback link
  apiKey?: string;
  baseUrl?: string;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface Completion {
  text: string;
  provider: string;
  model: string;
  latencyMs: number;
  tokens?: TokenUsage;
}

export interface CallOptions {
  abortSignal?: AbortSignal;
}

/**
 * A backing LLM service. `stream()` yields a finite, non-restartable
 * sequence of text chunks; call it again for a new attempt.
 */
export interface LLMProvider {
  readonly name: string;
  readonly kind: ProviderKind;
  readonly config: Readonly<ProviderConfig>;
  generate: (messages: readonly Message[], config?: Readonly<ProviderConfig>, options?: CallOptions) => Promise<Completion>;
  stream: (messages: readonly Message[], config?: Readonly<ProviderConfig>, options?: CallOptions) => AsyncIterable<string>;
}

export type ErrorKind =
  | 'config_error'
  | 'temperature_error'
  | 'api_key_error'
  | 'empty_response_error'
  | 'invalid_model_error'
  | 'retry_error'
  | 'transient_error'
  | 'malformed_request_error'
  | 'cancelled';

export interface ErrorInfo {
  kind: ErrorKind;
  message: string;
  retriable: boolean;
  provider?: string;
  field?: string;
  failures?: ErrorInfo[];
}

export interface StepResult {
  success: boolean;
  message: string;
  next: StepKind;
  data?: Record<string, unknown>;
  error?: ErrorInfo;
}

export interface RunOverrides {
  temperature?: number;
  maxTokens?: number;
  provider?: string;
  stream?: boolean;
  model?: string;
}

export interface LogEntry {
  timestamp: number;                    // Unix timestamp (ms)
  severity: 'VRB' | 'WRN' | 'ERR' | 'TRC' | 'FIN';
  type: 'llm' | 'step' | 'agent';
  direction: 'request' | 'response' | 'event';
  remoteIdentifier: string;             // 'provider:model', 'step:PLAN' or 'agent:<event>'
  fatal: boolean;                       // True if this caused the run to stop
  message: string;
  runId?: string;
  step?: StepKind;
  attempt?: number;
  details?: Record<string, string | number | boolean>;
  stack?: string;
}

export type LogCallback = (entry: LogEntry) => void;

export type ChunkCallback = (chunk: string, meta: { provider: string; attempt: number }) => void;
