// Library entry point
export { Agent, DEFAULT_VERIFY_RETRIES, parseRunOverrides } from './agent.js';
export type { AgentOptions, RunOptions, RunReport, StepRecord } from './agent.js';
export { AgentState } from './agent-state.js';
export type { AgentStateSnapshot } from './agent-state.js';
export { API_KEY_ENV, DEFAULT_PROVIDER, createProviderFactory, loadConfiguration, resolveDefaults, resolveSettings } from './config.js';
export type { EnvDefaults, FileConfig, ProviderSettings, SolverSettings } from './config.js';
export {
  AgentError,
  APIKeyError,
  CancelledError,
  ConfigError,
  EmptyResponseError,
  ERROR_KIND_MEANINGS,
  InvalidModelError,
  MalformedRequestError,
  RetryError,
  TemperatureError,
  TransientProviderError,
  isAgentError,
  toErrorInfo,
} from './errors.js';
export { makeLogCallback } from './log-sink-tty.js';
export { StructuredLogger, createStructuredLogger } from './logging/structured-logger.js';
export type { LogFormat, StructuredLoggerOptions } from './logging/structured-logger.js';
export { BaseLLMProvider } from './llm-providers/base.js';
export { MODEL_CATALOG, defaultModelFor, listModels, supportsCapability } from './llm-providers/model-catalog.js';
export { ProviderFactory, registerBuiltinProviders } from './llm-providers/provider-factory.js';
export type { FallbackOptions, FallbackResult, ProviderBuilder, ProviderFactoryOptions, StreamFallbackOptions } from './llm-providers/provider-factory.js';
export { ProviderHealth } from './llm-providers/provider-health.js';
export type { ProviderStats } from './llm-providers/provider-health.js';
export { DEFAULT_BACKOFF, computeBackoffMs, withRetry } from './llm-providers/retry-policy.js';
export type { BackoffPolicy, RetryOptions } from './llm-providers/retry-policy.js';
export { assistantMessage, createMessage, systemMessage, toolMessage, userMessage } from './messages.js';
export { extractSolution } from './solution.js';
export { parseVerdict } from './verdict.js';
export type { Verdict } from './verdict.js';
export type {
  ChunkCallback,
  Completion,
  ErrorInfo,
  ErrorKind,
  LLMProvider,
  LogCallback,
  LogEntry,
  Message,
  MessageRole,
  ProviderConfig,
  ProviderKind,
  RunOverrides,
  StepKind,
  StepResult,
  TokenUsage,
} from './types.js';
