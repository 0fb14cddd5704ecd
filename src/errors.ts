import type { ErrorInfo, ErrorKind } from './types.js';

export interface ErrorKindMeaning {
  retriable: boolean;
  summary: string;
}

export const ERROR_KIND_MEANINGS: Record<ErrorKind, ErrorKindMeaning> = {
  config_error: {
    retriable: false,
    summary: 'Invalid or missing configuration value; fails at validation time.',
  },
  temperature_error: {
    retriable: false,
    summary: 'Sampling temperature outside the accepted range.',
  },
  api_key_error: {
    retriable: false,
    summary: 'Authentication rejected by the provider; escalated immediately.',
  },
  empty_response_error: {
    retriable: true,
    summary: 'Provider returned no usable content.',
  },
  invalid_model_error: {
    retriable: false,
    summary: 'Requested model is unknown to the provider.',
  },
  retry_error: {
    retriable: false,
    summary: 'A provider or the whole fallback chain exhausted its attempts.',
  },
  transient_error: {
    retriable: true,
    summary: 'Network, timeout or rate-limit failure; retried with backoff.',
  },
  malformed_request_error: {
    retriable: false,
    summary: 'Provider rejected the request as malformed.',
  },
  cancelled: {
    retriable: false,
    summary: 'Run cancelled at a step checkpoint.',
  },
};

export type TransientReason = 'network' | 'timeout' | 'rate_limit' | 'server' | 'unknown';

export class AgentError extends Error {
  readonly kind: ErrorKind;
  readonly retriable: boolean;
  readonly provider?: string;

  constructor(kind: ErrorKind, message: string, opts?: { provider?: string; cause?: unknown; retriable?: boolean }) {
    super(message, opts?.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = 'AgentError';
    this.kind = kind;
    this.retriable = opts?.retriable ?? ERROR_KIND_MEANINGS[kind].retriable;
    if (opts?.provider !== undefined) {
      this.provider = opts.provider;
    }
  }

  toInfo(): ErrorInfo {
    const info: ErrorInfo = { kind: this.kind, message: this.message, retriable: this.retriable };
    if (this.provider !== undefined) info.provider = this.provider;
    return info;
  }
}

export class ConfigError extends AgentError {
  readonly field?: string;

  constructor(message: string, opts?: { field?: string; cause?: unknown; kind?: Extract<ErrorKind, 'config_error' | 'temperature_error'> }) {
    super(opts?.kind ?? 'config_error', message, { cause: opts?.cause });
    this.name = 'ConfigError';
    if (opts?.field !== undefined) {
      this.field = opts.field;
    }
  }

  override toInfo(): ErrorInfo {
    const info = super.toInfo();
    if (this.field !== undefined) info.field = this.field;
    return info;
  }
}

export class TemperatureError extends ConfigError {
  constructor(message: string, opts?: { cause?: unknown }) {
    super(message, { field: 'temperature', cause: opts?.cause, kind: 'temperature_error' });
    this.name = 'TemperatureError';
  }
}

export class APIKeyError extends AgentError {
  constructor(message: string, opts?: { provider?: string; cause?: unknown }) {
    super('api_key_error', message, opts);
    this.name = 'APIKeyError';
  }
}

export class EmptyResponseError extends AgentError {
  constructor(message: string, opts?: { provider?: string; cause?: unknown }) {
    super('empty_response_error', message, opts);
    this.name = 'EmptyResponseError';
  }
}

export class InvalidModelError extends AgentError {
  readonly model: string;

  constructor(model: string, message: string, opts?: { provider?: string; cause?: unknown }) {
    super('invalid_model_error', message, opts);
    this.name = 'InvalidModelError';
    this.model = model;
  }
}

export class TransientProviderError extends AgentError {
  readonly reason: TransientReason;
  readonly retryAfterMs?: number;

  constructor(reason: TransientReason, message: string, opts?: { provider?: string; cause?: unknown; retryAfterMs?: number }) {
    super('transient_error', message, opts);
    this.name = 'TransientProviderError';
    this.reason = reason;
    if (opts?.retryAfterMs !== undefined) {
      this.retryAfterMs = opts.retryAfterMs;
    }
  }
}

export class MalformedRequestError extends AgentError {
  constructor(message: string, opts?: { provider?: string; cause?: unknown }) {
    super('malformed_request_error', message, opts);
    this.name = 'MalformedRequestError';
  }
}

export class CancelledError extends AgentError {
  constructor(message = 'Run cancelled') {
    super('cancelled', message);
    this.name = 'CancelledError';
  }
}

export class RetryError extends AgentError {
  readonly failures: readonly AgentError[];

  constructor(message: string, failures: readonly AgentError[], opts?: { provider?: string }) {
    super('retry_error', message, { provider: opts?.provider, cause: failures.at(-1) });
    this.name = 'RetryError';
    this.failures = failures;
  }

  override toInfo(): ErrorInfo {
    return { ...super.toInfo(), failures: this.failures.map((failure) => failure.toInfo()) };
  }
}

export const isAgentError = (value: unknown): value is AgentError => value instanceof AgentError;

/** Errors that abort a provider link without consuming its remaining attempts. */
export const isNonRetryable = (error: AgentError): boolean => !error.retriable;

export const describeError = (value: unknown): string => {
  if (value instanceof Error && typeof value.message === 'string') return value.message;
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return value.toString();
  }
  if (value === null) return 'null';
  if (typeof value === 'object') {
    try {
      return JSON.stringify(value);
    } catch {
      return '[unserializable-error]';
    }
  }
  return 'unknown_error';
};

export const toErrorInfo = (value: unknown): ErrorInfo => {
  if (isAgentError(value)) return value.toInfo();
  return { kind: 'transient_error', message: describeError(value), retriable: true };
};
