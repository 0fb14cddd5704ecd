import {
  APIKeyError,
  AgentError,
  InvalidModelError,
  MalformedRequestError,
  TransientProviderError,
  describeError,
  isAgentError,
} from '../errors.js';
import { isPlainObject } from '../utils.js';

export type LlmErrorKind =
  | 'rate_limit'
  | 'auth_error'
  | 'quota_exceeded'
  | 'model_error'
  | 'timeout'
  | 'network_error';

const MESSAGE_KIND_PATTERNS: Record<LlmErrorKind, string[]> = {
  rate_limit: ['rate limit', 'ratelimit', 'rate_limit', 'too many requests', 'overload', 'resource exhausted'],
  auth_error: ['authentication', 'unauthorized', 'invalid api key', 'api key not valid', 'unauthenticated', 'permission denied', 'forbidden'],
  quota_exceeded: ['quota', 'billing', 'insufficient_quota', 'payment required', 'credits'],
  model_error: ['model not found', 'unknown model', 'invalid model', 'unsupported model', 'invalid request', 'bad request'],
  timeout: ['timeout', 'timed out', 'deadline exceeded', 'aborted', 'etimedout', 'econnaborted'],
  network_error: ['network', 'connection', 'socket hang up', 'epipe', 'eai_again', 'fetch failed', 'dns', 'tls'],
};

const STATUS_KIND_MAP = new Map<number, LlmErrorKind>([
  [429, 'rate_limit'],
  [401, 'auth_error'],
  [403, 'auth_error'],
  [402, 'quota_exceeded'],
  [400, 'model_error'],
  [404, 'model_error'],
  [408, 'timeout'],
  [504, 'timeout'],
]);

const NAME_KIND_MAP = new Map<string, LlmErrorKind>([
  ['ratelimiterror', 'rate_limit'],
  ['authenticationerror', 'auth_error'],
  ['ai_loadapikeyerror', 'auth_error'],
  ['loadapikeyerror', 'auth_error'],
  ['badrequesterror', 'model_error'],
  ['ai_nosuchmodelerror', 'model_error'],
  ['nosuchmodelerror', 'model_error'],
  ['timeouterror', 'timeout'],
  ['aborterror', 'timeout'],
  ['networkerror', 'network_error'],
  ['fetcherror', 'network_error'],
]);

const CODE_KIND_MAP = new Map<string, LlmErrorKind>([
  ['rate_limit_exceeded', 'rate_limit'],
  ['resource_exhausted', 'rate_limit'],
  ['invalid_api_key', 'auth_error'],
  ['unauthenticated', 'auth_error'],
  ['permission_denied', 'auth_error'],
  ['insufficient_quota', 'quota_exceeded'],
  ['model_not_found', 'model_error'],
  ['invalid_request_error', 'model_error'],
  ['invalid_argument', 'model_error'],
  ['etimedout', 'timeout'],
  ['econnaborted', 'timeout'],
  ['econnreset', 'network_error'],
  ['enotfound', 'network_error'],
  ['econnrefused', 'network_error'],
  ['eai_again', 'network_error'],
]);

const UNKNOWN_MODEL_PATTERNS = ['model not found', 'unknown model', 'invalid model', 'unsupported model', 'is not found for api version'];

const KIND_PRECEDENCE: LlmErrorKind[] = ['rate_limit', 'auth_error', 'quota_exceeded', 'model_error', 'timeout', 'network_error'];

const normalize = (value: string | undefined): string | undefined =>
  typeof value === 'string' ? value.trim().toLowerCase() : undefined;

export const classifyLlmErrorKindFromMessage = (message: string | undefined): LlmErrorKind | undefined => {
  const normalized = normalize(message);
  if (normalized === undefined || normalized.length === 0) return undefined;
  return KIND_PRECEDENCE.find((kind) => MESSAGE_KIND_PATTERNS[kind].some((pattern) => normalized.includes(pattern)));
};

export const classifyLlmErrorKind = (input: { status: number; name: string; code?: string; message?: string }): LlmErrorKind | undefined => {
  const statusKind = STATUS_KIND_MAP.get(input.status);
  const nameKey = normalize(input.name);
  const codeKey = normalize(input.code);
  const nameKind = nameKey !== undefined ? NAME_KIND_MAP.get(nameKey) : undefined;
  const codeKind = codeKey !== undefined ? CODE_KIND_MAP.get(codeKey) : undefined;
  const messageKind = classifyLlmErrorKindFromMessage(input.message);
  const found = KIND_PRECEDENCE.find((kind) =>
    statusKind === kind || nameKind === kind || codeKind === kind || messageKind === kind);
  if (found !== undefined) return found;
  if (input.status >= 500) return 'network_error';
  return undefined;
};

interface ErrorFacts {
  status: number;
  name: string;
  code?: string;
  message: string;
  retryAfterMs?: number;
}

// own enumerable and non-enumerable fields of an Error or plain object
const errorFields = (value: unknown): Record<string, unknown> | undefined => {
  if (isPlainObject(value)) return value;
  if (!(value instanceof Error)) return undefined;
  return Object.fromEntries(Object.getOwnPropertyNames(value).map((key): [string, unknown] => [key, Reflect.get(value, key)]));
};

// SDK errors wrap the upstream failure in `lastError`, `cause` or `errors[]`
const unwrap = (error: unknown): unknown => {
  let current: unknown = error;
  // eslint-disable-next-line functional/no-loop-statements
  for (let depth = 0; depth < 4; depth++) {
    const record = errorFields(current);
    if (record === undefined) break;
    if (record.lastError !== undefined) { current = record.lastError; continue; }
    const status = record.statusCode ?? record.status;
    if (typeof status === 'number') break;
    if (record.cause !== undefined) { current = record.cause; continue; }
    const errors = record.errors;
    if (Array.isArray(errors) && errors.length > 0) { current = errors.at(-1); continue; }
    break;
  }
  return current;
};

const readHeader = (headers: unknown, key: string): string | undefined => {
  if (!isPlainObject(headers)) return undefined;
  const entry = Object.entries(headers).find(([name]) => name.toLowerCase() === key);
  const value = entry?.[1];
  return typeof value === 'string' ? value : undefined;
};

const parseRetryAfter = (value: string | undefined): number | undefined => {
  if (value === undefined) return undefined;
  const seconds = Number.parseFloat(value);
  if (Number.isFinite(seconds) && seconds >= 0) return Math.trunc(seconds * 1000);
  const date = Date.parse(value);
  if (Number.isFinite(date)) return Math.max(0, date - Date.now());
  return undefined;
};

export function extractErrorFacts(error: unknown): ErrorFacts {
  const primary = unwrap(error);
  const record = errorFields(primary) ?? {};
  const statusRaw = record.statusCode ?? record.status;
  const status = typeof statusRaw === 'number' && Number.isFinite(statusRaw) ? statusRaw : 0;
  const name = typeof record.name === 'string' ? record.name : (primary instanceof Error ? primary.name : '');
  const codeRaw = record.code;
  const code = typeof codeRaw === 'string' ? codeRaw : (typeof codeRaw === 'number' ? String(codeRaw) : undefined);
  const message = describeError(primary);
  const retryAfterMs = parseRetryAfter(readHeader(record.responseHeaders, 'retry-after'));
  const facts: ErrorFacts = { status, name, message };
  if (code !== undefined) facts.code = code;
  if (retryAfterMs !== undefined) facts.retryAfterMs = retryAfterMs;
  return facts;
}

/**
 * Classify any failure raised while calling a provider into the agent's
 * error taxonomy. Unclassifiable failures count as transient.
 */
export function mapProviderError(error: unknown, provider: string, model?: string): AgentError {
  if (isAgentError(error)) return error;
  const facts = extractErrorFacts(error);
  const kind = classifyLlmErrorKind(facts);
  const opts = { provider, cause: error };
  const prefix = facts.status > 0 ? `${provider} (${String(facts.status)})` : provider;
  const message = `${prefix}: ${facts.message}`;
  switch (kind) {
    case 'rate_limit':
      return new TransientProviderError('rate_limit', message, { ...opts, retryAfterMs: facts.retryAfterMs });
    case 'auth_error':
      return new APIKeyError(message, opts);
    case 'quota_exceeded':
      // account-level rejection: handled like a credential failure
      return new APIKeyError(message, opts);
    case 'model_error': {
      const lowered = facts.message.toLowerCase();
      const unknownModel = normalize(facts.name)?.includes('nosuchmodel') === true
        || facts.code === 'model_not_found'
        || UNKNOWN_MODEL_PATTERNS.some((pattern) => lowered.includes(pattern));
      if (unknownModel) return new InvalidModelError(model ?? 'unknown', message, opts);
      return new MalformedRequestError(message, opts);
    }
    case 'timeout':
      return new TransientProviderError('timeout', message, opts);
    case 'network_error':
      return new TransientProviderError(facts.status >= 500 ? 'server' : 'network', message, opts);
    case undefined:
      return new TransientProviderError('unknown', message, opts);
  }
}
