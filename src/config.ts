import fs from 'node:fs';
import path from 'node:path';

import * as yaml from 'js-yaml';
import { z } from 'zod';

import type { ProviderFactoryOptions } from './llm-providers/provider-factory.js';
import type { ProviderConfig, ProviderKind } from './types.js';

import { DEFAULT_VERIFY_RETRIES } from './agent.js';
import { parseDurationMsStrict } from './duration.js';
import { ConfigError, TemperatureError, describeError } from './errors.js';
import { PROVIDER_KINDS, ProviderFactory } from './llm-providers/provider-factory.js';
import { warn } from './utils.js';

export const DEFAULT_PROVIDER: ProviderKind = 'google';

const CONFIG_FILE_CANDIDATES = ['.solver.yaml', '.solver.yml', '.solver.json'];

export const API_KEY_ENV: Readonly<Partial<Record<ProviderKind, string>>> = {
  google: 'GOOGLE_GENERATIVE_AI_API_KEY',
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
};

type Env = Readonly<Record<string, string | undefined>>;

const blankToUndefined = (value: unknown): unknown => (
  typeof value === 'string' && value.trim().length === 0 ? undefined : value
);

const optionalNumber = (schema: z.ZodNumber) => z.preprocess(blankToUndefined, z.coerce.number().pipe(schema).optional());
const optionalString = z.preprocess(blankToUndefined, z.string().trim().min(1).optional());

const EnvSchema = z.object({
  SOLVER_PROVIDER: optionalString,
  SOLVER_MODEL: optionalString,
  SOLVER_TEMPERATURE: optionalNumber(z.number().min(0).max(1)),
  SOLVER_MAX_TOKENS: optionalNumber(z.number().int().positive()),
  SOLVER_TIMEOUT: optionalString,
  SOLVER_RETRY_COUNT: optionalNumber(z.number().int().nonnegative()),
  SOLVER_FALLBACK_CHAIN: optionalString,
  SOLVER_VERIFY_RETRIES: optionalNumber(z.number().int().nonnegative()),
  GOOGLE_GENERATIVE_AI_API_KEY: optionalString,
  OPENAI_API_KEY: optionalString,
  ANTHROPIC_API_KEY: optionalString,
  OLLAMA_BASE_URL: optionalString,
});

export interface EnvDefaults {
  provider: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
  retryCount?: number;
  fallbackChain: string[];
  verifyRetries: number;
  apiKeys: Partial<Record<ProviderKind, string>>;
  ollamaBaseUrl?: string;
}

const splitList = (value: string | undefined): string[] => (
  value === undefined ? [] : value.split(',').map((item) => item.trim()).filter((item) => item.length > 0)
);

const throwConfigIssue = (issue: z.ZodIssue | undefined, origin: string): never => {
  const field = issue !== undefined && issue.path.length > 0 ? issue.path.map((p) => String(p)).join('.') : 'config';
  const message = `${origin}: invalid ${field}: ${issue?.message ?? 'invalid value'}`;
  if (field === 'SOLVER_TEMPERATURE' || field.endsWith('.temperature')) {
    throw new TemperatureError(message);
  }
  throw new ConfigError(message, { field });
};

/** Process defaults from environment variables; read once at start-up. */
export function resolveDefaults(env: Env = process.env): EnvDefaults {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) return throwConfigIssue(parsed.error.issues[0], 'environment');
  const vars = parsed.data;
  const defaults: EnvDefaults = {
    provider: vars.SOLVER_PROVIDER ?? DEFAULT_PROVIDER,
    fallbackChain: splitList(vars.SOLVER_FALLBACK_CHAIN),
    verifyRetries: vars.SOLVER_VERIFY_RETRIES ?? DEFAULT_VERIFY_RETRIES,
    apiKeys: {},
  };
  if (vars.SOLVER_MODEL !== undefined) defaults.model = vars.SOLVER_MODEL;
  if (vars.SOLVER_TEMPERATURE !== undefined) defaults.temperature = vars.SOLVER_TEMPERATURE;
  if (vars.SOLVER_MAX_TOKENS !== undefined) defaults.maxTokens = vars.SOLVER_MAX_TOKENS;
  if (vars.SOLVER_TIMEOUT !== undefined) defaults.timeoutMs = parseDurationMsStrict(vars.SOLVER_TIMEOUT, 'SOLVER_TIMEOUT');
  if (vars.SOLVER_RETRY_COUNT !== undefined) defaults.retryCount = vars.SOLVER_RETRY_COUNT;
  if (vars.GOOGLE_GENERATIVE_AI_API_KEY !== undefined) defaults.apiKeys.google = vars.GOOGLE_GENERATIVE_AI_API_KEY;
  if (vars.OPENAI_API_KEY !== undefined) defaults.apiKeys.openai = vars.OPENAI_API_KEY;
  if (vars.ANTHROPIC_API_KEY !== undefined) defaults.apiKeys.anthropic = vars.ANTHROPIC_API_KEY;
  if (vars.OLLAMA_BASE_URL !== undefined) defaults.ollamaBaseUrl = vars.OLLAMA_BASE_URL;
  return defaults;
}

const ProviderKindSchema = z.enum(['google', 'openai', 'anthropic', 'ollama', 'test-llm']);

const FileProviderSchema = z.object({
  type: ProviderKindSchema,
  model: z.string().min(1).optional(),
  temperature: z.number().optional(),
  maxTokens: z.number().optional(),
  timeout: z.union([z.number(), z.string()]).optional(),
  retryCount: z.number().optional(),
  apiKey: z.string().optional(),
  baseUrl: z.string().optional(),
}).strict();

const FileConfigSchema = z.object({
  provider: z.string().min(1).optional(),
  fallbackChain: z.array(z.string().min(1)).optional(),
  verifyRetries: z.number().int().nonnegative().optional(),
  stream: z.boolean().optional(),
  providers: z.record(z.string(), FileProviderSchema).optional(),
}).strict();

export type FileConfig = z.infer<typeof FileConfigSchema>;

function expandEnv(str: string, env: Env, location: string): string {
  return str.replace(/\$\{([^}]+)\}/g, (_m: string, name: string) => {
    const value = env[name];
    if (value === undefined) {
      throw new ConfigError(`unresolved variable \${${name}} at ${location}`, { field: location });
    }
    return value;
  });
}

function expandDeep(obj: unknown, env: Env, chain: string[] = []): unknown {
  if (typeof obj === 'string') return expandEnv(obj, env, chain.join('.') || '(root)');
  if (Array.isArray(obj)) return obj.map((v, index) => expandDeep(v, env, [...chain, String(index)]));
  if (obj !== null && typeof obj === 'object') {
    return Object.entries(obj).reduce<Record<string, unknown>>((acc, [k, v]) => {
      acc[k] = expandDeep(v, env, [...chain, k]);
      return acc;
    }, {});
  }
  return obj;
}

export function findConfigPath(configPath: string | undefined, cwd: string): string | undefined {
  if (typeof configPath === 'string' && configPath.length > 0) {
    const resolved = path.resolve(cwd, configPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`configuration file not found: ${configPath}`, { field: 'config' });
    }
    return resolved;
  }
  const found = CONFIG_FILE_CANDIDATES
    .map((name) => path.join(cwd, name))
    .filter((candidate) => fs.existsSync(candidate));
  if (found.length > 1) {
    warn(`several configuration files in ${cwd}; using ${path.basename(found[0])}`);
  }
  return found[0];
}

/**
 * Load the optional JSON or YAML configuration file. Without an explicit
 * path, `.solver.yaml`, `.solver.yml` and `.solver.json` in `cwd` are tried.
 */
export function loadConfiguration(configPath?: string, opts: { cwd?: string; env?: Env } = {}): FileConfig | undefined {
  const resolved = findConfigPath(configPath, opts.cwd ?? process.cwd());
  if (resolved === undefined) return undefined;
  let raw: string;
  try {
    raw = fs.readFileSync(resolved, 'utf-8');
  } catch (e) {
    throw new ConfigError(`failed to read configuration file ${resolved}: ${describeError(e)}`, { field: 'config', cause: e });
  }
  let document: unknown;
  try {
    document = resolved.endsWith('.json') ? JSON.parse(raw) : yaml.load(raw);
  } catch (e) {
    throw new ConfigError(`invalid ${resolved.endsWith('.json') ? 'JSON' : 'YAML'} in configuration file ${resolved}: ${describeError(e)}`, { field: 'config', cause: e });
  }
  const parsed = FileConfigSchema.safeParse(expandDeep(document ?? {}, opts.env ?? process.env));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    if (issue !== undefined && issue.code === 'unrecognized_keys') {
      const where = issue.path.length > 0 ? `${issue.path.map((p) => String(p)).join('.')}.` : '';
      throw new ConfigError(`unknown configuration key ${issue.keys.map((key) => `${where}${key}`).join(', ')} in ${resolved}`, { field: issue.keys.join(', ') });
    }
    return throwConfigIssue(issue, resolved);
  }
  return parsed.data;
}

export interface ProviderSettings {
  type: ProviderKind;
  config: Partial<ProviderConfig>;
}

export interface SolverSettings {
  provider: string;
  fallbackChain: string[];
  verifyRetries: number;
  stream: boolean;
  providers: Record<string, ProviderSettings>;
}

const builtinProviderSettings = (kind: ProviderKind, env: EnvDefaults): ProviderSettings => {
  const config: Partial<ProviderConfig> = {};
  if (env.temperature !== undefined) config.temperature = env.temperature;
  if (env.maxTokens !== undefined) config.maxTokens = env.maxTokens;
  if (env.timeoutMs !== undefined) config.timeoutMs = env.timeoutMs;
  if (env.retryCount !== undefined) config.retryCount = env.retryCount;
  if (env.model !== undefined && env.provider === kind) config.model = env.model;
  const apiKey = env.apiKeys[kind];
  if (apiKey !== undefined) config.apiKey = apiKey;
  if (kind === 'ollama' && env.ollamaBaseUrl !== undefined) config.baseUrl = env.ollamaBaseUrl;
  return { type: kind, config };
};

/**
 * Merge environment defaults with the configuration file. File entries
 * override the built-in provider of the same name or add a named variant.
 */
export function resolveSettings(env: EnvDefaults, file?: FileConfig): SolverSettings {
  const providers: Record<string, ProviderSettings> = Object.fromEntries(
    PROVIDER_KINDS.map((kind) => [kind, builtinProviderSettings(kind, env)])
  );
  Object.entries(file?.providers ?? {}).forEach(([name, entry]) => {
    const existing = Object.prototype.hasOwnProperty.call(providers, name) ? providers[name] : undefined;
    const base = existing?.type === entry.type ? existing.config : builtinProviderSettings(entry.type, env).config;
    const config: Partial<ProviderConfig> = { ...base };
    if (entry.model !== undefined) config.model = entry.model;
    if (entry.temperature !== undefined) config.temperature = entry.temperature;
    if (entry.maxTokens !== undefined) config.maxTokens = entry.maxTokens;
    if (entry.timeout !== undefined) config.timeoutMs = parseDurationMsStrict(entry.timeout, `providers.${name}.timeout`);
    if (entry.retryCount !== undefined) config.retryCount = entry.retryCount;
    if (entry.apiKey !== undefined) config.apiKey = entry.apiKey;
    if (entry.baseUrl !== undefined) config.baseUrl = entry.baseUrl;
    providers[name] = { type: entry.type, config };
  });
  const provider = file?.provider ?? env.provider;
  if (!Object.prototype.hasOwnProperty.call(providers, provider)) {
    throw new ConfigError(`unknown provider '${provider}' (known: ${Object.keys(providers).join(', ')})`, { field: 'provider' });
  }
  const fallbackChain = file?.fallbackChain ?? env.fallbackChain;
  const unknown = fallbackChain.filter((name) => !Object.prototype.hasOwnProperty.call(providers, name));
  if (unknown.length > 0) {
    throw new ConfigError(`unknown provider(s) in fallback chain: ${unknown.join(', ')}`, { field: 'fallbackChain' });
  }
  return {
    provider,
    fallbackChain,
    verifyRetries: file?.verifyRetries ?? env.verifyRetries,
    stream: file?.stream ?? false,
    providers,
  };
}

/** Registry populated from settings and sealed; the configured provider is made active. */
export function createProviderFactory(settings: SolverSettings, options: ProviderFactoryOptions = {}): ProviderFactory {
  const factory = new ProviderFactory(options);
  Object.entries(settings.providers).forEach(([name, entry]) => {
    factory.register(name, entry.type, { defaults: entry.config });
  });
  factory.seal();
  factory.setActive(settings.provider);
  return factory;
}
