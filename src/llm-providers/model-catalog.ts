import type { ProviderKind } from '../types.js';

import { InvalidModelError } from '../errors.js';

export type ModelCapability =
  | 'chat'
  | 'text-generation'
  | 'code-generation'
  | 'code-analysis'
  | 'streaming'
  | 'multimodal';

const TEXT_CODE: readonly ModelCapability[] = ['chat', 'text-generation', 'code-generation', 'code-analysis', 'streaming'];
const TEXT_CODE_VISION: readonly ModelCapability[] = [...TEXT_CODE, 'multimodal'];

export interface ProviderCatalogEntry {
  defaultModel: string;
  // undefined: the service hosts arbitrary models (local runtimes, scripted stubs)
  models?: Readonly<Record<string, readonly ModelCapability[]>>;
}

export const MODEL_CATALOG: Readonly<Record<ProviderKind, ProviderCatalogEntry>> = {
  google: {
    defaultModel: 'gemini-2.0-flash-lite',
    models: {
      'gemini-2.0-flash-lite': TEXT_CODE,
      'gemini-2.0-flash': TEXT_CODE_VISION,
      'gemini-2.5-flash': TEXT_CODE_VISION,
      'gemini-2.5-pro': TEXT_CODE_VISION,
      'gemini-1.5-flash': TEXT_CODE_VISION,
      'gemini-1.5-pro': TEXT_CODE_VISION,
    },
  },
  openai: {
    defaultModel: 'gpt-4.1-mini',
    models: {
      'gpt-4.1': TEXT_CODE_VISION,
      'gpt-4.1-mini': TEXT_CODE_VISION,
      'gpt-4o': TEXT_CODE_VISION,
      'gpt-4o-mini': TEXT_CODE_VISION,
      'o3-mini': TEXT_CODE,
    },
  },
  anthropic: {
    defaultModel: 'claude-3-5-haiku-latest',
    models: {
      'claude-3-5-haiku-latest': TEXT_CODE,
      'claude-3-5-sonnet-latest': TEXT_CODE_VISION,
      'claude-3-7-sonnet-latest': TEXT_CODE_VISION,
      'claude-sonnet-4-0': TEXT_CODE_VISION,
    },
  },
  ollama: {
    defaultModel: 'llama3.1',
  },
  'test-llm': {
    defaultModel: 'scripted',
  },
};

export function defaultModelFor(kind: ProviderKind): string {
  return MODEL_CATALOG[kind].defaultModel;
}

export function listModels(kind: ProviderKind): string[] {
  const models = MODEL_CATALOG[kind].models;
  return models === undefined ? [] : Object.keys(models);
}

/** Throws InvalidModelError when the provider kind does not serve `model`. */
export function assertKnownModel(kind: ProviderKind, model: string, providerName: string = kind): void {
  const models = MODEL_CATALOG[kind].models;
  if (models === undefined) return;
  if (Object.prototype.hasOwnProperty.call(models, model)) return;
  throw new InvalidModelError(
    model,
    `model '${model}' is not supported by provider '${providerName}' (known: ${Object.keys(models).join(', ')})`,
    { provider: providerName }
  );
}

export function supportsCapability(kind: ProviderKind, model: string, capability: ModelCapability): boolean {
  const models = MODEL_CATALOG[kind].models;
  if (models === undefined) return capability !== 'multimodal';
  const capabilities = Object.prototype.hasOwnProperty.call(models, model) ? models[model] : undefined;
  return capabilities?.includes(capability) === true;
}
