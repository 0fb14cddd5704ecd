import { createOllama } from 'ollama-ai-provider-v2';

import type { ProviderConfig, ProviderKind } from '../types.js';
import type { LanguageModel } from 'ai';

import { BaseLLMProvider } from './base.js';

const DEFAULT_OLLAMA_URL = 'http://localhost:11434/api';

export function normalizeOllamaBaseUrl(url?: string): string {
  if (url === undefined || url.trim().length === 0) return DEFAULT_OLLAMA_URL;
  const v = url.trim().replace(/\/+$/, '');
  // OpenAI-compatible endpoints end in /v1; the native API lives under /api
  if (/\/v1$/.test(v)) return v.replace(/\/v1$/, '/api');
  if (/\/api$/.test(v)) return v;
  return `${v}/api`;
}

export class OllamaProvider extends BaseLLMProvider {
  readonly kind: ProviderKind = 'ollama';
  private readonly provider: (model: string) => LanguageModel;

  constructor(name: string, config: ProviderConfig, tracedFetch?: typeof fetch) {
    super(name, config);
    const prov = createOllama({
      baseURL: normalizeOllamaBaseUrl(config.baseUrl),
      fetch: tracedFetch,
    });
    this.provider = (model: string) => prov(model);
  }

  protected createModel(modelId: string): LanguageModel {
    return this.provider(modelId);
  }
}
