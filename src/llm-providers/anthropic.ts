import { createAnthropic } from '@ai-sdk/anthropic';

import type { ProviderConfig, ProviderKind } from '../types.js';
import type { LanguageModel } from 'ai';

import { BaseLLMProvider } from './base.js';

export class AnthropicProvider extends BaseLLMProvider {
  readonly kind: ProviderKind = 'anthropic';
  private readonly provider: (model: string) => LanguageModel;

  constructor(name: string, config: ProviderConfig, tracedFetch?: typeof fetch) {
    super(name, config);
    const prov = createAnthropic({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      fetch: tracedFetch,
    });
    this.provider = (model: string) => prov(model);
  }

  protected createModel(modelId: string): LanguageModel {
    return this.provider(modelId);
  }
}
