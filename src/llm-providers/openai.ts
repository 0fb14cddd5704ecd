import { createOpenAI } from '@ai-sdk/openai';

import type { ProviderConfig, ProviderKind } from '../types.js';
import type { LanguageModel } from 'ai';

import { BaseLLMProvider } from './base.js';

export class OpenAIProvider extends BaseLLMProvider {
  readonly kind: ProviderKind = 'openai';
  private readonly provider: (model: string) => LanguageModel;

  constructor(name: string, config: ProviderConfig, tracedFetch?: typeof fetch) {
    super(name, config);
    const prov = createOpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      fetch: tracedFetch,
    });
    // chat completions keep the message list stateless between calls
    this.provider = (model: string) => prov.chat(model);
  }

  protected createModel(modelId: string): LanguageModel {
    return this.provider(modelId);
  }
}
