import { createGoogleGenerativeAI } from '@ai-sdk/google';

import type { ProviderConfig, ProviderKind } from '../types.js';
import type { LanguageModel } from 'ai';

import { BaseLLMProvider } from './base.js';

export class GoogleProvider extends BaseLLMProvider {
  readonly kind: ProviderKind = 'google';
  private readonly provider: (model: string) => LanguageModel;

  constructor(name: string, config: ProviderConfig, tracedFetch?: typeof fetch) {
    super(name, config);
    const prov = createGoogleGenerativeAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      fetch: tracedFetch,
    });
    this.provider = (model: string) => prov(model);
  }

  protected createModel(modelId: string): LanguageModel {
    return this.provider(modelId);
  }

  // Gemma models served through the Gemini API reject system instructions
  protected override supportsSystemRole(modelId: string): boolean {
    return !modelId.startsWith('gemma');
  }
}
