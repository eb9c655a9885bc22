/**
 * LLM Client Factory
 *
 * Maps the configured provider to an AI SDK language model. Ollama is
 * reached through its OpenAI-compatible endpoint.
 */

import { createAnthropic } from '@ai-sdk/anthropic';
import { createGoogleGenerativeAI } from '@ai-sdk/google';
import { createOpenAI } from '@ai-sdk/openai';
import { createOpenAICompatible } from '@ai-sdk/openai-compatible';
import type { LanguageModelV3 } from '@ai-sdk/provider';
import type { LLMConfig, LLMProvider } from '@/config/schema';
import { ProviderError } from '../errors';
import { VercelLLMClient } from './client';
import type { LLMClient } from './types';

export const DEFAULT_OLLAMA_BASE_URL = 'http://localhost:11434/v1';

type ProviderOptions = Pick<LLMConfig, 'apiKey' | 'baseUrl' | 'providerName'>;
type ModelBuilder = (model: string, options: ProviderOptions) => LanguageModelV3;

const MODEL_BUILDERS: Record<LLMProvider, ModelBuilder> = {
  openai: (model, { apiKey }) => createOpenAI({ apiKey })(model),

  anthropic: (model, { apiKey }) => createAnthropic({ apiKey })(model),

  google: (model, { apiKey }) => createGoogleGenerativeAI({ apiKey })(model),

  // Ollama ignores the key, the SDK still wants one
  ollama: (model, { baseUrl }) =>
    createOpenAICompatible({
      name: 'ollama',
      baseURL: baseUrl ?? DEFAULT_OLLAMA_BASE_URL,
      apiKey: 'ollama'
    }).languageModel(model),

  'openai-compatible': (model, { apiKey, baseUrl, providerName }) => {
    if (!baseUrl) {
      throw new ProviderError(
        'baseUrl required for provider openai-compatible',
        'CONFIGURATION_ERROR',
        'llm'
      );
    }
    return createOpenAICompatible({
      name: providerName ?? 'openai-compatible',
      baseURL: baseUrl,
      apiKey: apiKey ?? ''
    }).languageModel(model);
  }
};

/**
 * Build the client for `config.llm`. The model comes from `defaults`;
 * summary and extraction only override sampling.
 */
export function createLLMClient(config: LLMConfig): LLMClient {
  const build = MODEL_BUILDERS[config.provider];
  return new VercelLLMClient(build(config.defaults.model, config));
}
