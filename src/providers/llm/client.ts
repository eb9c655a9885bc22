/**
 * AI SDK LLM Client
 *
 * One generateText call per completion. SDK retries are off so that the
 * run's RetryPolicy sees every failure, already classified.
 */

import type { LanguageModelV3 } from '@ai-sdk/provider';
import { generateText } from 'ai';
import { sdkError } from '../errors';
import type { CompletionOptions, LLMClient, Message } from './types';

export class VercelLLMClient implements LLMClient {
  readonly modelId: string;

  constructor(private readonly model: LanguageModelV3) {
    this.modelId = model.modelId;
  }

  async complete(messages: Message[], options: CompletionOptions = {}): Promise<string> {
    try {
      const { text } = await generateText({
        model: this.model,
        messages,
        maxOutputTokens: options.maxTokens,
        temperature: options.temperature,
        maxRetries: 0
      });
      return text;
    } catch (error) {
      throw sdkError('llm', `Completion with ${this.modelId}`, error);
    }
  }
}
