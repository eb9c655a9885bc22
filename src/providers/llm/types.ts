/**
 * LLM Contract
 *
 * The pipeline's agents send a system prompt plus one user message and read
 * back plain text. Nothing here streams or calls tools.
 */

import type { LLMProvider } from '@/config/schema';

export type { LLMProvider };

export type MessageRole = 'system' | 'user' | 'assistant';

export interface Message {
  role: MessageRole;
  content: string;
}

/** Per-call sampling; omitted fields use the provider's defaults */
export interface CompletionOptions {
  maxTokens?: number;
  temperature?: number;
}

export interface LLMClient {
  readonly modelId: string;

  /**
   * Resolve to the complete assistant text.
   * Rejects with a ProviderError; retrying is up to the caller.
   */
  complete(messages: Message[], options?: CompletionOptions): Promise<string>;
}
