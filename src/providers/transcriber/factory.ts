/**
 * Transcriber Factory
 */

import { createOpenAI } from '@ai-sdk/openai';
import type { TranscriptionModelV3 } from '@ai-sdk/provider';
import type { TranscriptionProvider } from '@/config/schema';
import { VercelTranscriber } from './client';
import type { Transcriber } from './types';

export const DEFAULT_TRANSCRIPTION_MODEL = 'whisper-1';

export interface CreateTranscriberOptions {
  apiKey?: string;
  baseUrl?: string;
}

export function createTranscriber(
  provider: TranscriptionProvider,
  model: string = DEFAULT_TRANSCRIPTION_MODEL,
  options: CreateTranscriberOptions = {}
): Transcriber {
  return new VercelTranscriber(getTranscriptionModel(provider, model, options));
}

function getTranscriptionModel(
  provider: TranscriptionProvider,
  model: string,
  options: CreateTranscriberOptions
): TranscriptionModelV3 {
  switch (provider) {
    case 'openai': {
      const openai = createOpenAI({ apiKey: options.apiKey });
      return openai.transcription(model);
    }

    case 'openai-compatible': {
      // Whisper-style servers expose the OpenAI /audio/transcriptions route
      if (!options.baseUrl) {
        throw new Error('baseUrl required for openai-compatible provider');
      }
      const compatible = createOpenAI({ apiKey: options.apiKey ?? '', baseURL: options.baseUrl });
      return compatible.transcription(model);
    }

    default: {
      const _exhaustive: never = provider;
      throw new Error(`Unknown provider: ${_exhaustive}`);
    }
  }
}
