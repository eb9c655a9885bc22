/**
 * Vercel AI SDK Transcriber
 *
 * Reads the recording from disk and sends it to a transcription model.
 */

import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import type { TranscriptionModelV3 } from '@ai-sdk/provider';
import { experimental_transcribe as transcribe } from 'ai';
import { ProviderError, sdkError } from '../errors';
import { SUPPORTED_EXTENSIONS, type Transcriber } from './types';

export function isSupportedRecording(path: string): boolean {
  const extension = extname(path).toLowerCase();
  return SUPPORTED_EXTENSIONS.some((supported) => supported === extension);
}

export class VercelTranscriber implements Transcriber {
  readonly modelId: string;

  constructor(private model: TranscriptionModelV3) {
    this.modelId = model.modelId;
  }

  async transcribe(audioPath: string): Promise<string> {
    if (!isSupportedRecording(audioPath)) {
      throw new ProviderError(
        `Unsupported recording format: ${extname(audioPath) || audioPath}`,
        'REQUEST_ERROR',
        'transcriber'
      );
    }

    let audio: Buffer;
    try {
      audio = await readFile(audioPath);
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      throw new ProviderError(`Recording not found: ${audioPath}`, 'NOT_FOUND', 'transcriber', {
        cause
      });
    }

    let text: string;
    try {
      // Retries are owned by the caller's RetryPolicy
      ({ text } = await transcribe({ model: this.model, audio, maxRetries: 0 }));
    } catch (error) {
      throw sdkError('transcriber', `Transcription with ${this.modelId}`, error);
    }

    const transcript = text.trim();
    if (!transcript) {
      throw new ProviderError(
        `Transcription returned no text: ${audioPath}`,
        'REQUEST_ERROR',
        'transcriber'
      );
    }
    return transcript;
  }
}
