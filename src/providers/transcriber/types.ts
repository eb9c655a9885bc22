import type { TranscriptionProvider } from '@/config/schema';

export type { TranscriptionProvider };

/** Audio/video containers accepted by the transcription endpoint */
export const SUPPORTED_EXTENSIONS = [
  '.mp4',
  '.mp3',
  '.wav',
  '.m4a',
  '.mpeg',
  '.webm',
  '.mkv'
] as const;

export interface Transcriber {
  /**
   * Transcribe an audio or video file to plain text.
   * @throws ProviderError NOT_FOUND for a missing file, REQUEST_ERROR for an
   *   unsupported extension or an empty transcript
   */
  transcribe(audioPath: string): Promise<string>;

  readonly modelId: string;
}
