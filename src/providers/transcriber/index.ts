export { isSupportedRecording, VercelTranscriber } from './client';
export { createTranscriber, DEFAULT_TRANSCRIPTION_MODEL } from './factory';
export { SUPPORTED_EXTENSIONS, type Transcriber } from './types';
