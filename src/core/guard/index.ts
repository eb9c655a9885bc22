export {
  type GuardHooks,
  type GuardStatus,
  type PollCycleResult,
  type ProcessOutcome,
  RecordingGuard,
  type TokenProcessor,
  type TokenSource
} from './guard';
export { ensureRecordingsDir, listRecordingNames, listRecordings, type Recording } from './recordings';
