/**
 * Core Meeting System
 *
 * Public API barrel file. Re-exports the pipeline, the guard and the
 * resolvers they are built on.
 *
 * @example
 * ```typescript
 * import { runPipeline, RecordingGuard } from '@/core';
 * import type { PipelineDependencies, RunResult } from '@/core';
 * ```
 */

// ═══════════════════════════════════════════════════════════════════════════════
// Pipeline
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type AuditEntry,
  type MeetingInput,
  MeetingInputSchema,
  type PipelineDependencies,
  type PipelineOptions,
  type RunResult,
  runPipeline,
  type StageName
} from './pipeline';

// ═══════════════════════════════════════════════════════════════════════════════
// Guard
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type GuardStatus,
  listRecordings,
  type PollCycleResult,
  type ProcessOutcome,
  type Recording,
  RecordingGuard
} from './guard';

// ═══════════════════════════════════════════════════════════════════════════════
// Resolvers
// ═══════════════════════════════════════════════════════════════════════════════

export type { ExtractionMethod, NormalizedTask } from './extraction';
export { type AliasTable, Roster } from './roster';
export { formatDate, resolveDate } from './temporal';
