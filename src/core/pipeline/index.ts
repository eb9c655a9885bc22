/**
 * Pipeline Module
 *
 * Stage pipeline that turns a meeting into tickets, a wiki page and stored records.
 */

export { createSettings, defaults as pipelineDefaults, type PipelineSettings } from './config';
export { createRunState, runPipeline } from './pipeline';
export { type Agent, type MeetingInput, MeetingInputSchema } from './schemas';
export { buildTicketDescription, pageTitle } from './stages';
export {
  type AuditEntry,
  type AuditStatus,
  type DuplicateRecord,
  type LLMSettings,
  type PersistedIds,
  type PipelineDependencies,
  type PipelineOptions,
  type RunResult,
  type RunState,
  STAGES,
  type StageName,
  type TicketRecord
} from './types';
