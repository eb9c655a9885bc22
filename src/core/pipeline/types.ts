/**
 * Pipeline Types
 *
 * Run state, results and dependencies of the meeting pipeline.
 */

import type { LLMOperationConfig } from '@/config/schema';
import type {
  CascadeResult,
  ExtractedTask,
  ExtractionMethod,
  NormalizedTask
} from '@/core/extraction';
import type { Roster } from '@/core/roster';
import type { RetryPolicy } from '@/providers/retry';
import type { LLMClient } from '@/providers/llm/types';
import type { MeetingStore } from '@/providers/store';
import type { TicketTracker } from '@/providers/tracker';
import type { Transcriber } from '@/providers/transcriber';
import type { PublishedPage, Wiki } from '@/providers/wiki';
import type { PipelineSettings } from './config';
import type { MeetingInput } from './schemas';

// ═══════════════════════════════════════════════════════════════════════════════
// Stages & Audit
// ═══════════════════════════════════════════════════════════════════════════════

export const STAGES = [
  'summarize',
  'extract-tasks',
  'create-tickets',
  'publish-page',
  'persist'
] as const;
export type StageName = (typeof STAGES)[number];

export type AuditStatus = 'started' | 'completed' | 'skipped' | 'failed';

export interface AuditEntry {
  stage: StageName;
  status: AuditStatus;
  message: string | null;
  timestamp: string;
}

/** What a stage reports back to the executor */
export interface StageOutcome {
  status: 'completed' | 'skipped' | 'failed';
  message?: string;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Stage Products
// ═══════════════════════════════════════════════════════════════════════════════

export interface TicketRecord {
  key: string;
  url: string;
  description: string;
  assignee: string | null;
  deadline: string;
}

export interface DuplicateRecord {
  description: string;
  existingKey: string;
  similarity: number;
}

export interface PersistedIds {
  transcriptionId: string;
  /** Null when the meeting write failed after the transcription was stored */
  meetingId: string | null;
  taskIds: string[];
}

// ═══════════════════════════════════════════════════════════════════════════════
// Run State
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Mutable record owned by a single run. Stages read what earlier stages
 * wrote and add their own products.
 */
export interface RunState {
  input: MeetingInput;
  transcript: string | null;
  meetingDate: string;
  filename: string | null;

  title: string | null;
  projectName: string | null;
  summary: string | null;

  /** Set when the LLM rejected its credentials; later stages stop calling it */
  llmUnavailable: string | null;
  /** Raw LLM response for the extraction cascade */
  upstreamResponse: string | null;
  cascade: CascadeResult | null;
  rawTasks: ExtractedTask[];
  tasks: NormalizedTask[];
  extractionMethod: ExtractionMethod;

  tickets: TicketRecord[];
  duplicates: DuplicateRecord[];
  /** Keys of the tickets created in this run, in task order */
  ticketKeys: string[];
  page: PublishedPage | null;
  persisted: PersistedIds | null;

  /** Human-readable decisions, append-only */
  log: string[];
  audit: AuditEntry[];
  error: string | null;
  stage: StageName | null;
}

export interface RunResult {
  summary: string | null;
  title: string | null;
  projectName: string | null;
  meetingDate: string;
  rawTasks: ExtractedTask[];
  tasks: NormalizedTask[];
  extractionMethod: ExtractionMethod;
  ticketKeys: string[];
  tickets: TicketRecord[];
  duplicates: DuplicateRecord[];
  page: PublishedPage | null;
  persisted: PersistedIds | null;
  log: string[];
  audit: AuditEntry[];
  error: string | null;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Dependencies & Options
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * External collaborators. Optional services are null when not configured.
 */
export interface PipelineDependencies {
  llmClient: LLMClient | null;
  transcriber: Transcriber | null;
  tracker: TicketTracker | null;
  wiki: Wiki | null;
  store: MeetingStore;
  roster: Roster;
  retry: RetryPolicy;
}

/** Per-operation LLM parameters (from config.llm.summary / config.llm.extraction) */
export interface LLMSettings {
  summary: Pick<LLMOperationConfig, 'temperature' | 'maxTokens'>;
  extraction: Pick<LLMOperationConfig, 'temperature' | 'maxTokens'>;
}

export interface PipelineOptions {
  settings?: Partial<PipelineSettings>;
  llm?: Partial<LLMSettings>;
  /** "Today" for relative dates and the default meeting date (default: now) */
  reference?: Date;
  /** Tracker site for page ticket links */
  trackerBaseUrl?: string | null;
}

/** Everything a stage needs besides the run state */
export interface StageContext {
  deps: PipelineDependencies;
  settings: PipelineSettings;
  llm: LLMSettings;
  reference: Date;
  trackerBaseUrl: string | null;
}
