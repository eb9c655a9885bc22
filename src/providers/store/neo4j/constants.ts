/**
 * Neo4j Schema Registry
 *
 * Single source of truth for all database schema elements.
 */

// ============================================================
// NODE LABELS
// ============================================================

/**
 * Node labels in the meeting graph.
 *
 * - Transcription: Stored summary or transcript excerpt
 * - Meeting: One processed meeting
 * - Task: An action item extracted from a meeting
 * - Member: Roster person a task is assigned to (MERGEd by name)
 * - ProcessingLog: Per-stage audit entry of a pipeline run
 */
export const LABELS = {
  TRANSCRIPTION: 'Transcription',
  MEETING: 'Meeting',
  TASK: 'Task',
  MEMBER: 'Member',
  PROCESSING_LOG: 'ProcessingLog'
} as const;

export type Label = (typeof LABELS)[keyof typeof LABELS];

// ============================================================
// RELATIONSHIP TYPES
// ============================================================

/**
 * - HAS_TRANSCRIPTION: Meeting -> Transcription
 * - HAS_TASK: Meeting -> Task
 * - ASSIGNED_TO: Task -> Member
 * - LOGGED_FOR: ProcessingLog -> Meeting
 */
export const RELS = {
  HAS_TRANSCRIPTION: 'HAS_TRANSCRIPTION',
  HAS_TASK: 'HAS_TASK',
  ASSIGNED_TO: 'ASSIGNED_TO',
  LOGGED_FOR: 'LOGGED_FOR'
} as const;

export type RelType = (typeof RELS)[keyof typeof RELS];

// ============================================================
// RETRY CONFIGURATION
// ============================================================

/** Store retries: 100ms, then 200ms */
export const RETRY = {
  MAX_ATTEMPTS: 3,
  BASE_DELAY_MS: 100,
  MAX_DELAY_MS: 1000
} as const;
