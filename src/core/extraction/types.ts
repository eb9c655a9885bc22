/**
 * Extraction Types
 */

/** Which cascade strategy produced a task list */
export type ExtractionMethod =
  | 'primary-structured'
  | 'primary-structured-after-repair'
  | 'text-pattern-fallback'
  | 'none';

/**
 * A task as it comes out of a strategy, before roster/date resolution.
 */
export interface ExtractedTask {
  description: string;
  rawAssignee: string | null;
  rawDueDate: string | null;
  method: ExtractionMethod;
}

/**
 * A task after resolution.
 * `assignee` is always a roster member or null, never free text.
 */
export interface NormalizedTask {
  description: string;
  assignee: string | null;
  /** Resolved due date (yyyy-MM-dd), null when nothing could be resolved */
  dueDate: string | null;
  /** Effective deadline: dueDate, or the default deadline when dueDate is null */
  deadline: string;
  rawAssignee: string | null;
  rawDueDate: string | null;
  method: ExtractionMethod;
}

export interface CascadeInput {
  transcript: string;
  summary?: string | null;
  /** Raw text the LLM returned for the structured extraction request */
  upstreamResponse?: string | null;
}

/** One strategy attempt, kept for the run's decision log */
export interface CascadeAttempt {
  strategy: 'structured' | 'text-pattern';
  candidates: number;
  kept: number;
  note?: string;
}

export interface CascadeResult {
  tasks: NormalizedTask[];
  rawTasks: ExtractedTask[];
  method: ExtractionMethod;
  attempts: CascadeAttempt[];
}
