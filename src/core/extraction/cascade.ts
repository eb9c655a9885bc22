/**
 * Extraction Cascade
 *
 * Produces a normalized task list from an LLM response and/or the meeting text.
 * Strategies run in strict priority order and stop at the first one that
 * yields at least one task surviving normalization:
 *
 * 1. Structured parse of the upstream (LLM) response, with repairs
 * 2. Text-pattern fallback over the summary, then the transcript
 * 3. Empty result (method "none"), which is a valid outcome, not an error
 *
 * Every candidate passes through the roster (assignee) and the temporal
 * resolver (due date) before it is returned.
 */

import type { Roster } from '@/core/roster';
import { DEFAULT_MATCH_THRESHOLD } from '@/core/roster';
import { DEFAULT_DEADLINE_DAYS, defaultDeadline, resolveDate } from '@/core/temporal';
import { matchTaskPatterns } from './patterns';
import { parseStructuredResponse } from './structured';
import type {
  CascadeAttempt,
  CascadeInput,
  CascadeResult,
  ExtractedTask,
  ExtractionMethod,
  NormalizedTask
} from './types';

// ═══════════════════════════════════════════════════════════════════════════════
// Configuration
// ═══════════════════════════════════════════════════════════════════════════════

export interface CascadeOptions {
  roster: Roster;
  /** "Today" for relative dates and default deadlines (default: now) */
  reference?: Date;
  /** Maximum tasks taken from the text-pattern fallback (default: 10) */
  maxFallbackTasks?: number;
  /** Tasks with shorter trimmed descriptions are dropped (default: 4) */
  minDescriptionLength?: number;
  /** Fuzzy roster threshold (default: 0.6) */
  matchThreshold?: number;
  /** Days until the default deadline (default: 7) */
  defaultDeadlineDays?: number;
}

export const cascadeDefaults = {
  maxFallbackTasks: 10,
  minDescriptionLength: 4
} as const;

// ═══════════════════════════════════════════════════════════════════════════════
// Cascade
// ═══════════════════════════════════════════════════════════════════════════════

export function extractTasks(input: CascadeInput, options: CascadeOptions): CascadeResult {
  const attempts: CascadeAttempt[] = [];

  // Strategy 1: structured parse
  const structured = parseStructuredResponse(input.upstreamResponse);
  if (structured.status === 'parsed') {
    const method: ExtractionMethod = structured.repaired
      ? 'primary-structured-after-repair'
      : 'primary-structured';
    const rawTasks = structured.tasks.map<ExtractedTask>((task) => ({
      description: task.description,
      rawAssignee: task.assignee,
      rawDueDate: task.dueDate,
      method
    }));
    const tasks = normalizeTasks(rawTasks, options);

    attempts.push({
      strategy: 'structured',
      candidates: rawTasks.length,
      kept: tasks.length,
      note: structured.dropped > 0 ? `${structured.dropped} malformed item(s) dropped` : undefined
    });

    if (tasks.length > 0) return { tasks, rawTasks, method, attempts };
  } else {
    attempts.push({ strategy: 'structured', candidates: 0, kept: 0, note: structured.status });
  }

  // Strategy 2: text patterns, summary first
  const matches = matchTaskPatterns(
    [input.summary, input.transcript],
    options.maxFallbackTasks ?? cascadeDefaults.maxFallbackTasks
  );
  const rawTasks = matches.map<ExtractedTask>((match) => ({
    description: match.description,
    rawAssignee: match.assignee,
    rawDueDate: match.dueDate,
    method: 'text-pattern-fallback'
  }));
  const tasks = normalizeTasks(rawTasks, options);
  attempts.push({ strategy: 'text-pattern', candidates: rawTasks.length, kept: tasks.length });

  if (tasks.length > 0) {
    return { tasks, rawTasks, method: 'text-pattern-fallback', attempts };
  }

  // Strategy 3: nothing
  return { tasks: [], rawTasks: [], method: 'none', attempts };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Normalization
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Resolve assignees and due dates; drop tasks whose description is too short.
 */
export function normalizeTasks(tasks: ExtractedTask[], options: CascadeOptions): NormalizedTask[] {
  const reference = options.reference ?? new Date();
  const minLength = options.minDescriptionLength ?? cascadeDefaults.minDescriptionLength;
  const fallbackDeadline = defaultDeadline(
    reference,
    options.defaultDeadlineDays ?? DEFAULT_DEADLINE_DAYS
  );

  const normalized: NormalizedTask[] = [];
  for (const task of tasks) {
    const description = task.description.trim();
    if (description.length < minLength) continue;

    const dueDate = resolveDate(task.rawDueDate, reference);
    normalized.push({
      description,
      assignee: options.roster.resolve(
        task.rawAssignee,
        options.matchThreshold ?? DEFAULT_MATCH_THRESHOLD
      ),
      dueDate,
      deadline: dueDate ?? fallbackDeadline,
      rawAssignee: task.rawAssignee,
      rawDueDate: task.rawDueDate,
      method: task.method
    });
  }
  return normalized;
}
