/**
 * Logger
 *
 * Semantic logging for Minutes operations:
 * - RUN: One meeting through the pipeline (transcript or recording)
 * - POLL: A recordings poll cycle picking up new files
 * - SKIP: A poll cycle dropped because the previous one is still running
 *
 * Design principles:
 * - Action-oriented verbs (Created, Duplicate, Published)
 * - Clear visual hierarchy with minimal nesting
 * - Show what matters, hide implementation details
 */

import type { AuditEntry, RunResult } from '@/core';
import { errorMessage } from '@/providers/errors';
import type { RetryInfo } from '@/providers/retry';
import { c } from './colors';

// ═══════════════════════════════════════════════════════════════════════════════
// Formatting Utilities
// ═══════════════════════════════════════════════════════════════════════════════

/** Format current time as [HH:MM:SS] */
function formatTime(): string {
  const now = new Date();
  const hours = String(now.getHours()).padStart(2, '0');
  const minutes = String(now.getMinutes()).padStart(2, '0');
  const seconds = String(now.getSeconds()).padStart(2, '0');
  return `[${hours}:${minutes}:${seconds}]`;
}

/** Truncate text to max length with ellipsis */
export function truncate(text: string, maxLength: number): string {
  // Normalize whitespace (collapse newlines and multiple spaces)
  const normalized = text.replace(/\s+/g, ' ').trim();
  if (normalized.length <= maxLength) return normalized;
  return `${normalized.slice(0, maxLength - 3)}...`;
}

/** Indent string for continuation lines (matches timestamp width) */
const INDENT = '           '; // 11 chars to align with [HH:MM:SS] + space

// ═══════════════════════════════════════════════════════════════════════════════
// Pipeline Logging (RUN)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Log the start of a pipeline run.
 * @param source - Recording file name, or a transcript preview
 */
export function logRunStart(source: string): void {
  const time = c.dim(formatTime());
  const preview = truncate(source, 60);
  console.log(`${time} ${c.cyan('RUN')} "${c.white(preview)}"`);
}

/**
 * Log the result of a pipeline run.
 */
export function logRunResult(result: RunResult): void {
  logStages(result.audit);
  logTasks(result);
  logTickets(result);

  if (result.page) {
    const verb = result.page.action === 'created' ? 'Published' : 'Updated';
    console.log(`${INDENT}${c.brightBlue(`↗ ${verb}`)}: ${c.dim(result.page.url)}`);
  }

  if (result.error) {
    console.log(`${INDENT}${c.error('Error')}: ${result.error}`);
  }
}

/**
 * Log the terminal status of each stage on one line each.
 */
function logStages(audit: AuditEntry[]): void {
  for (const entry of audit) {
    const name = entry.stage.padEnd(15);
    const detail = entry.message ? ` ${c.dim(`(${truncate(entry.message, 50)})`)}` : '';

    switch (entry.status) {
      case 'started':
        break;

      case 'completed':
        console.log(`${INDENT}${c.brightGreen('✓')} ${name}${c.dim('completed')}${detail}`);
        break;

      case 'skipped':
        console.log(`${INDENT}${c.yellow('⊘')} ${name}${c.yellow('skipped')}${detail}`);
        break;

      case 'failed':
        console.log(`${INDENT}${c.brightRed('✗')} ${name}${c.brightRed('failed')}${detail}`);
        break;
    }
  }
}

function logTasks(result: RunResult): void {
  if (result.tasks.length === 0) {
    console.log(`${INDENT}${c.dim('(no action items found)')}`);
    return;
  }

  console.log(`${INDENT}${c.dim(`→ Tasks (${result.extractionMethod}):`)}`);
  for (const task of result.tasks) {
    const preview = truncate(task.description, 50);
    const assignee = task.assignee ? c.cyan(task.assignee) : c.dim('unassigned');
    console.log(`${INDENT}  • "${c.white(preview)}" ${assignee} ${c.dim(task.deadline)}`);
  }
}

function logTickets(result: RunResult): void {
  for (const ticket of result.tickets) {
    const preview = truncate(ticket.description, 45);
    console.log(`${INDENT}${c.brightGreen('+ Created')} ${c.white(ticket.key)}: "${preview}"`);
  }

  for (const duplicate of result.duplicates) {
    const preview = truncate(duplicate.description, 45);
    const score = c.dim(`(${duplicate.similarity.toFixed(2)})`);
    const key = c.white(duplicate.existingKey);
    console.log(`${INDENT}${c.yellow('= Duplicate')} ${key}: "${c.dim(preview)}" ${score}`);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Recordings Logging (POLL / SKIP)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Log a poll cycle that found new recordings.
 */
export function logPollStart(pending: string[]): void {
  const time = c.dim(formatTime());
  const noun = pending.length === 1 ? 'recording' : 'recordings';
  console.log(`${time} ${c.magenta('POLL')} ${pending.length} new ${noun}`);
  for (const name of pending) {
    console.log(`${INDENT}${c.dim('→')} ${name}`);
  }
}

/**
 * Log a poll cycle dropped by the cycle lock.
 */
export function logCycleSkipped(): void {
  const time = c.dim(formatTime());
  console.log(`${time} ${c.yellow('SKIP')} ${c.dim('poll cycle (previous cycle still running)')}`);
}

export function logCycleError(error: unknown): void {
  const time = c.dim(formatTime());
  console.log(`${time} ${c.magenta('POLL')} ${c.error('failed')}: ${errorMessage(error)}`);
}

// ═══════════════════════════════════════════════════════════════════════════════
// Retry Logging
// ═══════════════════════════════════════════════════════════════════════════════

export function logRetry(info: RetryInfo): void {
  const seconds = (info.delayMs / 1000).toFixed(1);
  const reason = truncate(errorMessage(info.error), 60);
  const detail = `(attempt ${info.attempt} failed: ${reason}; waiting ${seconds}s)`;
  console.log(`${INDENT}${c.warning('↻ Retry')} ${info.operation} ${c.dim(detail)}`);
}
