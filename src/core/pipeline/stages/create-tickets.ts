/**
 * Create Tickets Stage
 *
 * One tracker issue per normalized task, skipping tasks that already have
 * an open issue. Individual failures are absorbed; the stage fails only
 * when every attempted creation failed. A tracker that rejects its
 * credentials skips the rest of the stage, keeping what was created so far.
 */

import type { NormalizedTask } from '@/core/extraction';
import { errorMessage, isConfigurationError, type ProviderError } from '@/providers/errors';
import { withRetry } from '@/providers/retry';
import type { RunState, StageContext, StageOutcome } from '../types';
import { meetingTitle, preview } from '../utils';

/**
 * Plain-text issue description; the tracker turns each line into a paragraph.
 */
export function buildTicketDescription(task: NormalizedTask, state: RunState): string {
  const lines = [
    task.description,
    '',
    `Assignee: ${task.assignee ?? 'Unassigned'}`,
    `Deadline: ${task.deadline}`,
    `From meeting: ${meetingTitle(state)} (${state.meetingDate})`
  ];
  if (state.projectName) lines.push(`Project: ${state.projectName}`);
  return lines.join('\n');
}

export async function createTicketsStage(
  state: RunState,
  ctx: StageContext
): Promise<StageOutcome> {
  const { tracker, retry } = ctx.deps;

  if (!tracker || !tracker.isConfigured) {
    state.log.push('Ticket tracker not configured: no tickets created');
    return { status: 'skipped', message: 'tracker not configured' };
  }
  if (state.tasks.length === 0) {
    return { status: 'completed', message: 'no tasks' };
  }

  let attempted = 0;
  let failed = 0;

  for (const task of state.tasks) {
    const label = preview(task.description);

    try {
      const duplicate = await withRetry(
        retry,
        () => tracker.findDuplicate(task.description, task.assignee),
        'findDuplicate'
      );
      if (duplicate) {
        state.duplicates.push({
          description: task.description,
          existingKey: duplicate.key,
          similarity: duplicate.similarity
        });
        state.log.push(`Skipped duplicate "${label}" -> ${duplicate.key}`);
        continue;
      }
    } catch (error) {
      if (isConfigurationError(error)) return trackerUnavailable(state, error);
      // A failed check must not block creation
      state.log.push(`Duplicate check failed for "${label}": ${errorMessage(error)}`);
    }

    attempted++;
    try {
      const issue = await withRetry(
        retry,
        () =>
          tracker.createIssue({
            summary: task.description,
            description: buildTicketDescription(task, state),
            assignee: task.assignee,
            dueDate: task.deadline
          }),
        'createIssue'
      );
      state.tickets.push({
        key: issue.key,
        url: issue.url,
        description: task.description,
        assignee: task.assignee,
        deadline: task.deadline
      });
      state.ticketKeys.push(issue.key);
      state.log.push(`Created ${issue.key} "${label}"`);
    } catch (error) {
      if (isConfigurationError(error)) return trackerUnavailable(state, error);
      failed++;
      state.log.push(`Ticket creation failed for "${label}": ${errorMessage(error)}`);
    }
  }

  if (attempted > 0 && failed === attempted) {
    const message = `All ${attempted} ticket creation(s) failed`;
    state.error = message;
    return { status: 'failed', message };
  }

  const created = state.tickets.length;
  const duplicates = state.duplicates.length;
  return {
    status: 'completed',
    message: `${created} created, ${duplicates} duplicate(s), ${failed} failed`
  };
}

function trackerUnavailable(state: RunState, error: ProviderError): StageOutcome {
  const message = `Ticket tracker unavailable: ${error.message}`;
  state.log.push(`${message}; remaining tickets skipped`);
  return { status: 'skipped', message };
}
