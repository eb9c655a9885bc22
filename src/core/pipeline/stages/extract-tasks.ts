/**
 * Extract Tasks Stage
 *
 * Asks the LLM for structured tasks (when one is configured) and runs the
 * extraction cascade over its answer and the meeting text. Zero tasks is a
 * normal outcome. An LLM that rejects its credentials is skipped and the
 * cascade runs over the meeting text alone.
 */

import { extractTasks } from '@/core/extraction';
import { errorMessage, isConfigurationError } from '@/providers/errors';
import { extractTasksAgent } from '../agents';
import type { RunState, StageContext, StageOutcome } from '../types';
import { callAgent, preview } from '../utils';

export async function extractTasksStage(
  state: RunState,
  ctx: StageContext
): Promise<StageOutcome> {
  const { llmClient, roster, retry } = ctx.deps;
  const transcript = state.transcript ?? '';

  if (llmClient && state.llmUnavailable) {
    state.log.push(`Structured extraction skipped: ${state.llmUnavailable}`);
  } else if (llmClient) {
    try {
      state.upstreamResponse = await callAgent(
        extractTasksAgent,
        { transcript, summary: state.summary },
        llmClient,
        retry,
        ctx.llm.extraction,
        'extractTasks'
      );
    } catch (error) {
      if (isConfigurationError(error)) {
        state.llmUnavailable = `LLM unavailable: ${error.message}`;
        state.log.push(`Structured extraction skipped: ${state.llmUnavailable}`);
      } else {
        const message = `Task extraction failed: ${errorMessage(error)}`;
        state.error = message;
        state.log.push(message);
        return { status: 'failed', message };
      }
    }
  }

  const result = extractTasks(
    { transcript, summary: state.summary, upstreamResponse: state.upstreamResponse },
    {
      roster,
      reference: ctx.reference,
      maxFallbackTasks: ctx.settings.maxFallbackTasks,
      minDescriptionLength: ctx.settings.minDescriptionLength,
      matchThreshold: ctx.settings.matchThreshold,
      defaultDeadlineDays: ctx.settings.defaultDeadlineDays
    }
  );

  state.cascade = result;
  state.rawTasks = result.rawTasks;
  state.tasks = result.tasks;
  state.extractionMethod = result.method;

  for (const attempt of result.attempts) {
    const note = attempt.note ? ` (${attempt.note})` : '';
    state.log.push(
      `Extraction ${attempt.strategy}: ${attempt.kept}/${attempt.candidates} kept${note}`
    );
  }
  for (const task of result.tasks) {
    const assignee = task.assignee ?? 'Unassigned';
    state.log.push(`Task "${preview(task.description)}" -> ${assignee}, due ${task.deadline}`);
  }

  return { status: 'completed', message: `${result.tasks.length} task(s) via ${result.method}` };
}
