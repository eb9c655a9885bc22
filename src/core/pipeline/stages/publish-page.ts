/**
 * Publish Page Stage
 *
 * Writes the meeting page to the wiki. Any failure is recorded on the
 * stage but never ends the run.
 */

import { errorMessage, isConfigurationError } from '@/providers/errors';
import { withRetry } from '@/providers/retry';
import { buildMeetingPage, type PageActionItem } from '@/providers/wiki';
import type { RunState, StageContext, StageOutcome } from '../types';
import { meetingTitle } from '../utils';

export function pageTitle(state: RunState): string {
  return `${meetingTitle(state)} (${state.meetingDate})`;
}

function actionItems(state: RunState): PageActionItem[] {
  return state.tasks.map((task) => {
    const ticket = state.tickets.find(
      (t) => t.description === task.description && t.assignee === task.assignee
    );
    return {
      description: task.description,
      assignee: task.assignee,
      deadline: task.deadline,
      ticketKey: ticket?.key ?? null
    };
  });
}

export async function publishPageStage(
  state: RunState,
  ctx: StageContext
): Promise<StageOutcome> {
  const { wiki, retry } = ctx.deps;

  if (!wiki || !wiki.isConfigured) {
    state.log.push('Wiki not configured: no page published');
    return { status: 'skipped', message: 'wiki not configured' };
  }

  const title = pageTitle(state);
  const html = buildMeetingPage({
    title: meetingTitle(state),
    meetingDate: state.meetingDate,
    projectName: state.projectName,
    summary: state.summary,
    actionItems: actionItems(state),
    transcript: state.transcript,
    trackerBaseUrl: ctx.trackerBaseUrl
  });

  try {
    const result = await withRetry(
      retry,
      () => wiki.createOrUpdatePage(title, html),
      'publishPage'
    );

    if (result.kind === 'fallback') {
      const message = `${result.title} (${result.status}): ${result.snippet}`;
      state.log.push(`Page not published: ${message}`);
      return { status: 'failed', message };
    }

    state.page = result.data;
    state.log.push(`Page ${result.data.action}: ${result.data.url}`);
    return { status: 'completed', message: `${result.data.action} ${result.data.pageId}` };
  } catch (error) {
    const message = errorMessage(error);
    state.log.push(`Page not published: ${message}`);
    return { status: isConfigurationError(error) ? 'skipped' : 'failed', message };
  }
}
