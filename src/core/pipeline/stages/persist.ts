/**
 * Persist Stage
 *
 * Always runs, including after an earlier stage failed. Writes the
 * transcription, the meeting and every task that has a roster assignee.
 * Nothing created in earlier stages is rolled back when this fails.
 *
 * `state.persisted` is updated after every successful write, so a failure
 * part way through still reports (and links the audit trail to) the
 * records that exist.
 */

import { errorMessage } from '@/providers/errors';
import type { PersistedIds, RunState, StageContext, StageOutcome } from '../types';
import { meetingTitle, preview } from '../utils';

export async function persistStage(state: RunState, ctx: StageContext): Promise<StageOutcome> {
  const { store } = ctx.deps;

  try {
    const content =
      state.summary ?? (state.transcript ?? '').slice(0, ctx.settings.transcriptExcerptLength);

    const transcription = await store.createTranscription({
      content,
      meetingDate: state.meetingDate
    });
    const persisted: PersistedIds = {
      transcriptionId: transcription.id,
      meetingId: null,
      taskIds: []
    };
    state.persisted = persisted;

    const meeting = await store.createMeeting({
      transcriptionId: transcription.id,
      title: meetingTitle(state),
      meetingDate: state.meetingDate,
      projectName: state.projectName,
      fileName: state.filename,
      pageId: state.page?.pageId ?? null,
      pageUrl: state.page?.url ?? null
    });
    persisted.meetingId = meeting.id;

    for (const task of state.tasks) {
      if (!task.assignee) {
        state.log.push(`Not stored (no roster assignee): "${preview(task.description)}"`);
        continue;
      }

      const ticket = state.tickets.find(
        (t) => t.description === task.description && t.assignee === task.assignee
      );
      const stored = await store.createTask({
        meetingId: meeting.id,
        description: task.description,
        assignee: task.assignee,
        deadline: task.deadline,
        ticketKey: ticket?.key ?? null,
        extractionMethod: task.method
      });
      persisted.taskIds.push(stored.id);
    }

    const count = persisted.taskIds.length;
    state.log.push(`Stored meeting ${meeting.id} with ${count} task(s)`);
    return { status: 'completed', message: `${count} task(s) stored` };
  } catch (error) {
    const message = `Persist failed: ${errorMessage(error)}`;
    state.error ??= message;
    state.log.push(message);
    return { status: 'failed', message };
  }
}
