/**
 * Summarize Stage
 *
 * Obtains the transcript (given, or transcribed from audio) and, with an
 * LLM configured, derives the summary, title and project name.
 *
 * Fatal: no transcript obtainable, summary failure.
 * Skipped: no LLM, or an LLM that rejects its credentials. The rejection is
 * remembered on the run state so extract-tasks does not call it again.
 * Absorbed: title and project failures (fallback values are used).
 */

import { withRetry } from '@/providers/retry';
import { errorMessage, isConfigurationError } from '@/providers/errors';
import { DEFAULT_TITLE, extractProject, extractTitle, summarize } from '../agents';
import type { RunState, StageContext, StageOutcome } from '../types';
import { callAgent } from '../utils';

export async function summarizeStage(state: RunState, ctx: StageContext): Promise<StageOutcome> {
  const { llmClient, transcriber, retry } = ctx.deps;

  // Transcript
  if (!state.transcript) {
    const audioPath = state.input.audioPath;
    if (!audioPath) return fail(state, 'No transcript or audio provided');
    if (!transcriber) return fail(state, 'Transcriber not configured');

    try {
      state.transcript = await withRetry(
        retry,
        () => transcriber.transcribe(audioPath),
        'transcribe'
      );
    } catch (error) {
      return fail(state, `Transcription failed: ${errorMessage(error)}`);
    }

    if (!state.transcript.trim()) return fail(state, 'Transcription returned no text');
    state.log.push(`Transcribed ${state.filename ?? audioPath} (${state.transcript.length} chars)`);
  }

  if (!llmClient) {
    state.log.push('LLM not configured: summary, title and project skipped');
    return { status: 'skipped', message: 'LLM not configured' };
  }

  const transcript = state.transcript;
  const params = ctx.llm.summary;

  // Summary
  try {
    const summary = await callAgent(
      summarize,
      { transcript },
      llmClient,
      retry,
      params,
      'summarize'
    );
    state.summary = summary || null;
  } catch (error) {
    if (isConfigurationError(error)) {
      const message = `LLM unavailable: ${error.message}`;
      state.llmUnavailable = message;
      state.log.push(`${message}; summary, title and project skipped`);
      return { status: 'skipped', message };
    }
    return fail(state, `Summary failed: ${errorMessage(error)}`);
  }

  // Title
  try {
    state.title = await callAgent(extractTitle, { transcript }, llmClient, retry, params, 'title');
  } catch (error) {
    state.title = DEFAULT_TITLE;
    state.log.push(`Title extraction failed, using "${DEFAULT_TITLE}": ${errorMessage(error)}`);
  }

  // Project
  try {
    state.projectName = await callAgent(
      extractProject,
      { transcript, summary: state.summary },
      llmClient,
      retry,
      params,
      'project'
    );
  } catch (error) {
    state.projectName = null;
    state.log.push(`Project extraction failed: ${errorMessage(error)}`);
  }

  state.log.push(`Summarized as "${state.title}"`);
  return {
    status: 'completed',
    message: state.projectName ? `project ${state.projectName}` : undefined
  };
}

function fail(state: RunState, message: string): StageOutcome {
  state.error = message;
  state.log.push(message);
  return { status: 'failed', message };
}
