/**
 * Meeting Pipeline
 *
 * Turns one meeting (a transcript or a recording) into a summary, tickets,
 * a wiki page and stored records. Stages run in a fixed order over a single
 * RunState:
 *
 *   summarize → extract-tasks → create-tickets → publish-page → persist
 *
 * Once a stage sets `error`, the remaining business stages are bypassed and
 * control goes straight to persist, which always runs so the failed run is
 * still recorded. Each stage leaves `started` and then `completed`,
 * `skipped` or `failed` in the audit trail; after persist the trail itself
 * is appended to the store.
 *
 * runPipeline never throws: every failure ends up in `RunResult.error`.
 */

import { formatDate } from '@/core/temporal';
import { errorMessage } from '@/providers/errors';
import { createSettings } from './config';
import type { MeetingInput } from './schemas';
import {
  createTicketsStage,
  extractTasksStage,
  persistStage,
  publishPageStage,
  summarizeStage
} from './stages';
import type {
  LLMSettings,
  PipelineDependencies,
  PipelineOptions,
  RunResult,
  RunState,
  StageContext,
  StageName,
  StageOutcome
} from './types';
import { recordAudit } from './utils';

// ═══════════════════════════════════════════════════════════════════════════════
// Stage Table
// ═══════════════════════════════════════════════════════════════════════════════

type StageFn = (state: RunState, ctx: StageContext) => Promise<StageOutcome>;

const BUSINESS_STAGES: ReadonlyArray<readonly [StageName, StageFn]> = [
  ['summarize', summarizeStage],
  ['extract-tasks', extractTasksStage],
  ['create-tickets', createTicketsStage],
  ['publish-page', publishPageStage]
];

const DEFAULT_LLM_SETTINGS: LLMSettings = { summary: {}, extraction: {} };

// ═══════════════════════════════════════════════════════════════════════════════
// Pipeline Implementation
// ═══════════════════════════════════════════════════════════════════════════════

export function createRunState(input: MeetingInput, reference: Date): RunState {
  return {
    input,
    transcript: input.transcript?.trim() || null,
    meetingDate: input.meetingDate ?? formatDate(reference),
    filename: input.filename ?? null,
    title: null,
    projectName: null,
    summary: null,
    llmUnavailable: null,
    upstreamResponse: null,
    cascade: null,
    rawTasks: [],
    tasks: [],
    extractionMethod: 'none',
    tickets: [],
    duplicates: [],
    ticketKeys: [],
    page: null,
    persisted: null,
    log: [],
    audit: [],
    error: null,
    stage: null
  };
}

/**
 * Run the meeting pipeline.
 *
 * @param input - Transcript or audio path, plus optional meeting date and file name
 * @param deps - Clients; optional services are null when not configured
 * @param options - Settings overrides, LLM parameters and the reference date
 */
export async function runPipeline(
  input: MeetingInput,
  deps: PipelineDependencies,
  options: PipelineOptions = {}
): Promise<RunResult> {
  const reference = options.reference ?? new Date();
  const ctx: StageContext = {
    deps,
    settings: createSettings(options.settings),
    llm: { ...DEFAULT_LLM_SETTINGS, ...options.llm },
    reference,
    trackerBaseUrl: options.trackerBaseUrl ?? null
  };
  const state = createRunState(input, reference);

  for (const [name, stage] of BUSINESS_STAGES) {
    if (state.error) {
      state.log.push(`Skipping ${name}: ${state.error}`);
      continue;
    }
    await runStage(state, ctx, name, stage);
  }

  await runStage(state, ctx, 'persist', persistStage);
  await flushAudit(state, ctx);

  return toResult(state);
}

/**
 * Run one stage with audit entries. A throw escaping the stage is turned
 * into a stage failure and the run's error.
 */
async function runStage(
  state: RunState,
  ctx: StageContext,
  name: StageName,
  stage: StageFn
): Promise<void> {
  state.stage = name;
  recordAudit(state, name, 'started');

  let outcome: StageOutcome;
  try {
    outcome = await stage(state, ctx);
  } catch (error) {
    const message = `${name} failed: ${errorMessage(error)}`;
    state.error ??= message;
    state.log.push(message);
    outcome = { status: 'failed', message };
  }

  recordAudit(state, name, outcome.status, outcome.message ?? null);
}

/**
 * Append the run's audit trail to the store, linked to the meeting when
 * one was stored.
 */
async function flushAudit(state: RunState, ctx: StageContext): Promise<void> {
  try {
    await ctx.deps.store.appendProcessingLogs(
      state.audit.map((entry) => ({ ...entry })),
      state.persisted?.meetingId ?? null
    );
  } catch (error) {
    const message = `Audit log write failed: ${errorMessage(error)}`;
    state.error ??= message;
    state.log.push(message);
  }
}

function toResult(state: RunState): RunResult {
  return {
    summary: state.summary,
    title: state.title,
    projectName: state.projectName,
    meetingDate: state.meetingDate,
    rawTasks: state.rawTasks,
    tasks: state.tasks,
    extractionMethod: state.extractionMethod,
    ticketKeys: state.ticketKeys,
    tickets: state.tickets,
    duplicates: state.duplicates,
    page: state.page,
    persisted: state.persisted,
    log: state.log,
    audit: state.audit,
    error: state.error
  };
}
