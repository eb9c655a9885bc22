/**
 * Service Registry
 *
 * Builds every client from the config once, at startup, and owns their
 * lifecycle. Routes and the recordings poller only ever talk to this object.
 *
 * Optional services (LLM, transcriber, tracker, wiki) are null when their
 * config section is absent; the pipeline skips the stages that need them.
 */

import { join } from 'node:path';
import type { Config } from '@/config/schema';
import {
  listRecordings,
  type MeetingInput,
  type PipelineDependencies,
  type Recording,
  RecordingGuard,
  Roster,
  type RunResult,
  runPipeline
} from '@/core';
import { ensureRecordingsDir, listRecordingNames, type ProcessOutcome } from '@/core/guard';
import { createLLMClient } from '@/providers/llm/factory';
import type { LLMClient } from '@/providers/llm/types';
import { createRetryPolicy, type RetryPolicy } from '@/providers/retry';
import { createMeetingStore, type MeetingStore } from '@/providers/store';
import { JiraClient, type TicketTracker } from '@/providers/tracker';
import { createTranscriber, type Transcriber } from '@/providers/transcriber';
import { ConfluenceClient, type Wiki } from '@/providers/wiki';
import {
  logCycleError,
  logCycleSkipped,
  logPollStart,
  logRetry,
  logRunResult,
  logRunStart
} from '@/utils/logger';

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Replacements for the clients built from config. Used by tests to run
 * the whole service graph in process.
 */
export interface ServiceOverrides {
  llmClient?: LLMClient | null;
  transcriber?: Transcriber | null;
  tracker?: TicketTracker | null;
  wiki?: Wiki | null;
  store?: MeetingStore;
  retry?: Partial<RetryPolicy>;
  /** Clock for relative dates (default: now) */
  now?: () => Date;
  /** Disable console output */
  quiet?: boolean;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Services
// ═══════════════════════════════════════════════════════════════════════════════

export class Services {
  readonly roster: Roster;
  readonly llmClient: LLMClient | null;
  readonly transcriber: Transcriber | null;
  readonly tracker: TicketTracker | null;
  readonly wiki: Wiki | null;
  readonly store: MeetingStore;
  readonly retry: RetryPolicy;
  readonly guard: RecordingGuard;

  private readonly now: () => Date;
  private readonly quiet: boolean;

  constructor(
    readonly config: Config,
    overrides: ServiceOverrides = {}
  ) {
    this.now = overrides.now ?? (() => new Date());
    this.quiet = overrides.quiet ?? false;

    this.roster = new Roster(config.roster.members, config.roster.aliases);
    this.llmClient =
      overrides.llmClient !== undefined ? overrides.llmClient : buildLLMClient(config);
    this.transcriber =
      overrides.transcriber !== undefined ? overrides.transcriber : buildTranscriber(config);
    this.tracker = overrides.tracker !== undefined ? overrides.tracker : buildTracker(config);
    this.wiki = overrides.wiki !== undefined ? overrides.wiki : buildWiki(config);
    this.store = overrides.store ?? createMeetingStore(config.store);

    this.retry = createRetryPolicy({
      ...config.retry,
      onRetry: this.quiet ? undefined : logRetry,
      ...overrides.retry
    });

    this.guard = new RecordingGuard(
      (name) => this.processRecording(name),
      () => listRecordingNames(config.recordings.directory),
      this.quiet
        ? {}
        : {
            onCycleStart: logPollStart,
            onCycleSkipped: logCycleSkipped,
            onCycleError: logCycleError
          }
    );
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Connect the store, create its schema and the recordings directory.
   */
  async init(): Promise<void> {
    await this.store.connect();
    await this.store.initializeSchema();
    await ensureRecordingsDir(this.config.recordings.directory);
  }

  /**
   * Start the periodic poller when `recordings.autoPoll` is set.
   * @returns Whether the poller is running afterwards
   */
  startPolling(): boolean {
    if (!this.config.recordings.autoPoll) return false;
    this.guard.start(this.config.recordings.pollIntervalSeconds);
    return true;
  }

  async shutdown(): Promise<void> {
    this.guard.stop();
    await this.store.disconnect();
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Processing
  // ─────────────────────────────────────────────────────────────────────────────

  get dependencies(): PipelineDependencies {
    return {
      llmClient: this.llmClient,
      transcriber: this.transcriber,
      tracker: this.tracker,
      wiki: this.wiki,
      store: this.store,
      roster: this.roster,
      retry: this.retry
    };
  }

  /**
   * Run the pipeline for one meeting. Never throws.
   */
  async processMeeting(input: MeetingInput): Promise<RunResult> {
    if (!this.quiet) logRunStart(input.filename ?? input.transcript ?? input.audioPath ?? '');

    const llm = this.config.llm;
    const result = await runPipeline(input, this.dependencies, {
      settings: this.config.pipeline,
      llm: llm
        ? {
            summary: { temperature: llm.summary.temperature, maxTokens: llm.summary.maxTokens },
            extraction: {
              temperature: llm.extraction.temperature,
              maxTokens: llm.extraction.maxTokens
            }
          }
        : undefined,
      reference: this.now(),
      trackerBaseUrl: this.config.tracker?.baseUrl ?? null
    });

    if (!this.quiet) logRunResult(result);
    return result;
  }

  /**
   * Run the pipeline for a file in the recordings directory.
   * Bypasses the guard; use `processRecordingGuarded` from triggers.
   */
  processRecording(name: string): Promise<RunResult> {
    return this.processMeeting({ audioPath: this.recordingPath(name), filename: name });
  }

  /**
   * Process one recording through the guard.
   * @returns null when the file is not in the recordings directory
   */
  async processRecordingGuarded(name: string): Promise<ProcessOutcome | null> {
    const names = await listRecordingNames(this.config.recordings.directory);
    if (!names.includes(name)) return null;
    return this.guard.process(name);
  }

  listRecordings(): Promise<Recording[]> {
    return listRecordings(this.config.recordings.directory, (name) =>
      this.guard.isSettled(name)
    );
  }

  recordingPath(name: string): string {
    return join(this.config.recordings.directory, name);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Client Builders
// ═══════════════════════════════════════════════════════════════════════════════

function buildLLMClient(config: Config): LLMClient | null {
  return config.llm ? createLLMClient(config.llm) : null;
}

function buildTranscriber(config: Config): Transcriber | null {
  if (!config.transcription) return null;
  return createTranscriber(config.transcription.provider, config.transcription.model, {
    apiKey: config.transcription.apiKey,
    baseUrl: config.transcription.baseUrl
  });
}

function buildTracker(config: Config): TicketTracker | null {
  return config.tracker ? new JiraClient(config.tracker) : null;
}

function buildWiki(config: Config): Wiki | null {
  return config.wiki ? new ConfluenceClient(config.wiki) : null;
}

/**
 * Build and initialize the registry.
 */
export async function createServices(
  config: Config,
  overrides: ServiceOverrides = {}
): Promise<Services> {
  const services = new Services(config, overrides);
  await services.init();
  return services;
}
