/**
 * Recording Guard
 *
 * Keeps the periodic poller and ad-hoc triggers from processing the same
 * recording twice or running overlapping cycles.
 *
 * Token states:
 *   untouched → in-flight → settled
 *
 * A token settles whether its run succeeded, reported an error, or threw.
 * Settled tokens are never picked up again until clearSettled() is called.
 *
 * Node runs this on one thread, so "lock" and "in-flight" are plain flags
 * and sets. They are always updated synchronously before the first await,
 * which is what makes them atomic with respect to other callers.
 */

import type { RunResult } from '@/core/pipeline';
import { errorMessage } from '@/providers/errors';

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

/** Runs the pipeline for one token */
export type TokenProcessor = (token: string) => Promise<RunResult>;

/** Lists every candidate token (settled and in-flight ones are filtered out) */
export type TokenSource = () => Promise<string[]>;

export type ProcessOutcome =
  | { status: 'processed'; token: string; result: RunResult }
  | { status: 'failed'; token: string; error: string; result: RunResult | null }
  | { status: 'skipped'; token: string; reason: 'already processing' };

export interface PollCycleResult {
  /** True when another cycle held the lock and nothing was done */
  cycleSkipped: boolean;
  processed: number;
  skipped: number;
  errors: number;
  files: ProcessOutcome[];
}

export interface GuardStatus {
  total: number;
  processed: number;
  pending: number;
  inFlight: number;
  cacheSize: number;
  skippedCycles: number;
  running: boolean;
}

export interface GuardHooks {
  onCycleSkipped?: () => void;
  onCycleStart?: (pending: string[]) => void;
  onCycleError?: (error: unknown) => void;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Guard
// ═══════════════════════════════════════════════════════════════════════════════

export class RecordingGuard {
  private readonly inFlight = new Set<string>();
  private readonly settled = new Set<string>();
  private cycleRunning = false;
  private skippedCycles = 0;
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly processor: TokenProcessor,
    private readonly source: TokenSource,
    private readonly hooks: GuardHooks = {}
  ) {}

  isInFlight(token: string): boolean {
    return this.inFlight.has(token);
  }

  isSettled(token: string): boolean {
    return this.settled.has(token);
  }

  /**
   * Process one token unless it is already in flight.
   * Never throws: a processor failure becomes a `failed` outcome.
   */
  async process(token: string): Promise<ProcessOutcome> {
    if (this.inFlight.has(token)) {
      return { status: 'skipped', token, reason: 'already processing' };
    }
    this.inFlight.add(token);

    try {
      const result = await this.processor(token);
      return result.error
        ? { status: 'failed', token, error: result.error, result }
        : { status: 'processed', token, result };
    } catch (error) {
      return { status: 'failed', token, error: errorMessage(error), result: null };
    } finally {
      this.inFlight.delete(token);
      this.settled.add(token);
    }
  }

  /**
   * One poll cycle: process every pending token in order.
   * If a cycle is already running this one is skipped and counted.
   */
  async pollCycle(): Promise<PollCycleResult> {
    const result: PollCycleResult = {
      cycleSkipped: false,
      processed: 0,
      skipped: 0,
      errors: 0,
      files: []
    };

    if (this.cycleRunning) {
      this.skippedCycles++;
      this.hooks.onCycleSkipped?.();
      return { ...result, cycleSkipped: true, skipped: 1 };
    }
    this.cycleRunning = true;

    try {
      const pending = await this.pending();
      if (pending.length > 0) this.hooks.onCycleStart?.(pending);

      for (const token of pending) {
        const outcome = await this.process(token);
        result.files.push(outcome);
        if (outcome.status === 'processed') result.processed++;
        else if (outcome.status === 'failed') result.errors++;
        else result.skipped++;
      }
    } catch (error) {
      // Listing failed; the next cycle tries again
      result.errors++;
      this.hooks.onCycleError?.(error);
    } finally {
      this.cycleRunning = false;
    }

    return result;
  }

  /** Tokens neither settled nor in flight, in source order */
  async pending(): Promise<string[]> {
    const tokens = await this.source();
    return tokens.filter((token) => !this.settled.has(token) && !this.inFlight.has(token));
  }

  /**
   * Forget settled tokens so they are picked up again.
   * @returns Number of entries cleared
   */
  clearSettled(): number {
    const count = this.settled.size;
    this.settled.clear();
    return count;
  }

  async status(): Promise<GuardStatus> {
    const tokens = await this.source();
    const processed = tokens.filter((token) => this.settled.has(token)).length;
    return {
      total: tokens.length,
      processed,
      pending: tokens.length - processed,
      inFlight: this.inFlight.size,
      cacheSize: this.settled.size,
      skippedCycles: this.skippedCycles,
      running: this.timer !== null
    };
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Periodic poller
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Poll every `intervalSeconds`. Ticks that land while a cycle is still
   * running are skipped by the cycle lock.
   * @returns False if the poller was already running
   */
  start(intervalSeconds: number): boolean {
    if (this.timer) return false;
    this.timer = setInterval(() => {
      void this.pollCycle();
    }, intervalSeconds * 1000);
    return true;
  }

  /** @returns False if the poller was not running */
  stop(): boolean {
    if (!this.timer) return false;
    clearInterval(this.timer);
    this.timer = null;
    return true;
  }
}
