/**
 * Recording Guard Tests
 *
 * In-flight de-duplication, the non-overlapping poll cycle and the settled cache.
 */

import { describe, expect, test, vi } from 'vitest';
import { RecordingGuard, type TokenProcessor } from '@/core/guard';
import type { RunResult } from '@/core/pipeline';

function runResult(error: string | null = null): RunResult {
  return {
    summary: null,
    title: null,
    projectName: null,
    meetingDate: '2026-10-19',
    rawTasks: [],
    tasks: [],
    extractionMethod: 'none',
    ticketKeys: [],
    tickets: [],
    duplicates: [],
    page: null,
    persisted: null,
    log: [],
    audit: [],
    error
  };
}

/** A promise the test resolves by hand */
function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('RecordingGuard', () => {
  describe('process', () => {
    test('a second trigger for an in-flight token is skipped', async () => {
      const gate = deferred<RunResult>();
      const processor = vi.fn<TokenProcessor>(() => gate.promise);
      const guard = new RecordingGuard(processor, async () => ['standup.mp3']);

      const first = guard.process('standup.mp3');
      const second = await guard.process('standup.mp3');

      expect(second).toEqual({
        status: 'skipped',
        token: 'standup.mp3',
        reason: 'already processing'
      });
      expect(guard.isInFlight('standup.mp3')).toBe(true);

      gate.resolve(runResult());
      const outcome = await first;

      expect(outcome.status).toBe('processed');
      expect(processor).toHaveBeenCalledTimes(1);
      expect(guard.isInFlight('standup.mp3')).toBe(false);
      expect(guard.isSettled('standup.mp3')).toBe(true);
    });

    test('a run that reports an error still settles the token', async () => {
      const guard = new RecordingGuard(
        async () => runResult('Transcriber not configured'),
        async () => []
      );

      const outcome = await guard.process('retro.wav');

      expect(outcome).toMatchObject({ status: 'failed', error: 'Transcriber not configured' });
      expect(guard.isSettled('retro.wav')).toBe(true);
    });

    test('a processor that throws is reported, not rethrown', async () => {
      const guard = new RecordingGuard(
        async () => {
          throw new Error('disk gone');
        },
        async () => []
      );

      const outcome = await guard.process('retro.wav');

      expect(outcome).toEqual({
        status: 'failed',
        token: 'retro.wav',
        error: 'disk gone',
        result: null
      });
      expect(guard.isInFlight('retro.wav')).toBe(false);
      expect(guard.isSettled('retro.wav')).toBe(true);
    });
  });

  describe('pollCycle', () => {
    test('processes pending tokens in source order and counts outcomes', async () => {
      const seen: string[] = [];
      const guard = new RecordingGuard(
        async (token) => {
          seen.push(token);
          return runResult(token === 'b.mp3' ? 'Summary failed' : null);
        },
        async () => ['a.mp3', 'b.mp3', 'c.mp3']
      );

      const result = await guard.pollCycle();

      expect(seen).toEqual(['a.mp3', 'b.mp3', 'c.mp3']);
      expect(result).toMatchObject({ cycleSkipped: false, processed: 2, skipped: 0, errors: 1 });
      expect(result.files.map((f) => f.status)).toEqual(['processed', 'failed', 'processed']);
    });

    test('does not pick up settled tokens again', async () => {
      const processor = vi.fn<TokenProcessor>(async () => runResult());
      const guard = new RecordingGuard(processor, async () => ['a.mp3']);

      await guard.pollCycle();
      const second = await guard.pollCycle();

      expect(processor).toHaveBeenCalledTimes(1);
      expect(second.processed).toBe(0);
      expect(second.files).toEqual([]);
    });

    test('an overlapping cycle is skipped and counted', async () => {
      const gate = deferred<RunResult>();
      const processor = vi.fn<TokenProcessor>(() => gate.promise);
      const onCycleSkipped = vi.fn();
      const guard = new RecordingGuard(processor, async () => ['a.mp3'], { onCycleSkipped });

      const first = guard.pollCycle();
      // Let the first cycle list its tokens and enter the processor
      await vi.waitFor(() => expect(processor).toHaveBeenCalledTimes(1));

      const second = await guard.pollCycle();
      expect(second).toEqual({
        cycleSkipped: true,
        processed: 0,
        skipped: 1,
        errors: 0,
        files: []
      });
      expect(onCycleSkipped).toHaveBeenCalledTimes(1);

      gate.resolve(runResult());
      expect((await first).processed).toBe(1);

      const status = await guard.status();
      expect(status.skippedCycles).toBe(1);
      expect(processor).toHaveBeenCalledTimes(1);
    });

    test('a failing source counts as one error and releases the lock', async () => {
      const onCycleError = vi.fn();
      const source = vi
        .fn<() => Promise<string[]>>()
        .mockRejectedValueOnce(new Error('EACCES'))
        .mockResolvedValue([]);
      const guard = new RecordingGuard(async () => runResult(), source, { onCycleError });

      const failed = await guard.pollCycle();
      const next = await guard.pollCycle();

      expect(failed.errors).toBe(1);
      expect(onCycleError).toHaveBeenCalledTimes(1);
      expect(next.cycleSkipped).toBe(false);
    });
  });

  describe('settled cache', () => {
    test('clearSettled forgets processed tokens', async () => {
      const processor = vi.fn<TokenProcessor>(async () => runResult());
      const guard = new RecordingGuard(processor, async () => ['a.mp3', 'b.mp3']);

      await guard.pollCycle();
      expect(guard.clearSettled()).toBe(2);

      await guard.pollCycle();
      expect(processor).toHaveBeenCalledTimes(4);
    });

    test('status reports totals from the source', async () => {
      const guard = new RecordingGuard(async () => runResult(), async () => ['a.mp3', 'b.mp3']);
      await guard.process('a.mp3');

      expect(await guard.status()).toEqual({
        total: 2,
        processed: 1,
        pending: 1,
        inFlight: 0,
        cacheSize: 1,
        skippedCycles: 0,
        running: false
      });
    });
  });

  describe('poller', () => {
    test('start and stop toggle the timer', () => {
      vi.useFakeTimers();
      try {
        const guard = new RecordingGuard(async () => runResult(), async () => []);
        expect(guard.start(30)).toBe(true);
        expect(guard.start(30)).toBe(false);
        expect(guard.stop()).toBe(true);
        expect(guard.stop()).toBe(false);
      } finally {
        vi.useRealTimers();
      }
    });
  });
});
