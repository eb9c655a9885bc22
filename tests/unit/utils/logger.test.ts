/**
 * Logger Tests
 *
 * Console lines for runs, polls and retries, compared with ANSI codes stripped.
 */

import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import type { RunResult } from '@/core';
import {
  logCycleSkipped,
  logPollStart,
  logRetry,
  logRunResult,
  truncate
} from '@/utils/logger';

const INDENT = ' '.repeat(11);

const ANSI_PATTERN = /\x1b\[[0-9;]*m/g;

let lines: string[];

beforeEach(() => {
  lines = [];
  vi.spyOn(console, 'log').mockImplementation((line: string) => {
    lines.push(line.replace(ANSI_PATTERN, ''));
  });
});

afterEach(() => {
  vi.restoreAllMocks();
});

function result(overrides: Partial<RunResult> = {}): RunResult {
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
    error: null,
    ...overrides
  };
}

describe('truncate', () => {
  test('collapses whitespace and adds an ellipsis', () => {
    expect(truncate('a\n  b', 10)).toBe('a b');
    expect(truncate('abcdefghij', 8)).toBe('abcde...');
  });
});

describe('logRunResult', () => {
  test('prints terminal stage statuses, tasks, tickets and the page', () => {
    logRunResult(
      result({
        audit: [
          { stage: 'summarize', status: 'started', message: null, timestamp: 't' },
          { stage: 'summarize', status: 'skipped', message: 'LLM not configured', timestamp: 't' },
          { stage: 'create-tickets', status: 'completed', message: null, timestamp: 't' }
        ],
        extractionMethod: 'text-pattern-fallback',
        tasks: [
          {
            description: 'finish the report',
            assignee: 'Alice Johnson',
            dueDate: '2026-10-23',
            deadline: '2026-10-23',
            rawAssignee: 'Alice',
            rawDueDate: 'Friday',
            method: 'text-pattern-fallback'
          }
        ],
        tickets: [
          {
            key: 'OPS-101',
            url: 'https://tracker.test/browse/OPS-101',
            description: 'finish the report',
            assignee: 'Alice Johnson',
            deadline: '2026-10-23'
          }
        ],
        duplicates: [{ description: 'fix the build', existingKey: 'OPS-7', similarity: 0.9 }],
        page: { pageId: '9001', url: 'https://wiki.test/pages/9001', action: 'updated' }
      })
    );

    expect(lines).toEqual([
      `${INDENT}⊘ summarize      skipped (LLM not configured)`,
      `${INDENT}✓ create-tickets completed`,
      `${INDENT}→ Tasks (text-pattern-fallback):`,
      `${INDENT}  • "finish the report" Alice Johnson 2026-10-23`,
      `${INDENT}+ Created OPS-101: "finish the report"`,
      `${INDENT}= Duplicate OPS-7: "fix the build" (0.90)`,
      `${INDENT}↗ Updated: https://wiki.test/pages/9001`
    ]);
  });

  test('notes an empty task list and the run error', () => {
    logRunResult(result({ error: 'Transcriber not configured' }));

    expect(lines).toEqual([
      `${INDENT}(no action items found)`,
      `${INDENT}Error: Transcriber not configured`
    ]);
  });
});

describe('poll and retry lines', () => {
  test('logPollStart lists the pending recordings', () => {
    logPollStart(['a.mp3', 'b.wav']);

    expect(lines[0]).toMatch(/^\[\d{2}:\d{2}:\d{2}\] POLL 2 new recordings$/);
    expect(lines.slice(1)).toEqual([`${INDENT}→ a.mp3`, `${INDENT}→ b.wav`]);
  });

  test('logCycleSkipped', () => {
    logCycleSkipped();

    expect(lines[0]).toMatch(/SKIP poll cycle \(previous cycle still running\)$/);
  });

  test('logRetry shows the attempt and the wait', () => {
    logRetry({ operation: 'createIssue', attempt: 2, delayMs: 4000, error: new Error('502') });

    expect(lines).toEqual([
      `${INDENT}↻ Retry createIssue (attempt 2 failed: 502; waiting 4.0s)`
    ]);
  });
});
