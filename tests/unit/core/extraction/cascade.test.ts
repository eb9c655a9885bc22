/**
 * Extraction Cascade Tests
 *
 * Strategy order, normalization and the empty outcome.
 */

import { describe, expect, test } from 'vitest';
import {
  FENCED_TASKS_RESPONSE,
  REFERENCE_DATE,
  ROSTER_ALIASES,
  ROSTER_MEMBERS
} from '@tests/helpers/fixtures';
import { extractTasks } from '@/core/extraction';
import { Roster } from '@/core/roster';

const roster = new Roster(ROSTER_MEMBERS, ROSTER_ALIASES);
const options = { roster, reference: REFERENCE_DATE };

describe('extractTasks', () => {
  test('uses the structured response after repairs', () => {
    const result = extractTasks(
      { transcript: 'irrelevant', upstreamResponse: FENCED_TASKS_RESPONSE },
      options
    );

    expect(result.method).toBe('primary-structured-after-repair');
    expect(result.tasks).toEqual([
      {
        description: 'Prepare the release notes',
        assignee: 'Alice Johnson',
        dueDate: '2026-10-23',
        deadline: '2026-10-23',
        rawAssignee: 'Alice',
        rawDueDate: 'Friday',
        method: 'primary-structured-after-repair'
      },
      {
        description: 'Fix the login timeout',
        assignee: 'Bob Smith',
        dueDate: null,
        deadline: '2026-10-26',
        rawAssignee: 'Bobby',
        rawDueDate: null,
        method: 'primary-structured-after-repair'
      }
    ]);
  });

  test('reports clean structured output as primary-structured', () => {
    const result = extractTasks(
      {
        transcript: '',
        upstreamResponse: '{"tasks": [{"description": "Archive old tickets", "assignee": "AJ"}]}'
      },
      options
    );
    expect(result.method).toBe('primary-structured');
    expect(result.tasks[0]?.assignee).toBe('Alice Johnson');
  });

  test('falls back to text patterns when the structured list is empty', () => {
    const result = extractTasks(
      {
        transcript: 'Bob will fix the login timeout by tomorrow.',
        summary: 'Short sync.',
        upstreamResponse: '{"tasks": []}'
      },
      options
    );

    expect(result.method).toBe('text-pattern-fallback');
    expect(result.tasks).toEqual([
      {
        description: 'fix the login timeout',
        assignee: 'Bob Smith',
        dueDate: '2026-10-20',
        deadline: '2026-10-20',
        rawAssignee: 'Bob',
        rawDueDate: 'tomorrow',
        method: 'text-pattern-fallback'
      }
    ]);
    expect(result.attempts).toEqual([
      { strategy: 'structured', candidates: 0, kept: 0, note: undefined },
      { strategy: 'text-pattern', candidates: 1, kept: 1 }
    ]);
  });

  test('falls back to text patterns when the response is unparseable', () => {
    const result = extractTasks(
      { transcript: 'Carol will send the invites.', upstreamResponse: 'Sorry, no JSON today' },
      options
    );
    expect(result.method).toBe('text-pattern-fallback');
    expect(result.attempts[0]).toEqual({
      strategy: 'structured',
      candidates: 0,
      kept: 0,
      note: 'unparseable'
    });
  });

  test('falls back when every structured task is too short', () => {
    const result = extractTasks(
      {
        transcript: 'Alice will draft the agenda.',
        upstreamResponse: '[{"description": "ok", "assignee": "Alice"}]'
      },
      options
    );
    expect(result.method).toBe('text-pattern-fallback');
    expect(result.tasks.map((t) => t.description)).toEqual(['draft the agenda']);
  });

  test('returns method "none" when nothing yields a task', () => {
    const result = extractTasks({ transcript: 'We chatted about the weather.' }, options);
    expect(result).toEqual({
      tasks: [],
      rawTasks: [],
      method: 'none',
      attempts: [
        { strategy: 'structured', candidates: 0, kept: 0, note: 'empty' },
        { strategy: 'text-pattern', candidates: 0, kept: 0 }
      ]
    });
  });

  test('never returns a free-text assignee', () => {
    const result = extractTasks(
      { transcript: '', upstreamResponse: '[{"description": "Call the vendor", "assignee": "Zed"}]' },
      options
    );
    expect(result.tasks[0]?.assignee).toBeNull();
    expect(result.tasks[0]?.rawAssignee).toBe('Zed');
  });

  test('caps the text-pattern fallback', () => {
    const transcript = 'Alice will book the room. Bob will order lunch. Carol will send invites.';
    const result = extractTasks({ transcript }, { ...options, maxFallbackTasks: 2 });
    expect(result.tasks).toHaveLength(2);
  });

  test('uses the configured default deadline', () => {
    const result = extractTasks(
      { transcript: '', upstreamResponse: '[{"description": "Renew the domain"}]' },
      { ...options, defaultDeadlineDays: 3 }
    );
    expect(result.tasks[0]?.deadline).toBe('2026-10-22');
  });
});
