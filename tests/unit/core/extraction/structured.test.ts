/**
 * Structured Task Parsing Tests
 */

import { describe, expect, test } from 'vitest';
import { FENCED_TASKS_RESPONSE } from '@tests/helpers/fixtures';
import {
  parseStructuredResponse,
  singleToDoubleQuotes,
  stripCodeFences,
  stripTrailingCommas
} from '@/core/extraction';

describe('repairs', () => {
  test('stripCodeFences removes fences and surrounding prose', () => {
    const text = 'Here you go:\n```json\n{"tasks": []}\n```\nLet me know!';
    expect(stripCodeFences(text)).toBe('{"tasks": []}');
  });

  test('singleToDoubleQuotes swaps every single quote', () => {
    expect(singleToDoubleQuotes("{'a': 'b'}")).toBe('{"a": "b"}');
  });

  test('stripTrailingCommas removes commas before closers', () => {
    expect(stripTrailingCommas('{"a": [1, 2, ], }')).toBe('{"a": [1, 2]}');
  });
});

describe('parseStructuredResponse', () => {
  test('reports empty input', () => {
    expect(parseStructuredResponse(null)).toEqual({ status: 'empty' });
    expect(parseStructuredResponse('   ')).toEqual({ status: 'empty' });
  });

  test('parses clean JSON without repairs', () => {
    const result = parseStructuredResponse(
      '{"tasks": [{"description": "Book the venue", "assignee": "Carol", "due_date": "2026-11-02"}]}'
    );
    expect(result).toEqual({
      status: 'parsed',
      repaired: false,
      dropped: 0,
      tasks: [{ description: 'Book the venue', assignee: 'Carol', dueDate: '2026-11-02' }]
    });
  });

  test('repairs fenced output with a trailing comma', () => {
    const result = parseStructuredResponse(FENCED_TASKS_RESPONSE);
    expect(result).toEqual({
      status: 'parsed',
      repaired: true,
      dropped: 0,
      tasks: [
        { description: 'Prepare the release notes', assignee: 'Alice', dueDate: 'Friday' },
        { description: 'Fix the login timeout', assignee: 'Bobby', dueDate: null }
      ]
    });
  });

  test('repairs single-quoted output', () => {
    const result = parseStructuredResponse(
      "[{'title': 'Update the roadmap', 'deadline': 'tomorrow'}]"
    );
    expect(result).toEqual({
      status: 'parsed',
      repaired: true,
      dropped: 0,
      tasks: [{ description: 'Update the roadmap', assignee: null, dueDate: 'tomorrow' }]
    });
  });

  test('accepts the first array property when "tasks" is missing', () => {
    const result = parseStructuredResponse('{"action_items": [{"description": "Email legal"}]}');
    expect(result.status === 'parsed' && result.tasks).toEqual([
      { description: 'Email legal', assignee: null, dueDate: null }
    ]);
  });

  test('drops malformed items and keeps the rest', () => {
    const result = parseStructuredResponse(
      '{"tasks": [{"description": "Renew certificates"}, "not a task", {"description": 42}]}'
    );
    expect(result.status).toBe('parsed');
    if (result.status === 'parsed') {
      expect(result.tasks.map((t) => t.description)).toEqual(['Renew certificates']);
      expect(result.dropped).toBe(2);
    }
  });

  test('stringifies numeric fields', () => {
    const result = parseStructuredResponse('[{"description": "Ship v2", "assignee": 7}]');
    expect(result.status === 'parsed' && result.tasks[0]?.assignee).toBe('7');
  });

  test('gives up on text that no repair fixes', () => {
    expect(parseStructuredResponse('I could not find any tasks.')).toEqual({
      status: 'unparseable'
    });
  });

  test('returns no tasks for a tasks field that is not an array', () => {
    expect(parseStructuredResponse('{"tasks": null}')).toEqual({
      status: 'parsed',
      repaired: false,
      dropped: 0,
      tasks: []
    });
  });
});
