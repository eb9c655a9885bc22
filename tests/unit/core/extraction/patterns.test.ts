/**
 * Text-Pattern Extraction Tests
 */

import { describe, expect, test } from 'vitest';
import { matchSentence, matchTaskPatterns, splitSentences } from '@/core/extraction';

describe('splitSentences', () => {
  test('splits on terminal punctuation and line breaks', () => {
    expect(splitSentences('Alice will do it. Bob must help!\nNotes: none')).toEqual([
      'Alice will do it',
      'Bob must help',
      'Notes: none'
    ]);
  });

  test('drops blank lines', () => {
    expect(splitSentences('\n\nHello.\n\n')).toEqual(['Hello']);
  });
});

describe('matchSentence', () => {
  test('modal verb with a deadline', () => {
    expect(matchSentence('Alice will prepare the release notes by Friday')).toEqual({
      description: 'prepare the release notes',
      assignee: 'Alice',
      dueDate: 'Friday',
      pattern: 'modal-verb'
    });
  });

  test('modal verb after leading words, with initials in the name', () => {
    expect(matchSentence('Then Kailas S S needs to review the PR')).toEqual({
      description: 'review the PR',
      assignee: 'Kailas S S',
      dueDate: null,
      pattern: 'modal-verb'
    });
  });

  test('assigned to', () => {
    expect(matchSentence('The budget review is assigned to Bob by end of month')).toEqual({
      description: 'The budget review',
      assignee: 'Bob',
      dueDate: 'end of month',
      pattern: 'assigned-to'
    });
  });

  test('action item prefix', () => {
    expect(matchSentence('Action item: Carol to update the onboarding doc')).toEqual({
      description: 'update the onboarding doc',
      assignee: 'Carol',
      dueDate: null,
      pattern: 'action-item'
    });
  });

  test('work on', () => {
    expect(matchSentence('Maybe Dan could look into the flaky tests')).toEqual({
      description: 'look into the flaky tests',
      assignee: 'Dan',
      dueDate: null,
      pattern: 'work-on'
    });
  });

  test('ignores sentences without an owner', () => {
    expect(matchSentence('the weather was nice')).toBeNull();
  });
});

describe('matchTaskPatterns', () => {
  test('scans the texts in order and removes repeated descriptions', () => {
    const summary = 'Alice will book the room.';
    const transcript = 'Alice will book the room. Bob will order lunch.';

    const matches = matchTaskPatterns([summary, transcript], 10);

    expect(matches.map((m) => [m.assignee, m.description])).toEqual([
      ['Alice', 'book the room'],
      ['Bob', 'order lunch']
    ]);
  });

  test('stops at the limit', () => {
    const text = 'Alice will book the room. Bob will order lunch. Carol will send invites.';
    expect(matchTaskPatterns([text], 2)).toHaveLength(2);
  });

  test('skips missing texts', () => {
    expect(matchTaskPatterns([null, undefined, ''], 5)).toEqual([]);
  });
});
