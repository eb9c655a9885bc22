/**
 * String Similarity Tests
 */

import { describe, expect, test } from 'vitest';
import {
  CONTAINMENT_SCORE,
  longestCommonSubsequence,
  nameSimilarity,
  sequenceRatio
} from '@/core/roster';

describe('longestCommonSubsequence', () => {
  test('finds a non-contiguous subsequence', () => {
    expect(longestCommonSubsequence('abcde', 'ace')).toBe(3);
  });

  test('is zero when either side is empty', () => {
    expect(longestCommonSubsequence('', 'abc')).toBe(0);
    expect(longestCommonSubsequence('abc', '')).toBe(0);
  });
});

describe('sequenceRatio', () => {
  test('is 1 for identical strings', () => {
    expect(sequenceRatio('jira', 'jira')).toBe(1);
    expect(sequenceRatio('', '')).toBe(1);
  });

  test('is 2·LCS over the total length', () => {
    // LCS("kitten", "sitting") = "ittn" (4); 8 / 13
    expect(sequenceRatio('kitten', 'sitting')).toBeCloseTo(8 / 13, 10);
  });

  test('is 0 with nothing in common', () => {
    expect(sequenceRatio('abc', 'xyz')).toBe(0);
  });
});

describe('nameSimilarity', () => {
  test('is 1 for identical names', () => {
    expect(nameSimilarity('bob smith', 'bob smith')).toBe(1);
  });

  test('gives the containment score when one name contains the other', () => {
    expect(nameSimilarity('bob', 'bob smith')).toBe(CONTAINMENT_SCORE);
  });

  test('lifts the score for a strong single-word match', () => {
    // "jonson" vs "johnson": 12/13 per word, lifted to 0.9 × 12/13
    expect(nameSimilarity('jonson', 'alice johnson')).toBeCloseTo(0.9 * (12 / 13), 10);
  });

  test('lifts the score for shared whole words', () => {
    // One shared word out of two: 0.5 + 0.5 × 0.3
    expect(nameSimilarity('j smith', 'j brown')).toBeCloseTo(0.65, 10);
  });

  test('is 0 against an empty name', () => {
    expect(nameSimilarity('alice', '')).toBe(0);
  });
});
