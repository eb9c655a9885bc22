/**
 * Entity Resolver Tests
 *
 * Alias, exact, containment and fuzzy matching against a closed roster.
 */

import { beforeEach, describe, expect, test } from 'vitest';
import { ROSTER_ALIASES, ROSTER_MEMBERS } from '@tests/helpers/fixtures';
import { CONTAINMENT_SCORE, isNoOne, nameSimilarity, normalizeName, Roster } from '@/core/roster';

describe('normalizeName', () => {
  test('lowercases and collapses separators', () => {
    expect(normalizeName('Kailas S.S.')).toBe('kailas s s');
  });

  test('drops characters outside letters, digits and spaces', () => {
    expect(normalizeName("O'Brien-Smith")).toBe('obrien smith');
  });

  test('trims and collapses whitespace', () => {
    expect(normalizeName('  Bob \t Smith ')).toBe('bob smith');
  });
});

describe('isNoOne', () => {
  test.each(['', 'Unassigned', 'none', 'N/A', 'nobody', ' null '])('treats %j as no one', (raw) => {
    expect(isNoOne(raw)).toBe(true);
  });

  test('treats a name as someone', () => {
    expect(isNoOne('Alice')).toBe(false);
  });
});

describe('Roster', () => {
  let roster: Roster;

  beforeEach(() => {
    roster = new Roster(ROSTER_MEMBERS, ROSTER_ALIASES);
  });

  describe('match', () => {
    test('matches aliases first', () => {
      expect(roster.match('bobby')).toEqual({ member: 'Bob Smith', score: 1, method: 'alias' });
    });

    test('matches exact names after normalization', () => {
      expect(roster.match('carol  DIAZ')).toEqual({
        member: 'Carol Diaz',
        score: 1,
        method: 'exact'
      });
    });

    test('matches a first name by containment', () => {
      expect(roster.match('Alice')).toEqual({
        member: 'Alice Johnson',
        score: CONTAINMENT_SCORE,
        method: 'containment'
      });
    });

    test('matches a longer name that contains a member', () => {
      expect(roster.resolve('Dr. Carol Diaz')).toBe('Carol Diaz');
    });

    test('matches a misspelling fuzzily', () => {
      const match = roster.match('Alise Jonson');
      expect(match?.member).toBe('Alice Johnson');
      expect(match?.method).toBe('fuzzy');
    });

    test('returns null below the threshold', () => {
      expect(roster.match('Zebediah')).toBeNull();
    });

    test('returns null for no-one inputs', () => {
      expect(roster.match('unassigned')).toBeNull();
      expect(roster.match(null)).toBeNull();
      expect(roster.match('...')).toBeNull();
    });

    test('matches single characters only exactly', () => {
      expect(roster.match('a')).toBeNull();
      roster.addAlias('Carol Diaz', 'c');
      expect(roster.resolve('C.')).toBe('Carol Diaz');
    });
  });

  describe('alias precedence', () => {
    const members = ['Kyle', 'Kailas S S'];

    test('an alias beats a fuzzy match above the threshold for another member', () => {
      // Without the alias, "Kyla" goes to Kyle
      expect(nameSimilarity('kyla', 'kyle')).toBe(0.75);
      expect(new Roster(members).resolve('Kyla')).toBe('Kyle');

      const withAlias = new Roster(members, { 'Kailas S S': ['kyla'] });
      expect(withAlias.match('Kyla')).toEqual({ member: 'Kailas S S', score: 1, method: 'alias' });
    });

    test('holds for every alias in the roster', () => {
      const aliased = new Roster(ROSTER_MEMBERS, ROSTER_ALIASES);
      for (const [member, aliases] of Object.entries(ROSTER_ALIASES)) {
        for (const alias of aliases) {
          expect(aliased.match(alias)).toEqual({ member, score: 1, method: 'alias' });
        }
      }
    });
  });

  describe('fuzzy ties', () => {
    test('go to the member declared first', () => {
      const twins = new Roster(['Ann Lee', 'Ann Lea']);
      // "ann lex" is one substitution away from both
      expect(twins.resolve('Ann Lex')).toBe('Ann Lee');
    });
  });

  describe('aliases', () => {
    test('exposes normalized aliases per member', () => {
      expect(roster.aliases).toEqual({
        'Alice Johnson': ['aj'],
        'Bob Smith': ['bobby'],
        'Carol Diaz': []
      });
    });

    test('adds an alias for a member', () => {
      expect(roster.addAlias('Carol Diaz', 'CD')).toBe(true);
      expect(roster.resolve('cd')).toBe('Carol Diaz');
    });

    test('refuses aliases for unknown members', () => {
      expect(roster.addAlias('Zed', 'zz')).toBe(false);
    });

    test('ignores aliases for names not on the roster', () => {
      const partial = new Roster(['Alice Johnson'], { Mallory: ['mal'] });
      expect(partial.resolve('mal')).toBeNull();
    });
  });

  test('drops blank and duplicate members', () => {
    const messy = new Roster(['Alice Johnson', ' ', 'Alice Johnson', ' Bob Smith ']);
    expect(messy.members).toEqual(['Alice Johnson', 'Bob Smith']);
  });
});
