/**
 * Entity Resolver
 *
 * Maps free-text assignee names onto a small closed roster.
 *
 * Matching order (first hit wins):
 * 1. Alias table exact match        → score 1.0
 * 2. Member name exact match         → score 1.0
 * 3. Containment in either direction → score 0.85, accepted immediately
 * 4. Fuzzy similarity against each member and its aliases; best member kept
 *    if its score reaches the threshold
 *
 * Single-character inputs stop after step 2.
 *
 * Ties in step 4 go to the member declared first: the comparison is strict (>),
 * so a later member with an equal score never displaces an earlier one.
 */

import { isNoOne, normalizeName } from './normalize';
import { CONTAINMENT_SCORE, nameSimilarity } from './similarity';

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

/** Default minimum fuzzy score for a match to be accepted */
export const DEFAULT_MATCH_THRESHOLD = 0.6;

/** Inputs shorter than this only match aliases and exact names */
const MIN_PARTIAL_LENGTH = 2;

export type MatchMethod = 'alias' | 'exact' | 'containment' | 'fuzzy';

export interface RosterMatch {
  /** Canonical roster member */
  member: string;
  /** Similarity score in [0, 1] */
  score: number;
  /** Which matching step produced the result */
  method: MatchMethod;
}

/** Alias table keyed by canonical member name */
export type AliasTable = Record<string, string[]>;

interface RosterEntry {
  name: string;
  normalized: string;
  /** Normalized aliases */
  aliases: Set<string>;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Roster
// ═══════════════════════════════════════════════════════════════════════════════

export class Roster {
  private entries: RosterEntry[] = [];

  constructor(members: string[], aliases: AliasTable = {}) {
    this.replaceMembers(members, aliases);
  }

  /** Canonical member names in declaration order */
  get members(): string[] {
    return this.entries.map((entry) => entry.name);
  }

  /** Snapshot of the alias table (normalized aliases) */
  get aliases(): AliasTable {
    const table: AliasTable = {};
    for (const entry of this.entries) {
      table[entry.name] = [...entry.aliases];
    }
    return table;
  }

  has(member: string): boolean {
    return this.entries.some((entry) => entry.name === member);
  }

  /**
   * Register an alias for an existing member.
   * @returns false when the member is not on the roster or the alias is blank
   */
  addAlias(member: string, alias: string): boolean {
    const entry = this.entries.find((e) => e.name === member);
    const normalized = normalizeName(alias);
    if (!entry || normalized.length === 0) return false;
    entry.aliases.add(normalized);
    return true;
  }

  /**
   * Replace the whole roster. Aliases for names not in `members` are ignored.
   */
  replaceMembers(members: string[], aliases: AliasTable = {}): void {
    const seen = new Set<string>();
    const entries: RosterEntry[] = [];

    for (const name of members) {
      const trimmed = name.trim();
      if (trimmed.length === 0 || seen.has(trimmed)) continue;
      seen.add(trimmed);

      const memberAliases = new Set<string>();
      for (const alias of aliases[trimmed] ?? []) {
        const normalized = normalizeName(alias);
        if (normalized.length > 0) memberAliases.add(normalized);
      }

      entries.push({ name: trimmed, normalized: normalizeName(trimmed), aliases: memberAliases });
    }

    this.entries = entries;
  }

  /**
   * Match a raw name against the roster.
   *
   * @param raw - Free-text name from a transcript or LLM output
   * @param threshold - Minimum fuzzy score (alias/exact/containment bypass it)
   * @returns The match, or null for "no one" inputs and weak matches
   */
  match(
    raw: string | null | undefined,
    threshold: number = DEFAULT_MATCH_THRESHOLD
  ): RosterMatch | null {
    if (raw === null || raw === undefined || isNoOne(raw)) return null;

    const input = normalizeName(raw);
    if (input.length === 0) return null;

    for (const entry of this.entries) {
      if (entry.aliases.has(input)) {
        return { member: entry.name, score: 1, method: 'alias' };
      }
    }

    for (const entry of this.entries) {
      if (entry.normalized === input) {
        return { member: entry.name, score: 1, method: 'exact' };
      }
    }

    if (input.length < MIN_PARTIAL_LENGTH) return null;

    for (const entry of this.entries) {
      if (entry.normalized.includes(input) || input.includes(entry.normalized)) {
        return { member: entry.name, score: CONTAINMENT_SCORE, method: 'containment' };
      }
    }

    let best: RosterMatch | null = null;
    for (const entry of this.entries) {
      let score = nameSimilarity(input, entry.normalized);
      for (const alias of entry.aliases) {
        score = Math.max(score, nameSimilarity(input, alias));
      }
      if (score > (best?.score ?? 0)) {
        best = { member: entry.name, score, method: 'fuzzy' };
      }
    }

    return best && best.score >= threshold ? best : null;
  }

  /**
   * Resolve a raw name to a canonical member, or null.
   */
  resolve(raw: string | null | undefined, threshold?: number): string | null {
    return this.match(raw, threshold)?.member ?? null;
  }
}
