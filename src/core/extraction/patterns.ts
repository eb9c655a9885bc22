/**
 * Text-Pattern Extraction
 *
 * Fallback when the LLM's structured output yields nothing usable. Scans text
 * sentence by sentence; per sentence the first matching pattern wins.
 *
 * Names are matched case-sensitively (capitalized first name plus optional
 * single-letter initials), so ordinary words at the start of a sentence
 * are not mistaken for people.
 */

// ═══════════════════════════════════════════════════════════════════════════════
// Patterns
// ═══════════════════════════════════════════════════════════════════════════════

/** "Alice", "Kailas S S", "Mukundan V. S." */
const NAME = String.raw`[A-Z][a-z]+(?:\s+[A-Z]\b\.?)*`;

/** Optional trailing deadline: "by Friday", "before end of month", "until 2026-11-02" */
const DUE = String.raw`(?:\s+(?:by|before|until)\s+(?<due>[^,;]+?))?`;

export interface TaskPattern {
  name: string;
  regex: RegExp;
}

/**
 * Ordered patterns. Each exposes named groups `name`, `action`, and optionally `due`.
 */
export const TASK_PATTERNS: readonly TaskPattern[] = [
  {
    name: 'modal-verb',
    regex: new RegExp(
      String.raw`^(?:.*?\s)??(?<name>${NAME})\s+(?:will|should|must|needs?\s+to|has\s+to|is\s+going\s+to)\s+(?<action>.+?)${DUE}\s*$`
    )
  },
  {
    name: 'assigned-to',
    regex: new RegExp(
      String.raw`^(?<action>.+?)\s+(?:is\s+|was\s+|has\s+been\s+)?assigned\s+to\s+(?<name>${NAME})${DUE}\s*$`
    )
  },
  {
    name: 'action-item',
    regex: new RegExp(
      String.raw`^(?:[Aa]ction\s+[Ii]tem|[Tt]ask|TODO|[Tt]odo)s?\s*:\s*(?<name>${NAME})\s+(?:to\s+)?(?<action>.+?)${DUE}\s*$`
    )
  },
  {
    name: 'work-on',
    regex: new RegExp(
      String.raw`^(?:.*?\s)??(?<name>${NAME})\s+(?:can|could|to)\s+(?<action>(?:work\s+on|handle|take\s+care\s+of|complete|start|begin|finish|look\s+into)\s+.+?)${DUE}\s*$`
    )
  }
];

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

export interface PatternMatch {
  description: string;
  assignee: string;
  dueDate: string | null;
  pattern: string;
}

/** Longest description kept from a single sentence */
const MAX_DESCRIPTION_LENGTH = 200;

// ═══════════════════════════════════════════════════════════════════════════════
// Matching
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Split text into sentences on terminal punctuation and line breaks.
 * Trailing terminators are removed from each sentence.
 */
export function splitSentences(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+|\n+/)
    .map((sentence) => sentence.trim().replace(/[.!?]+$/, '').trim())
    .filter((sentence) => sentence.length > 0);
}

/**
 * Match a single sentence against the ordered patterns.
 */
export function matchSentence(sentence: string): PatternMatch | null {
  for (const pattern of TASK_PATTERNS) {
    const groups = pattern.regex.exec(sentence)?.groups;
    if (!groups) continue;

    const name = groups['name'];
    const action = groups['action'];
    if (!name || !action) continue;

    return {
      description: action.trim().slice(0, MAX_DESCRIPTION_LENGTH),
      assignee: name.trim(),
      dueDate: groups['due']?.trim() || null,
      pattern: pattern.name
    };
  }
  return null;
}

/**
 * Scan one or more texts in order, de-duplicating by exact description.
 *
 * @param texts - Sources in priority order (summary first, then transcript)
 * @param limit - Maximum matches returned
 */
export function matchTaskPatterns(
  texts: Array<string | null | undefined>,
  limit: number
): PatternMatch[] {
  const matches: PatternMatch[] = [];
  const seen = new Set<string>();

  for (const text of texts) {
    if (!text) continue;
    for (const sentence of splitSentences(text)) {
      if (matches.length >= limit) return matches;

      const match = matchSentence(sentence);
      if (!match || seen.has(match.description)) continue;

      seen.add(match.description);
      matches.push(match);
    }
  }

  return matches;
}
