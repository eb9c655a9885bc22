/**
 * Name Normalization
 *
 * Canonical form used for every roster comparison: lowercase, separators
 * collapsed to single spaces, anything outside [a-z0-9 ] removed.
 */

const SEPARATORS = /[.,;:\-_/\\]+/g;
const NON_ALPHANUMERIC = /[^a-z0-9\s]/g;
const WHITESPACE = /\s+/g;

/** Raw inputs that mean "nobody owns this task" */
const NO_ONE = new Set(['', 'unassigned', 'none', 'null', 'n/a', 'nobody']);

/**
 * Normalize a person's name for matching.
 *
 * @example
 * normalizeName('Kailas S.S.') // 'kailas s s'
 * normalizeName("O'Brien-Smith") // 'obrien smith'
 */
export function normalizeName(name: string): string {
  return name
    .toLowerCase()
    .replace(SEPARATORS, ' ')
    .replace(NON_ALPHANUMERIC, '')
    .replace(WHITESPACE, ' ')
    .trim();
}

/**
 * Whether a raw assignee string explicitly means "no one".
 */
export function isNoOne(raw: string | null | undefined): boolean {
  if (raw === null || raw === undefined) return true;
  return NO_ONE.has(raw.trim().toLowerCase());
}
