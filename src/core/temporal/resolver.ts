/**
 * Temporal Resolver
 *
 * Turns a free-text date expression into a calendar date (yyyy-MM-dd).
 *
 * Strategies, first hit wins:
 * 1. Sentinels ("none", "n/a", ...) resolve to null
 * 2. Exact ISO date
 * 3. Explicit formats (day-first before month-first)
 * 4. Bare weekday names (next occurrence, never today)
 * 5. Natural-language parsing via chrono, preferring future dates
 * 6. Hand-rolled relative expressions ("end of week", "in 3 days", ...)
 *
 * Unresolvable text returns null. Callers apply a default deadline instead of failing.
 */

import * as chrono from 'chrono-node';
import { addDays, addWeeks, endOfMonth, format, isValid, parse, startOfDay } from 'date-fns';

// ═══════════════════════════════════════════════════════════════════════════════
// Constants
// ═══════════════════════════════════════════════════════════════════════════════

/** Calendar date format used everywhere downstream (tracker, store, wiki) */
export const DATE_FORMAT = 'yyyy-MM-dd';

/** Default number of days until a task without a resolvable due date is due */
export const DEFAULT_DEADLINE_DAYS = 7;

const SENTINELS = new Set(['', 'null', 'none', 'n/a', 'unspecified']);

const ISO_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/** Tried in order; day-first wins on ambiguous input like 03/04/2026 */
const EXPLICIT_FORMATS = [
  'dd/MM/yyyy',
  'MM/dd/yyyy',
  'dd-MM-yyyy',
  'MMMM d, yyyy',
  'MMM d, yyyy',
  'd MMMM yyyy',
  'd MMM yyyy'
] as const;

/** Weekday names and abbreviations mapped to Date#getDay() indices */
const WEEKDAYS = new Map<string, number>([
  ['sunday', 0],
  ['sun', 0],
  ['monday', 1],
  ['mon', 1],
  ['tuesday', 2],
  ['tue', 2],
  ['tues', 2],
  ['wednesday', 3],
  ['wed', 3],
  ['thursday', 4],
  ['thu', 4],
  ['thur', 4],
  ['thurs', 4],
  ['friday', 5],
  ['fri', 5],
  ['saturday', 6],
  ['sat', 6]
]);

// ═══════════════════════════════════════════════════════════════════════════════
// Public API
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Resolve a date expression to a yyyy-MM-dd string.
 *
 * @param text - Raw expression from an extracted task ("Friday", "2026-11-02", "in 3 days")
 * @param reference - The "now" that relative expressions are measured from
 */
export function resolveDate(
  text: string | null | undefined,
  reference: Date = new Date()
): string | null {
  if (text === null || text === undefined) return null;

  const trimmed = text.trim();
  const lowered = trimmed.toLowerCase();
  if (SENTINELS.has(lowered)) return null;

  const today = startOfDay(reference);

  if (ISO_PATTERN.test(trimmed)) {
    const iso = parse(trimmed, DATE_FORMAT, today);
    return isValid(iso) ? formatDate(iso) : null;
  }

  for (const pattern of EXPLICIT_FORMATS) {
    const parsed = parse(trimmed, pattern, today);
    if (isValid(parsed)) return formatDate(parsed);
  }

  if (WEEKDAYS.has(lowered)) {
    const weekday = matchRelativeExpression(lowered, today);
    return weekday ? formatDate(weekday) : null;
  }

  const natural = chrono.parseDate(trimmed, reference, { forwardDate: true });
  if (natural && isValid(natural)) return formatDate(natural);

  const relative = matchRelativeExpression(lowered, today);
  return relative ? formatDate(relative) : null;
}

/**
 * Match the fixed vocabulary of relative expressions.
 * Exported separately so the fallback semantics can be exercised directly.
 */
export function matchRelativeExpression(text: string, reference: Date): Date | null {
  const expr = text.trim().toLowerCase().replace(/\s+/g, ' ');
  const today = startOfDay(reference);

  switch (expr) {
    case 'today':
      return today;
    case 'tomorrow':
      return addDays(today, 1);
    case 'yesterday':
      return addDays(today, -1);
    case 'next week':
      return addDays(today, 7);
    case 'end of week': {
      // Coming Sunday; a full week out when today is already Sunday
      const daysUntilSunday = (7 - today.getDay()) % 7;
      return addDays(today, daysUntilSunday === 0 ? 7 : daysUntilSunday);
    }
    case 'end of month':
      return startOfDay(endOfMonth(today));
  }

  const inN = /^in (\d+) (day|days|week|weeks)$/.exec(expr);
  if (inN?.[1] && inN[2]) {
    return offsetBy(today, Number(inN[1]), inN[2]);
  }

  const fromNow = /^(\d+) (day|days|week|weeks) from now$/.exec(expr);
  if (fromNow?.[1] && fromNow[2]) {
    return offsetBy(today, Number(fromNow[1]), fromNow[2]);
  }

  const weekday = WEEKDAYS.get(expr);
  if (weekday !== undefined) {
    const diff = (weekday - today.getDay() + 7) % 7;
    return addDays(today, diff === 0 ? 7 : diff);
  }

  return null;
}

/**
 * Deadline applied when a task's due date could not be resolved.
 */
export function defaultDeadline(
  reference: Date = new Date(),
  days: number = DEFAULT_DEADLINE_DAYS
): string {
  return formatDate(addDays(startOfDay(reference), days));
}

/** Format a Date as yyyy-MM-dd in local time */
export function formatDate(date: Date): string {
  return format(date, DATE_FORMAT);
}

// ═══════════════════════════════════════════════════════════════════════════════
// Helpers
// ═══════════════════════════════════════════════════════════════════════════════

function offsetBy(today: Date, amount: number, unit: string): Date {
  return unit.startsWith('week') ? addWeeks(today, amount) : addDays(today, amount);
}
