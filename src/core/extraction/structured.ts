/**
 * Structured Task Parsing
 *
 * Parses the LLM's task-extraction response. Models routinely wrap JSON in
 * markdown fences, use single quotes, or leave trailing commas, so parsing
 * retries after each repair, applying them cumulatively:
 *
 * 1. Strip markdown code fences (and prose around the JSON body)
 * 2. Single quotes → double quotes
 * 3. Remove trailing commas before } or ]
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════════
// Schemas
// ═══════════════════════════════════════════════════════════════════════════════

const optionalText = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? null : String(value)));

/**
 * One task in the upstream response.
 * Accepts both `description` and `title`, both `due_date` and `deadline`.
 */
export const upstreamTaskSchema = z
  .object({
    description: z.string().nullish(),
    title: z.string().nullish(),
    assignee: optionalText,
    due_date: optionalText,
    deadline: optionalText
  })
  .transform((task) => ({
    description: (task.description || task.title || '').trim(),
    assignee: task.assignee,
    dueDate: task.due_date ?? task.deadline
  }));

export type UpstreamTask = z.infer<typeof upstreamTaskSchema>;

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

export type StructuredParseResult =
  | { status: 'empty' }
  | { status: 'unparseable' }
  | { status: 'parsed'; tasks: UpstreamTask[]; repaired: boolean; dropped: number };

type Repair = (text: string) => string;

// ═══════════════════════════════════════════════════════════════════════════════
// Repairs
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Remove ``` fences and slice from the first opening bracket to the last closing one.
 */
export function stripCodeFences(text: string): string {
  const unfenced = text.replace(/```[a-zA-Z]*\s*/g, '').replace(/```/g, '');

  const openers = [unfenced.indexOf('{'), unfenced.indexOf('[')].filter((i) => i >= 0);
  const end = Math.max(unfenced.lastIndexOf('}'), unfenced.lastIndexOf(']'));
  if (openers.length === 0 || end < 0) return unfenced.trim();

  const start = Math.min(...openers);
  return end > start ? unfenced.slice(start, end + 1) : unfenced.trim();
}

export function singleToDoubleQuotes(text: string): string {
  return text.replace(/'/g, '"');
}

export function stripTrailingCommas(text: string): string {
  return text.replace(/,\s*([}\]])/g, '$1');
}

const REPAIRS: Repair[] = [stripCodeFences, singleToDoubleQuotes, stripTrailingCommas];

// ═══════════════════════════════════════════════════════════════════════════════
// Parsing
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Parse an upstream extraction response into task records.
 *
 * `parsed` with zero tasks is a valid outcome ({"tasks": []}); the cascade
 * treats it the same as an empty response and moves on to text patterns.
 */
export function parseStructuredResponse(
  response: string | null | undefined
): StructuredParseResult {
  if (response === null || response === undefined || response.trim().length === 0) {
    return { status: 'empty' };
  }

  let candidate = response.trim();
  let value = tryParse(candidate);
  let repaired = false;

  for (const repair of REPAIRS) {
    if (value.ok) break;
    candidate = repair(candidate);
    repaired = true;
    value = tryParse(candidate);
  }

  if (!value.ok) return { status: 'unparseable' };

  const items = toTaskArray(value.data);
  if (items === null) return { status: 'parsed', tasks: [], repaired, dropped: 0 };

  const tasks: UpstreamTask[] = [];
  let dropped = 0;
  for (const item of items) {
    const result = upstreamTaskSchema.safeParse(item);
    if (result.success) {
      tasks.push(result.data);
    } else {
      dropped++;
    }
  }

  return { status: 'parsed', tasks, repaired, dropped };
}

function tryParse(text: string): { ok: true; data: unknown } | { ok: false } {
  try {
    return { ok: true, data: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Locate the task array: `{tasks: [...]}`, a bare array, or the first array
 * property of an object that lacks `tasks`.
 */
function toTaskArray(data: unknown): unknown[] | null {
  if (Array.isArray(data)) return data;
  if (typeof data !== 'object' || data === null) return null;

  const fields = new Map<string, unknown>(Object.entries(data));
  const tasks = fields.get('tasks');
  if (Array.isArray(tasks)) return tasks;
  if (fields.has('tasks')) return null;

  for (const value of fields.values()) {
    if (Array.isArray(value)) return value;
  }
  return null;
}
