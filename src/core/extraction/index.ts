/**
 * Extraction Module
 *
 * Multi-strategy task extraction: structured LLM output with repairs,
 * text-pattern fallback, then an empty result.
 */

export { type CascadeOptions, cascadeDefaults, extractTasks, normalizeTasks } from './cascade';
export { matchSentence, matchTaskPatterns, splitSentences, TASK_PATTERNS } from './patterns';
export {
  parseStructuredResponse,
  singleToDoubleQuotes,
  type StructuredParseResult,
  stripCodeFences,
  stripTrailingCommas
} from './structured';
export type {
  CascadeAttempt,
  CascadeInput,
  CascadeResult,
  ExtractedTask,
  ExtractionMethod,
  NormalizedTask
} from './types';
