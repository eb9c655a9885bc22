/**
 * Pipeline Configuration
 *
 * Tuning parameters for a pipeline run. Exposed in minutes.json under
 * `pipeline`; these are the defaults when a field is omitted.
 */

// ═══════════════════════════════════════════════════════════════════════════════
// Type Definitions
// ═══════════════════════════════════════════════════════════════════════════════

export interface PipelineSettings {
  /** Days from the run's reference time (now) to the default deadline (default: 7) */
  readonly defaultDeadlineDays: number;
  /** Maximum tasks from the text-pattern fallback (default: 10) */
  readonly maxFallbackTasks: number;
  /** Minimum trimmed task description length (default: 4) */
  readonly minDescriptionLength: number;
  /** Fuzzy roster match threshold (default: 0.6) */
  readonly matchThreshold: number;
  /** Characters of transcript stored when there is no summary (default: 5000) */
  readonly transcriptExcerptLength: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Default Configuration
// ═══════════════════════════════════════════════════════════════════════════════

export const defaults: PipelineSettings = {
  defaultDeadlineDays: 7,
  maxFallbackTasks: 10,
  minDescriptionLength: 4,
  matchThreshold: 0.6,
  transcriptExcerptLength: 5000
};

/**
 * Create settings with optional overrides.
 *
 * @example
 * const settings = createSettings({ maxFallbackTasks: 3 });
 */
export function createSettings(overrides?: Partial<PipelineSettings>): PipelineSettings {
  if (!overrides) return defaults;
  return { ...defaults, ...overrides };
}
