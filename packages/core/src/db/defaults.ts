/**
 * Safe session defaults for generation and query execution.
 * These are conservative limits enforced by the pipeline.
 */

export const SAFE_DEFAULTS = {
  /** Hard cap on returned rows */
  maxRows: 5000,
  /** Statement timeout in milliseconds */
  statementTimeoutMs: 15_000,
  /** Bounded wait for a single oracle call */
  oracleTimeoutMs: 30_000,
  /** Extra generation attempts when no statement could be extracted */
  generationRetries: 1,
  /** Hard ceiling for generationRetries */
  maxGenerationRetries: 2,
  temperature: 0.1,
  maxTokens: 1000,
  /** Results above this many rows are shown as a table, never charted */
  chartRowThreshold: 500,
} as const;

export const DEFAULT_MODEL = 'gpt-4o-mini';
