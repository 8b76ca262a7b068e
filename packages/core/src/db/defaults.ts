/**
 * Session defaults.
 */

export const SAFE_DEFAULTS = {
  /** LIMIT the model is asked to add when a query may return many rows */
  promptRowLimit: 25,
  /** Hard cap on returned rows regardless of query LIMIT */
  maxRows: 5000,
  /** Revisions after the first attempt */
  maxRevisions: 2,
} as const;
