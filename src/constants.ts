/**
 * Application-wide constants
 */

// ============================================================
// QUERY LIMITS
// ============================================================

/** Rows returned by list queries when the caller gives no limit */
export const DEFAULT_QUERY_LIMIT = 50;

/** Upper bound on any list query, whatever the caller asks for */
export const MAX_QUERY_LIMIT = 200;

// ============================================================
// BACKGROUND JOBS
// ============================================================

/**
 * Settled dataset run jobs older than this are dropped from the job table.
 * Current: 1 hour
 */
export const JOB_RETENTION_MS = 60 * 60 * 1000;

/** How often the job table is pruned */
export const JOB_PRUNE_INTERVAL_MS = 10 * 60 * 1000;
