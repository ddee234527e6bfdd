/**
 * Types for the usage statistics snapshot.
 *
 * These describe the rows returned by the aggregation queries and the
 * snapshot held in memory by the UsageCollector (also served as JSON by
 * the stats endpoint).
 */

// ---------------------------------------------------------------------------
// Aggregation rows
// ---------------------------------------------------------------------------

/** A count for one calendar day */
export interface DailyCount {
  /** Day in YYYY-MM-DD (in the configured timezone) */
  date: string;
  count: number;
}

/** Message count for one user */
export interface UserCount {
  userId: string;
  count: number;
}

/** Message count for one model on one day */
export interface ModelDailyCount {
  model: string;
  date: string;
  count: number;
}

/** User count for one faculty, from the directory service */
export interface FacultyCount {
  faculty: string;
  count: number;
}

/** Document totals per collection */
export interface CollectionTotals {
  users: number;
  conversations: number;
  messages: number;
}

// ---------------------------------------------------------------------------
// Statistics
// ---------------------------------------------------------------------------

export type StdDevMode = "population" | "sample";

/** Descriptive statistics over a set of grouped counts */
export interface Summary {
  /** Number of groups the statistics were computed over */
  count: number;
  mean: number;
  stdDev: number;
}

// ---------------------------------------------------------------------------
// Snapshot
// ---------------------------------------------------------------------------

/** Per-model summary of the model's daily message counts */
export interface ModelSummary extends Summary {
  model: string;
}

/** Everything one successful collection cycle produced */
export interface UsageSnapshot {
  uniqueUsersPerDay: DailyCount[];
  uniqueUsers: Summary;
  messagesPerUser: Summary;
  /** Busiest users, by message count */
  topUsers: UserCount[];
  messagesPerModelPerDay: ModelDailyCount[];
  models: ModelSummary[];
  newUsersPerDay: DailyCount[];
  totals: CollectionTotals;
  /** Empty when no directory is configured */
  usersByFaculty: FacultyCount[];
  stdDevMode: StdDevMode;
  /** ISO 8601 timestamp */
  collectedAt: string;
  /** Wall time the cycle took, in milliseconds */
  durationMs: number;
}
