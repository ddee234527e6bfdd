/**
 * Usage Collector — periodically runs the usage rollups against the
 * application database and publishes them to the Prometheus registry.
 *
 * Scheduling:
 *  - One cycle runs immediately on start()
 *  - The next cycle is scheduled `intervalMs` after the previous one
 *    finished, so cycles never overlap
 *  - A failed cycle is logged and skipped; the last published values stay
 *    exposed until a later cycle succeeds
 *
 * IMPORTANT: This module is independent of the web framework. It receives
 * its dependencies via constructor injection.
 */

import { pino, type BaseLogger } from "pino";
import type {
  CollectionTotals,
  DailyCount,
  FacultyCount,
  ModelDailyCount,
  ModelSummary,
  StdDevMode,
  UsageSnapshot,
  UserCount,
} from "@usage-exporter/shared";
import { lookbackStart } from "./pipelines.js";
import { publishSnapshot, type UsageMetrics } from "./registry.js";
import { summarize } from "./stats.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const DEFAULT_INTERVAL_MS = 60_000; // 1 minute
const TOP_USERS = 10;

// ---------------------------------------------------------------------------
// Query interface (to avoid coupling to mongoose directly)
// ---------------------------------------------------------------------------

export interface QueryOptions {
  /** Only documents created at or after this instant */
  since?: Date;
  /** IANA zone or UTC offset used to cut calendar days */
  timezone: string;
}

/** Read-only rollups over the application database — allows faking in tests */
export interface UsageQueries {
  uniqueUsersPerDay(opts: QueryOptions): Promise<DailyCount[]>;
  messagesPerUser(opts: QueryOptions): Promise<UserCount[]>;
  messagesPerModelPerDay(opts: QueryOptions): Promise<ModelDailyCount[]>;
  newUsersPerDay(opts: QueryOptions): Promise<DailyCount[]>;
  totals(opts: QueryOptions): Promise<CollectionTotals>;
}

/** UsageQueries plus connection lifecycle, as served by the HTTP layer */
export interface UsageDb extends UsageQueries {
  /** Round-trip to the server; rejects when it is unreachable */
  ping(): Promise<void>;
  close(): Promise<void>;
}

/** Directory service the users-per-faculty rollup is read from */
export interface FacultyDirectory {
  usersByFaculty(): Promise<FacultyCount[]>;
}

export type CollectorLogger = Pick<BaseLogger, "debug" | "info" | "warn" | "error">;

export interface UsageCollectorOptions {
  /** Delay between the end of one cycle and the start of the next (default: 60000) */
  intervalMs?: number;
  /** Restrict rollups to the last N days; 0 disables the window (default: 0) */
  lookbackDays?: number;
  /** Timezone used to cut calendar days (default: UTC) */
  timezone?: string;
  /** Standard deviation flavour (default: population) */
  stdDev?: StdDevMode;
  /** Directory for users per faculty (default: none, rollup left empty) */
  directory?: FacultyDirectory;
  /** Logger (default: silent) */
  logger?: CollectorLogger;
}

// ---------------------------------------------------------------------------
// UsageCollector
// ---------------------------------------------------------------------------

export class UsageCollector {
  private queries: UsageQueries;
  private metrics: UsageMetrics;
  private intervalMs: number;
  private lookbackDays: number;
  private timezone: string;
  private stdDevMode: StdDevMode;
  private directory: FacultyDirectory | null;
  private log: CollectorLogger;

  private active = false;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private inFlight: Promise<boolean> | null = null;

  private lastSnapshot: UsageSnapshot | null = null;
  private _lastSuccessAt: Date | null = null;
  private _lastError: Error | null = null;

  constructor(queries: UsageQueries, metrics: UsageMetrics, options?: UsageCollectorOptions) {
    this.queries = queries;
    this.metrics = metrics;
    this.intervalMs = options?.intervalMs ?? DEFAULT_INTERVAL_MS;
    this.lookbackDays = options?.lookbackDays ?? 0;
    this.timezone = options?.timezone ?? "UTC";
    this.stdDevMode = options?.stdDev ?? "population";
    this.directory = options?.directory ?? null;
    this.log = options?.logger ?? pino({ enabled: false });
  }

  /** Start the collection loop */
  start(): void {
    if (this.active) return;
    this.active = true;
    // Run an initial collection immediately
    this.schedule(0);
  }

  /** Stop the collection loop and wait for a cycle that is still running */
  async stop(): Promise<void> {
    this.active = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) await this.inFlight;
  }

  /** Whether the collector is running */
  get isRunning(): boolean {
    return this.active;
  }

  /** The last successfully collected snapshot, or null before the first success */
  getLastSnapshot(): UsageSnapshot | null {
    return this.lastSnapshot;
  }

  get lastSuccessAt(): Date | null {
    return this._lastSuccessAt;
  }

  /** Error of the most recent cycle, cleared by the next success */
  get lastError(): Error | null {
    return this._lastError;
  }

  /**
   * Run a single collection cycle. Resolves true when the snapshot was
   * published, false when the cycle failed; never rejects.
   */
  runCycle(): Promise<boolean> {
    if (this.inFlight) return this.inFlight;
    const cycle = this.collect().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = cycle;
    return cycle;
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.runCycle().then(() => {
        if (this.active && !this.timer) this.schedule(this.intervalMs);
      });
    }, delayMs);
  }

  private async collect(): Promise<boolean> {
    const startedAt = Date.now();
    const opts: QueryOptions = {
      since: lookbackStart(this.lookbackDays, new Date(startedAt)),
      timezone: this.timezone,
    };

    let snapshot: UsageSnapshot;
    try {
      const [
        uniqueUsersPerDay,
        messagesPerUser,
        messagesPerModelPerDay,
        newUsersPerDay,
        totals,
        usersByFaculty,
      ] = await Promise.all([
        this.queries.uniqueUsersPerDay(opts),
        this.queries.messagesPerUser(opts),
        this.queries.messagesPerModelPerDay(opts),
        this.queries.newUsersPerDay(opts),
        this.queries.totals(opts),
        this.directory ? this.directory.usersByFaculty() : Promise.resolve<FacultyCount[]>([]),
      ]);

      snapshot = {
        uniqueUsersPerDay,
        uniqueUsers: summarize(uniqueUsersPerDay.map((r) => r.count), this.stdDevMode),
        messagesPerUser: summarize(messagesPerUser.map((r) => r.count), this.stdDevMode),
        topUsers: messagesPerUser.slice(0, TOP_USERS),
        messagesPerModelPerDay,
        models: summarizeModels(messagesPerModelPerDay, this.stdDevMode),
        newUsersPerDay,
        totals,
        usersByFaculty,
        stdDevMode: this.stdDevMode,
        collectedAt: new Date(startedAt).toISOString(),
        durationMs: Date.now() - startedAt,
      };
      publishSnapshot(this.metrics, snapshot);
    } catch (err) {
      this._lastError = err instanceof Error ? err : new Error(String(err));
      this.metrics.collections.inc({ result: "failure" });
      this.log.error({ err }, "usage collection failed; keeping previous values");
      return false;
    }

    this.metrics.collections.inc({ result: "success" });
    this.lastSnapshot = snapshot;
    this._lastSuccessAt = new Date(startedAt);
    this._lastError = null;
    this.log.debug(
      {
        days: snapshot.uniqueUsersPerDay.length,
        users: snapshot.messagesPerUser.count,
        models: snapshot.models.length,
        durationMs: snapshot.durationMs,
      },
      "usage metrics published",
    );
    return true;
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Group per-model-per-day rows by model and summarize each model's daily counts */
export function summarizeModels(rows: ModelDailyCount[], mode: StdDevMode): ModelSummary[] {
  const byModel = new Map<string, number[]>();
  for (const row of rows) {
    const counts = byModel.get(row.model);
    if (counts) counts.push(row.count);
    else byModel.set(row.model, [row.count]);
  }
  return Array.from(byModel, ([model, counts]) => ({ model, ...summarize(counts, mode) })).sort(
    (a, b) => (a.model < b.model ? -1 : a.model > b.model ? 1 : 0),
  );
}
