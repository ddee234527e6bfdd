/**
 * Prometheus registry for the usage rollups.
 *
 * One registry per process, created at startup and shared by the
 * UsageCollector (the only writer) and the `/metrics` route (reader).
 * A custom registry rather than prom-client's global keeps tests isolated.
 */

import { Counter, Gauge, Registry, collectDefaultMetrics } from "prom-client";
import type { UsageSnapshot } from "@usage-exporter/shared";

export const METRIC_PREFIX = "librechat_";

export interface UsageMetrics {
  registry: Registry;
  dailyUniqueUsers: Gauge<"date">;
  dailyUniqueUsersMean: Gauge;
  dailyUniqueUsersStdDev: Gauge;
  messagesPerUserMean: Gauge;
  messagesPerUserStdDev: Gauge;
  modelDailyMessages: Gauge<"model" | "date">;
  modelDailyMessagesMean: Gauge<"model">;
  modelDailyMessagesStdDev: Gauge<"model">;
  dailyNewUsers: Gauge<"date">;
  users: Gauge;
  conversations: Gauge;
  messages: Gauge;
  usersByFaculty: Gauge<"faculty">;
  collections: Counter<"result">;
  lastSuccess: Gauge;
  collectionDuration: Gauge;
}

export interface UsageMetricsOptions {
  /** Registry to register into (default: a fresh one) */
  registry?: Registry;
  /** Also export Node.js process metrics */
  defaultMetrics?: boolean;
}

export function createUsageMetrics(options?: UsageMetricsOptions): UsageMetrics {
  const registry = options?.registry ?? new Registry();
  const registers = [registry];

  if (options?.defaultMetrics) {
    collectDefaultMetrics({ register: registry });
  }

  const gauge = <T extends string = string>(
    name: string,
    help: string,
    labelNames: readonly T[] = [],
  ) => new Gauge<T>({ name: METRIC_PREFIX + name, help, labelNames, registers });

  const collections = new Counter<"result">({
    name: `${METRIC_PREFIX}exporter_collections_total`,
    help: "Collection cycles run, by outcome",
    labelNames: ["result"],
    registers,
  });
  collections.inc({ result: "success" }, 0);
  collections.inc({ result: "failure" }, 0);

  return {
    registry,
    dailyUniqueUsers: gauge("daily_unique_users", "Distinct users who sent a message, per day", ["date"]),
    dailyUniqueUsersMean: gauge("daily_unique_users_mean", "Mean of daily unique users"),
    dailyUniqueUsersStdDev: gauge("daily_unique_users_stddev", "Standard deviation of daily unique users"),
    messagesPerUserMean: gauge("messages_per_user_mean", "Mean number of messages per user"),
    messagesPerUserStdDev: gauge("messages_per_user_stddev", "Standard deviation of messages per user"),
    modelDailyMessages: gauge("model_daily_messages", "Messages per model, per day", ["model", "date"]),
    modelDailyMessagesMean: gauge("model_daily_messages_mean", "Mean of a model's daily message count", ["model"]),
    modelDailyMessagesStdDev: gauge(
      "model_daily_messages_stddev",
      "Standard deviation of a model's daily message count",
      ["model"],
    ),
    dailyNewUsers: gauge("daily_new_users", "User accounts created, per day", ["date"]),
    users: gauge("users", "User accounts"),
    conversations: gauge("conversations", "Conversations"),
    messages: gauge("messages", "Messages"),
    usersByFaculty: gauge("users_by_faculty", "Directory users per faculty", ["faculty"]),
    collections,
    lastSuccess: gauge(
      "exporter_last_success_timestamp_seconds",
      "Unix time of the last successful collection cycle",
    ),
    collectionDuration: gauge(
      "exporter_collection_duration_seconds",
      "Duration of the last successful collection cycle",
    ),
  };
}

/**
 * Overwrite every usage gauge with the values of a snapshot.
 *
 * Labelled gauges are reset first so series whose date or model no longer
 * appears in the data drop out of the exposition. The whole update is
 * synchronous, so a scrape never observes a half-published cycle.
 */
export function publishSnapshot(metrics: UsageMetrics, snapshot: UsageSnapshot): void {
  metrics.dailyUniqueUsers.reset();
  for (const row of snapshot.uniqueUsersPerDay) {
    metrics.dailyUniqueUsers.set({ date: row.date }, row.count);
  }
  metrics.dailyUniqueUsersMean.set(snapshot.uniqueUsers.mean);
  metrics.dailyUniqueUsersStdDev.set(snapshot.uniqueUsers.stdDev);

  metrics.messagesPerUserMean.set(snapshot.messagesPerUser.mean);
  metrics.messagesPerUserStdDev.set(snapshot.messagesPerUser.stdDev);

  metrics.modelDailyMessages.reset();
  for (const row of snapshot.messagesPerModelPerDay) {
    metrics.modelDailyMessages.set({ model: row.model, date: row.date }, row.count);
  }
  metrics.modelDailyMessagesMean.reset();
  metrics.modelDailyMessagesStdDev.reset();
  for (const m of snapshot.models) {
    metrics.modelDailyMessagesMean.set({ model: m.model }, m.mean);
    metrics.modelDailyMessagesStdDev.set({ model: m.model }, m.stdDev);
  }

  metrics.dailyNewUsers.reset();
  for (const row of snapshot.newUsersPerDay) {
    metrics.dailyNewUsers.set({ date: row.date }, row.count);
  }

  metrics.users.set(snapshot.totals.users);
  metrics.conversations.set(snapshot.totals.conversations);
  metrics.messages.set(snapshot.totals.messages);

  metrics.usersByFaculty.reset();
  for (const row of snapshot.usersByFaculty) {
    metrics.usersByFaculty.set({ faculty: row.faculty }, row.count);
  }

  metrics.lastSuccess.set(Date.parse(snapshot.collectedAt) / 1000);
  metrics.collectionDuration.set(snapshot.durationMs / 1000);
}
