/**
 * Aggregation pipelines for the usage rollups.
 *
 * Pure builders so the exact stages can be asserted in tests; the
 * MongoUsageDb runs them against the `messages` and `users` collections.
 * Every pipeline projects its rows into the shapes declared in
 * `@usage-exporter/shared`.
 */

import type { PipelineStage } from "mongoose";
import type { QueryOptions } from "./usage-collector.js";

/** Label used for messages with no model recorded */
export const UNKNOWN_MODEL = "unknown";

/** `$createdAt` rendered as YYYY-MM-DD in the given timezone */
export function dayOf(timezone: string) {
  return {
    $dateToString: { format: "%Y-%m-%d", date: "$createdAt", timezone },
  };
}

function createdSince(since: Date | undefined): { createdAt?: { $gte: Date } } {
  return since ? { createdAt: { $gte: since } } : {};
}

/** Like createdSince, but always drops documents without a `createdAt` to group by */
function datedSince(since: Date | undefined): {
  createdAt: { $gte: Date } | { $exists: true };
} {
  return { createdAt: since ? { $gte: since } : { $exists: true } };
}

const HAS_USER = { user: { $exists: true, $nin: [null, ""] } };

/** Distinct message authors per day → `{ date, count }` */
export function uniqueUsersPerDayPipeline(opts: QueryOptions): PipelineStage[] {
  return [
    { $match: { ...HAS_USER, ...datedSince(opts.since) } },
    { $group: { _id: { date: dayOf(opts.timezone), user: "$user" } } },
    { $group: { _id: "$_id.date", count: { $sum: 1 } } },
    { $project: { _id: 0, date: "$_id", count: 1 } },
    { $sort: { date: 1 } },
  ];
}

/** Messages per author → `{ userId, count }`, busiest first */
export function messagesPerUserPipeline(opts: QueryOptions): PipelineStage[] {
  return [
    { $match: { ...HAS_USER, ...createdSince(opts.since) } },
    { $group: { _id: "$user", count: { $sum: 1 } } },
    { $project: { _id: 0, userId: { $toString: "$_id" }, count: 1 } },
    { $sort: { count: -1, userId: 1 } },
  ];
}

/** Messages per model per day → `{ model, date, count }` */
export function messagesPerModelPerDayPipeline(opts: QueryOptions): PipelineStage[] {
  return [
    { $match: datedSince(opts.since) },
    {
      $group: {
        _id: {
          model: {
            $cond: [{ $gt: [{ $ifNull: ["$model", ""] }, ""] }, "$model", UNKNOWN_MODEL],
          },
          date: dayOf(opts.timezone),
        },
        count: { $sum: 1 },
      },
    },
    { $project: { _id: 0, model: "$_id.model", date: "$_id.date", count: 1 } },
    { $sort: { date: 1, model: 1 } },
  ];
}

/** User accounts created per day → `{ date, count }` */
export function newUsersPerDayPipeline(opts: QueryOptions): PipelineStage[] {
  return [
    { $match: datedSince(opts.since) },
    { $group: { _id: dayOf(opts.timezone), count: { $sum: 1 } } },
    { $project: { _id: 0, date: "$_id", count: 1 } },
    { $sort: { date: 1 } },
  ];
}

/** Start of the lookback window, or undefined when the window is disabled */
export function lookbackStart(lookbackDays: number, now = new Date()): Date | undefined {
  if (lookbackDays <= 0) return undefined;
  return new Date(now.getTime() - lookbackDays * 24 * 60 * 60 * 1000);
}
