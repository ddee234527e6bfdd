import { describe, it, expect } from "vitest";
import type { UsageSnapshot } from "@usage-exporter/shared";
import { createUsageMetrics, publishSnapshot } from "./registry.js";

function snapshot(overrides?: Partial<UsageSnapshot>): UsageSnapshot {
  return {
    uniqueUsersPerDay: [
      { date: "2025-03-01", count: 2 },
      { date: "2025-03-02", count: 4 },
    ],
    uniqueUsers: { count: 2, mean: 3, stdDev: 1 },
    messagesPerUser: { count: 4, mean: 2.5, stdDev: 0.5 },
    topUsers: [],
    messagesPerModelPerDay: [{ model: "gpt-4o", date: "2025-03-01", count: 9 }],
    models: [{ model: "gpt-4o", count: 1, mean: 9, stdDev: 0 }],
    newUsersPerDay: [{ date: "2025-03-01", count: 1 }],
    totals: { users: 5, conversations: 8, messages: 13 },
    usersByFaculty: [
      { faculty: "Science", count: 4 },
      { faculty: "Arts", count: 1 },
    ],
    stdDevMode: "population",
    collectedAt: "2025-03-02T12:00:00.000Z",
    durationMs: 250,
    ...overrides,
  };
}

describe("createUsageMetrics", () => {
  it("registers every usage gauge and the exporter self-metrics", async () => {
    const metrics = createUsageMetrics();
    const names = metrics.registry.getMetricsAsArray().map((m) => m.name);

    expect(names).toEqual([
      "librechat_exporter_collections_total",
      "librechat_daily_unique_users",
      "librechat_daily_unique_users_mean",
      "librechat_daily_unique_users_stddev",
      "librechat_messages_per_user_mean",
      "librechat_messages_per_user_stddev",
      "librechat_model_daily_messages",
      "librechat_model_daily_messages_mean",
      "librechat_model_daily_messages_stddev",
      "librechat_daily_new_users",
      "librechat_users",
      "librechat_conversations",
      "librechat_messages",
      "librechat_users_by_faculty",
      "librechat_exporter_last_success_timestamp_seconds",
      "librechat_exporter_collection_duration_seconds",
    ]);
  });

  it("keeps registries independent", () => {
    const a = createUsageMetrics();
    const b = createUsageMetrics();
    expect(a.registry).not.toBe(b.registry);
  });

  it("adds Node.js process metrics on request", () => {
    const metrics = createUsageMetrics({ defaultMetrics: true });
    const names = metrics.registry.getMetricsAsArray().map((m) => m.name);
    expect(names).toContain("process_cpu_user_seconds_total");
  });

  it("starts both outcome counters at zero", async () => {
    const text = await createUsageMetrics().registry.metrics();
    expect(text).toContain('librechat_exporter_collections_total{result="success"} 0\n');
    expect(text).toContain('librechat_exporter_collections_total{result="failure"} 0\n');
  });
});

describe("publishSnapshot", () => {
  it("writes the snapshot into the text exposition", async () => {
    const metrics = createUsageMetrics();
    publishSnapshot(metrics, snapshot());
    const lines = (await metrics.registry.metrics()).split("\n");

    expect(lines).toContain('librechat_daily_unique_users{date="2025-03-01"} 2');
    expect(lines).toContain('librechat_daily_unique_users{date="2025-03-02"} 4');
    expect(lines).toContain("librechat_daily_unique_users_mean 3");
    expect(lines).toContain("librechat_daily_unique_users_stddev 1");
    expect(lines).toContain("librechat_messages_per_user_mean 2.5");
    expect(lines).toContain("librechat_messages_per_user_stddev 0.5");
    expect(lines).toContain('librechat_model_daily_messages{model="gpt-4o",date="2025-03-01"} 9');
    expect(lines).toContain('librechat_model_daily_messages_mean{model="gpt-4o"} 9');
    expect(lines).toContain('librechat_model_daily_messages_stddev{model="gpt-4o"} 0');
    expect(lines).toContain('librechat_daily_new_users{date="2025-03-01"} 1');
    expect(lines).toContain("librechat_users 5");
    expect(lines).toContain("librechat_conversations 8");
    expect(lines).toContain("librechat_messages 13");
    expect(lines).toContain('librechat_users_by_faculty{faculty="Science"} 4');
    expect(lines).toContain('librechat_users_by_faculty{faculty="Arts"} 1');
    expect(lines).toContain(
      `librechat_exporter_last_success_timestamp_seconds ${Date.parse("2025-03-02T12:00:00.000Z") / 1000}`,
    );
    expect(lines).toContain("librechat_exporter_collection_duration_seconds 0.25");
  });

  it("replaces labelled series rather than accumulating them", async () => {
    const metrics = createUsageMetrics();
    publishSnapshot(metrics, snapshot());
    publishSnapshot(
      metrics,
      snapshot({
        uniqueUsersPerDay: [{ date: "2025-03-03", count: 1 }],
        messagesPerModelPerDay: [],
        models: [],
        usersByFaculty: [{ faculty: "Arts", count: 2 }],
      }),
    );

    const { values } = await metrics.dailyUniqueUsers.get();
    expect(values).toEqual([{ value: 1, labels: { date: "2025-03-03" } }]);
    expect((await metrics.modelDailyMessages.get()).values).toEqual([]);
    expect((await metrics.modelDailyMessagesMean.get()).values).toEqual([]);
    expect((await metrics.usersByFaculty.get()).values).toEqual([
      { value: 2, labels: { faculty: "Arts" } },
    ]);
  });
});
