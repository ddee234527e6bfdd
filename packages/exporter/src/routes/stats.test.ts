import { describe, it, expect, afterEach } from "vitest";
import type { FastifyInstance } from "fastify";
import { buildTestApp } from "../test/build-test-app.js";
import { InMemoryUsageDb } from "../test/in-memory-usage-db.js";
import { sampleFixture } from "../test/fixtures.js";

let app: FastifyInstance | undefined;

afterEach(async () => {
  await app?.close();
  app = undefined;
});

describe("GET /api/stats", () => {
  it("returns 404 until a cycle has succeeded", async () => {
    const db = new InMemoryUsageDb(sampleFixture());
    db.fail();
    const built = await buildTestApp(db);
    app = built.app;
    await built.usageCollector.runCycle();

    const res = await app.inject({ method: "GET", url: "/api/stats" });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: "No usage statistics collected yet" });
  });

  it("returns the last snapshot", async () => {
    const built = await buildTestApp();
    app = built.app;
    await built.usageCollector.runCycle();

    const res = await app.inject({ method: "GET", url: "/api/stats" });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual(built.usageCollector.getLastSnapshot());
    expect(res.json().totals).toEqual({ users: 3, conversations: 4, messages: 7 });
    expect(res.json().topUsers[0]).toEqual({ userId: "u1", count: 3 });
  });

  it("keeps serving the previous snapshot after a failed cycle", async () => {
    const built = await buildTestApp();
    app = built.app;
    await built.usageCollector.runCycle();
    const before = built.usageCollector.getLastSnapshot();

    built.db.fail();
    await built.usageCollector.runCycle();

    const res = await app.inject({ method: "GET", url: "/api/stats" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual(before);
  });
});
