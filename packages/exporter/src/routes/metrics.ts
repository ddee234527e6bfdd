/**
 * Prometheus scrape endpoint.
 *
 * Serves whatever the UsageCollector last published. A scrape never runs
 * or waits for a collection cycle.
 */

import type { FastifyPluginAsync } from "fastify";

export const metricsRoutes: FastifyPluginAsync = async (app) => {
  // -------------------------------------------------------------------------
  // GET /metrics
  // -------------------------------------------------------------------------
  app.get("/", async (_request, reply) => {
    const { registry } = app.usageMetrics;
    const body = await registry.metrics();
    return reply.header("content-type", registry.contentType).send(body);
  });
};
