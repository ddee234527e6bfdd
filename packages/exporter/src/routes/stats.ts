/**
 * Stats API route — the last usage snapshot as JSON.
 */

import type { FastifyPluginAsync } from "fastify";
import { ErrorResponse, UsageSnapshotResponse } from "./stats.schemas.js";

export const statsRoutes: FastifyPluginAsync = async (app) => {
  // -------------------------------------------------------------------------
  // GET /api/stats
  // -------------------------------------------------------------------------
  app.get(
    "/",
    { schema: { response: { 200: UsageSnapshotResponse, 404: ErrorResponse } } },
    async (_request, reply) => {
      const snapshot = app.usageCollector.getLastSnapshot();
      if (!snapshot) {
        return reply.status(404).send({ error: "No usage statistics collected yet" });
      }
      return reply.send(snapshot);
    },
  );
};
