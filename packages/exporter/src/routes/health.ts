import type { FastifyPluginAsync } from "fastify";

export const healthRoutes: FastifyPluginAsync = async (app) => {
  app.get("/", async (request, reply) => {
    let dbOk = false;

    try {
      await app.usageDb.ping();
      dbOk = true;
    } catch (err) {
      request.log.warn({ err }, "database ping failed");
    }

    const collector = app.usageCollector;
    const payload = {
      status: dbOk ? "ok" : "degraded",
      db: dbOk,
      lastCollectionAt: collector.lastSuccessAt?.toISOString() ?? null,
      lastError: collector.lastError?.message ?? null,
      timestamp: new Date().toISOString(),
    };

    return reply.status(dbOk ? 200 : 503).send(payload);
  });
};
