import Fastify, { type FastifyServerOptions, type FastifyError } from "fastify";

import { loadConfig, type ExporterConfig } from "./config.js";
import { LdapFacultyDirectory } from "./directory/ldap-faculty-directory.js";
import { MongoUsageDb } from "./metrics/mongo-usage-db.js";
import { createUsageMetrics, type UsageMetrics } from "./metrics/registry.js";
import { UsageCollector, type UsageDb } from "./metrics/usage-collector.js";
import { healthRoutes } from "./routes/health.js";
import { metricsRoutes } from "./routes/metrics.js";
import { statsRoutes } from "./routes/stats.js";

export interface BuildAppOptions extends FastifyServerOptions {
  /** Resolved configuration (default: read from the environment) */
  config?: ExporterConfig;
  /** Override the database (for testing) */
  usageDb?: UsageDb;
  /** Override the metrics registry (for testing) */
  usageMetrics?: UsageMetrics;
  /** Override the collector instance (for testing) */
  usageCollector?: UsageCollector;
}

/**
 * Build and configure the Fastify application.
 * Exported separately from the server start so tests can use `app.inject()`.
 */
export async function buildApp(opts?: BuildAppOptions) {
  const {
    config: customConfig,
    usageDb: customDb,
    usageMetrics: customMetrics,
    usageCollector: customCollector,
    ...fastifyOpts
  } = opts ?? {};
  const config = customConfig ?? loadConfig();

  const app = Fastify(
    Object.keys(fastifyOpts).length > 0
      ? fastifyOpts
      : {
          logger: config.isDev
            ? {
                level: config.logLevel,
                transport: {
                  target: "pino-pretty",
                  options: { colorize: true },
                },
              }
            : { level: config.logLevel },
        },
  );

  // Database + registry + collector (decorated so routes can access them)
  const usageDb = customDb ?? new MongoUsageDb(config.mongo);
  const usageMetrics =
    customMetrics ?? createUsageMetrics({ defaultMetrics: config.metrics.defaultMetrics });
  const usageCollector =
    customCollector ??
    new UsageCollector(usageDb, usageMetrics, {
      intervalMs: config.collector.intervalMs,
      lookbackDays: config.collector.lookbackDays,
      timezone: config.collector.timezone,
      stdDev: config.collector.stdDev,
      directory: config.ldap ? new LdapFacultyDirectory(config.ldap) : undefined,
      logger: app.log.child({ module: "usage-collector" }),
    });
  app.decorate("usageDb", usageDb);
  app.decorate("usageMetrics", usageMetrics);
  app.decorate("usageCollector", usageCollector);

  // ---------------------------------------------------------------------------
  // Global error handler — normalise error responses
  // ---------------------------------------------------------------------------
  app.setErrorHandler((error: FastifyError, request, reply) => {
    // Known HTTP errors (4xx)
    if (error.statusCode && error.statusCode < 500) {
      reply.status(error.statusCode).send({ error: error.message });
      return;
    }

    // Unexpected errors — log full details, return generic message
    request.log.error({ err: error }, "request failed");
    reply.status(error.statusCode ?? 500).send({
      error: config.isDev ? error.message : "Internal server error",
    });
  });

  // ---------------------------------------------------------------------------
  // Routes
  // ---------------------------------------------------------------------------
  await app.register(metricsRoutes, { prefix: "/metrics" });
  await app.register(healthRoutes, { prefix: "/api/health" });
  await app.register(statsRoutes, { prefix: "/api/stats" });

  // ---------------------------------------------------------------------------
  // Lifecycle hooks
  // ---------------------------------------------------------------------------

  // Start collecting when the server is ready
  app.addHook("onReady", async () => {
    usageCollector.start();
  });

  // Stop collecting, then drop the database connection
  app.addHook("onClose", async () => {
    await usageCollector.stop();
    await usageDb.close();
  });

  return app;
}
