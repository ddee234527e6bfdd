import "fastify";
import type { UsageCollector, UsageDb } from "../metrics/usage-collector.js";
import type { UsageMetrics } from "../metrics/registry.js";

declare module "fastify" {
  interface FastifyInstance {
    usageDb: UsageDb;
    usageMetrics: UsageMetrics;
    usageCollector: UsageCollector;
  }
}
