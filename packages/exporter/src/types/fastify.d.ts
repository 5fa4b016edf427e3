import "fastify";
import type { NasCollector } from "../collector/index.js";
import type { ExporterMetrics } from "../exposition/index.js";

declare module "fastify" {
  interface FastifyInstance {
    collector: NasCollector;
    exporterMetrics: ExporterMetrics;
  }
}
