import Fastify, { type FastifyError, type FastifyServerOptions } from "fastify";
import type { ExporterConfig } from "@nas-exporter/shared";

import { NasClient } from "./nas/index.js";
import { NasCollector, NasMetricFetcher } from "./collector/index.js";
import { ExporterMetrics } from "./exposition/index.js";
import { healthRoutes } from "./routes/health.js";
import { landingRoutes } from "./routes/landing.js";
import { metricsRoutes } from "./routes/metrics.js";
import { VERSION } from "./version.js";

export interface BuildAppOptions extends FastifyServerOptions {
  config: ExporterConfig;
  /** Override the collector instance (for testing) */
  collector?: NasCollector;
  /** Override the exporter self-metrics (for testing) */
  exporterMetrics?: ExporterMetrics;
}

/** Logger settings for a config: pino-pretty for humans, JSON otherwise */
export function loggerOptions(config: ExporterConfig) {
  if (config.logFormat === "pretty") {
    return {
      level: config.logLevel,
      transport: {
        target: "pino-pretty",
        options: { colorize: true },
      },
    };
  }
  return { level: config.logLevel };
}

/**
 * Build and configure the Fastify application.
 * Exported separately from the server start so tests can use `app.inject()`.
 */
export async function buildApp(opts: BuildAppOptions) {
  const {
    config,
    collector: customCollector,
    exporterMetrics: customExporterMetrics,
    ...fastifyOpts
  } = opts;

  const app = Fastify(
    Object.keys(fastifyOpts).length > 0
      ? fastifyOpts
      : { logger: loggerOptions(config) },
  );

  // Collector + self-metrics (decorated so routes can access them)
  const collector =
    customCollector ??
    new NasCollector(
      new NasMetricFetcher(new NasClient({ credentials: config.credentials })),
      config.target,
      { logger: app.log.child({ module: "collector" }) },
    );
  const exporterMetrics =
    customExporterMetrics ??
    new ExporterMetrics({
      version: VERSION,
      includeExporterMetrics: config.includeExporterMetrics,
    });
  app.decorate("collector", collector);
  app.decorate("exporterMetrics", exporterMetrics);

  // ---------------------------------------------------------------------------
  // Global error handler: normalise error responses
  // ---------------------------------------------------------------------------
  app.setErrorHandler((error: FastifyError, request, reply) => {
    // Known HTTP errors (4xx)
    if (error.statusCode && error.statusCode < 500) {
      reply.status(error.statusCode).send({ error: error.message });
      return;
    }

    // Unexpected errors: log full details, return a generic message
    request.log.error({ err: error }, "request failed");
    reply.status(error.statusCode ?? 500).send({ error: "Internal server error" });
  });

  // ---------------------------------------------------------------------------
  // Routes
  // ---------------------------------------------------------------------------
  await app.register(metricsRoutes, {
    path: config.telemetryPath,
    maxRequests: config.maxRequests,
  });
  if (config.telemetryPath !== "/") {
    await app.register(landingRoutes, { metricsPath: config.telemetryPath });
  }
  await app.register(healthRoutes, { prefix: "/-/healthy" });

  return app;
}
