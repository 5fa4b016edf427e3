/**
 * Telemetry route. Every request runs one full collection pass and
 * answers with the exposition text.
 */

import type { FastifyPluginAsync } from "fastify";
import { buildScrapeRegistry } from "../exposition/index.js";

export interface MetricsRoutesOptions {
  /** Path the exposition is served under */
  path: string;
  /** Maximum parallel scrapes; 0 disables the limit */
  maxRequests: number;
}

export const metricsRoutes: FastifyPluginAsync<MetricsRoutesOptions> = async (app, opts) => {
  let inFlight = 0;

  app.get(
    opts.path,
    {
      onRequest: async () => {
        app.exporterMetrics.requestStarted();
      },
      onResponse: async (_request, reply) => {
        app.exporterMetrics.requestFinished(reply.statusCode);
      },
    },
    async (_request, reply) => {
      if (opts.maxRequests > 0 && inFlight >= opts.maxRequests) {
        return reply
          .status(503)
          .type("text/plain; charset=utf-8")
          .send(`Limit of concurrent requests reached (${opts.maxRequests}), try again later.`);
      }

      inFlight++;
      try {
        const results = await app.collector.collect();
        const registry = buildScrapeRegistry(results, app.collector.targetInstance);
        const { contentType, body } = await app.exporterMetrics.render(registry);
        return reply.type(contentType).send(body);
      } finally {
        inFlight--;
      }
    },
  );
};
