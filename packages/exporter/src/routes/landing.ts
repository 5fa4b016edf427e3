import type { FastifyPluginAsync } from "fastify";

export interface LandingRoutesOptions {
  /** Telemetry path to link to */
  metricsPath: string;
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

export function landingPage(metricsPath: string): string {
  return [
    "<html>",
    "<head><title>NIFCLOUD NAS Exporter</title></head>",
    "<body>",
    "<h1>NIFCLOUD NAS Exporter</h1>",
    `<p><a href="${escapeHtml(metricsPath)}">Metrics</a></p>`,
    "</body>",
    "</html>",
  ].join("\n");
}

export const landingRoutes: FastifyPluginAsync<LandingRoutesOptions> = async (app, opts) => {
  const page = landingPage(opts.metricsPath);

  app.get("/", async (_request, reply) => {
    return reply.type("text/html; charset=utf-8").send(page);
  });
};
