/**
 * Metrics about the exporter itself: build info always, process and
 * metric-handler metrics unless disabled.
 */

import { Counter, Gauge, Registry, collectDefaultMetrics } from "prom-client";
import { EXPORTER_NAME } from "../collector/index.js";

export interface ExporterMetricsOptions {
  version: string;
  /** Expose process_* and handler metrics (default: true) */
  includeExporterMetrics?: boolean;
}

export interface RenderedMetrics {
  contentType: string;
  body: string;
}

export class ExporterMetrics {
  readonly registry = new Registry();
  private requests: Counter<"code"> | null = null;
  private inFlight: Gauge | null = null;

  constructor(options: ExporterMetricsOptions) {
    const buildInfo = new Gauge({
      name: `${EXPORTER_NAME}_build_info`,
      help: `A metric with a constant '1' value labeled by version and nodeversion from which ${EXPORTER_NAME} was built.`,
      labelNames: ["version", "nodeversion"] as const,
      registers: [this.registry],
    });
    buildInfo.set({ version: options.version, nodeversion: process.version }, 1);

    if (options.includeExporterMetrics ?? true) {
      collectDefaultMetrics({ register: this.registry });
      this.requests = new Counter({
        name: `${EXPORTER_NAME}_metric_handler_requests_total`,
        help: "Total number of scrapes by HTTP status code.",
        labelNames: ["code"] as const,
        registers: [this.registry],
      });
      this.inFlight = new Gauge({
        name: `${EXPORTER_NAME}_metric_handler_requests_in_flight`,
        help: "Current number of scrapes being served.",
        registers: [this.registry],
      });
    }
  }

  requestStarted(): void {
    this.inFlight?.inc();
  }

  requestFinished(statusCode: number): void {
    this.inFlight?.dec();
    this.requests?.inc({ code: String(statusCode) });
  }

  /** Exposition text for these metrics merged with one scrape's registry */
  async render(scrape: Registry): Promise<RenderedMetrics> {
    const merged = Registry.merge([this.registry, scrape]);
    return { contentType: merged.contentType, body: await merged.metrics() };
  }
}
