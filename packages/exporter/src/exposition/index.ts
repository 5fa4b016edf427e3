export { buildScrapeRegistry } from "./scrape-registry.js";
export { ExporterMetrics } from "./exporter-metrics.js";
export type { ExporterMetricsOptions, RenderedMetrics } from "./exporter-metrics.js";
