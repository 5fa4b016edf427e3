/**
 * Collector Module
 *
 * Fetches the tracked NAS metrics and turns each pass into scrape results.
 * Rendering those results is the exposition layer's job.
 */

export { NasCollector } from "./nas-collector.js";
export type { CollectorLogger, NasCollectorOptions } from "./nas-collector.js";
export { NasMetricFetcher, MetricFetchError } from "./metric-fetcher.js";
export type { MetricFetcher, FetchErrorKind } from "./metric-fetcher.js";
export * from "./metrics.js";
