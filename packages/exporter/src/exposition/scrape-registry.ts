/**
 * Renders one collection pass into a fresh prom-client registry.
 *
 * A new registry per pass keeps scrapes independent: concurrent requests
 * never share gauges, and a metric that failed this pass has no sample.
 */

import { Gauge, Registry } from "prom-client";
import type { ScrapeResult, TargetInstance } from "@nas-exporter/shared";
import {
  INSTANCE_LABELS,
  META_LABELS,
  SCRAPE_DURATION,
  SCRAPE_SUCCESS,
} from "../collector/index.js";

export function buildScrapeRegistry(
  results: readonly ScrapeResult[],
  target: TargetInstance,
): Registry {
  const registry = new Registry();

  for (const result of results) {
    if (!result.success) continue;
    const gauge = new Gauge({
      name: result.metric.exposedName,
      help: result.metric.help,
      labelNames: INSTANCE_LABELS,
      registers: [registry],
    });
    gauge.set({ instance: target.identifier, region: target.region }, result.value);
  }

  const duration = new Gauge({
    name: SCRAPE_DURATION.name,
    help: SCRAPE_DURATION.help,
    labelNames: META_LABELS,
    registers: [registry],
  });
  const success = new Gauge({
    name: SCRAPE_SUCCESS.name,
    help: SCRAPE_SUCCESS.help,
    labelNames: META_LABELS,
    registers: [registry],
  });

  for (const result of results) {
    duration.set({ metric_name: result.metric.name }, result.durationSeconds);
    success.set({ metric_name: result.metric.name }, result.success ? 1 : 0);
  }

  return registry;
}
