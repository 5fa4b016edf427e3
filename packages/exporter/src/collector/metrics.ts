/**
 * The fixed set of tracked NAS metrics and the meta-metrics describing
 * each scrape.
 */

import type { MetricDefinition, MetricDescriptor } from "@nas-exporter/shared";

export const NAMESPACE = "nifcloud_nas";
export const EXPORTER_NAME = "nifcloud_nas_exporter";

/** Labels carried by every NAS metric value */
export const INSTANCE_LABELS = ["instance", "region"] as const;
/** Label carried by the scrape meta-metrics */
export const META_LABELS = ["metric_name"] as const;

function define(name: string, suffix: string, help: string): MetricDefinition {
  return Object.freeze({ name, exposedName: `${NAMESPACE}_${suffix}`, help });
}

export const NAS_METRICS: readonly MetricDefinition[] = Object.freeze([
  define("FreeStorageSpace", "free_storage_space", "The amount of available storage space. Units: Bytes"),
  define("UsedStorageSpace", "used_storage_space", "The amount of used storage space. Units: Bytes"),
  define("ReadIOPS", "read_iops", "The average number of disk read I/O operations per second. Units: Count/Second"),
  define("WriteIOPS", "write_iops", "The average number of disk write I/O operations per second. Units: Count/Second"),
  define("ReadThroughput", "read_throughput", "The average number of bytes read from disk per second. Units: Bytes/Second"),
  define("WriteThroughput", "write_throughput", "The average number of bytes written to disk per second. Units: Bytes/Second"),
  define("ActiveConnections", "active_connections", "The active connection counts. Units: Count"),
  define(
    "GlobalReadTraffic",
    "global_read_traffic",
    "The incoming (Receive) network traffic from global on the NAS instance. Units: Bytes/second",
  ),
  define(
    "PrivateReadTraffic",
    "private_read_traffic",
    "The incoming (Receive) network traffic from private on the NAS instance. Units: Bytes/second",
  ),
  define(
    "GlobalWriteTraffic",
    "global_write_traffic",
    "The outgoing (Transmit) network traffic to global on the NAS instance. Units: Bytes/second",
  ),
  define(
    "PrivateWriteTraffic",
    "private_write_traffic",
    "The outgoing (Transmit) network traffic to private on the NAS instance. Units: Bytes/second",
  ),
]);

/** Vendor-side statistic names the fetcher accepts */
export const NAS_METRIC_NAMES: ReadonlySet<string> = new Set(NAS_METRICS.map((m) => m.name));

export const SCRAPE_DURATION: MetricDescriptor = Object.freeze({
  name: `${NAMESPACE}_scrape_collector_duration_seconds`,
  help: `${EXPORTER_NAME}: Duration of a collector scrape.`,
  type: "gauge",
  labelNames: META_LABELS,
});

export const SCRAPE_SUCCESS: MetricDescriptor = Object.freeze({
  name: `${NAMESPACE}_scrape_collector_success`,
  help: `${EXPORTER_NAME}: Whether a collector succeeded.`,
  type: "gauge",
  labelNames: META_LABELS,
});

export function describeMetric(metric: MetricDefinition): MetricDescriptor {
  return {
    name: metric.exposedName,
    help: metric.help,
    type: "gauge",
    labelNames: INSTANCE_LABELS,
  };
}
