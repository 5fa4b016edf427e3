/**
 * Types for the NAS metric collection pass.
 *
 * These describe what the collector knows about each tracked metric and
 * what a single scrape produces. Nothing here is persisted: a scrape result
 * lives for one collection pass and is then discarded.
 */

// ---------------------------------------------------------------------------
// Definitions
// ---------------------------------------------------------------------------

/** A tracked metric: the vendor-side statistic plus its exposition identity */
export interface MetricDefinition {
  /** Statistic name understood by the vendor API (e.g. "FreeStorageSpace") */
  readonly name: string;
  /** Fully-qualified exposition name (e.g. "nifcloud_nas_free_storage_space") */
  readonly exposedName: string;
  /** Human-readable description, used as the HELP text */
  readonly help: string;
}

/** Exposition metric kinds the collector emits */
export type MetricType = "gauge";

/** Identity of a metric the collector can ever emit */
export interface MetricDescriptor {
  readonly name: string;
  readonly help: string;
  readonly type: MetricType;
  readonly labelNames: readonly string[];
}

/** The monitored NAS instance */
export interface TargetInstance {
  readonly identifier: string;
  readonly region: string;
}

// ---------------------------------------------------------------------------
// Samples
// ---------------------------------------------------------------------------

/** One timestamped sample returned for a metric over a queried window */
export interface DataPoint {
  /** Milliseconds since the Unix epoch */
  timestamp: number;
  value: number;
}

interface ScrapeOutcome {
  metric: MetricDefinition;
  /** Seconds spent fetching this metric */
  durationSeconds: number;
}

export interface SuccessfulScrape extends ScrapeOutcome {
  success: true;
  value: number;
}

export interface FailedScrape extends ScrapeOutcome {
  success: false;
  error: Error;
}

/** Outcome of fetching one metric during a collection pass */
export type ScrapeResult = SuccessfulScrape | FailedScrape;
