/**
 * NAS Collector. One collection pass fetches every tracked metric in
 * parallel and reports a value (on success) plus a duration and a success
 * flag for each.
 *
 * IMPORTANT: This module is independent of the web framework and of the
 * exposition format. It receives its fetcher and logger via constructor
 * injection and holds no state between passes.
 */

import type {
  MetricDefinition,
  MetricDescriptor,
  ScrapeResult,
  TargetInstance,
} from "@nas-exporter/shared";
import type { MetricFetcher } from "./metric-fetcher.js";
import { NAS_METRICS, SCRAPE_DURATION, SCRAPE_SUCCESS, describeMetric } from "./metrics.js";

/** The subset of a pino logger the collector writes to */
export interface CollectorLogger {
  error(obj: object, msg: string): void;
  debug(obj: object, msg: string): void;
}

const silentLogger: CollectorLogger = {
  error: () => undefined,
  debug: () => undefined,
};

export interface NasCollectorOptions {
  /** Metrics to track (default: the fixed NAS metric set) */
  metrics?: readonly MetricDefinition[];
  logger?: CollectorLogger;
  /** Monotonic clock in milliseconds (default: performance.now) */
  clock?: () => number;
}

export class NasCollector {
  private fetcher: MetricFetcher;
  private target: TargetInstance;
  private metrics: readonly MetricDefinition[];
  private logger: CollectorLogger;
  private clock: () => number;

  constructor(fetcher: MetricFetcher, target: TargetInstance, options?: NasCollectorOptions) {
    this.fetcher = fetcher;
    this.target = Object.freeze({ ...target });
    this.metrics = options?.metrics ?? NAS_METRICS;
    this.logger = options?.logger ?? silentLogger;
    this.clock = options?.clock ?? (() => performance.now());
  }

  get targetInstance(): TargetInstance {
    return this.target;
  }

  /** Every metric identity a collection pass can emit */
  describe(): MetricDescriptor[] {
    return [...this.metrics.map(describeMetric), SCRAPE_DURATION, SCRAPE_SUCCESS];
  }

  /**
   * Run one full pass. Resolves once every fetch has settled, with one
   * result per tracked metric; never rejects.
   */
  async collect(): Promise<ScrapeResult[]> {
    return Promise.all(this.metrics.map((metric) => this.scrape(metric)));
  }

  private async scrape(metric: MetricDefinition): Promise<ScrapeResult> {
    const begin = this.clock();
    try {
      const value = await this.fetcher.fetch(metric.name, this.target.identifier, this.target.region);
      const durationSeconds = (this.clock() - begin) / 1000;
      this.logger.debug({ metric: metric.name, durationSeconds }, "scrape succeeded");
      return { metric, durationSeconds, success: true, value };
    } catch (err) {
      const durationSeconds = (this.clock() - begin) / 1000;
      const error = err instanceof Error ? err : new Error(String(err));
      this.logger.error({ metric: metric.name, durationSeconds, err: error }, "scrape failed");
      return { metric, durationSeconds, success: false, error };
    }
  }
}
