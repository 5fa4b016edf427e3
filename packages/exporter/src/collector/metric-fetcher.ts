/**
 * Metric fetcher: one time-windowed statistics query per call, reduced to
 * the value of the most recent data point.
 */

import type { DataPoint, RawDatapoint } from "@nas-exporter/shared";
import type { NasClient, PreparedRequest } from "../nas/index.js";
import { NAS_METRIC_NAMES } from "./metrics.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/**
 * Trailing query window. The API publishes with some lag, so the window is
 * wide enough to always hold at least one data point.
 */
export const QUERY_WINDOW_MS = 180_000; // 3 minutes

export const INSTANCE_DIMENSION = "NASInstanceIdentifier";

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export type FetchErrorKind = "RequestBuild" | "Transport" | "NoData" | "ParseFailure";

export class MetricFetchError extends Error {
  constructor(
    public kind: FetchErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "MetricFetchError";
  }
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

const RFC3339_RE =
  /^(\d{4})-(\d{2})-(\d{2})[Tt](\d{2}):(\d{2}):(\d{2})(\.\d+)?(?:([Zz])|([+-])(\d{2}):(\d{2}))$/;

/**
 * Parse an RFC3339 timestamp into epoch milliseconds (fractional part kept).
 * Returns null for anything that is not a valid RFC3339 instant.
 */
export function parseTimestamp(value: string): number | null {
  const m = RFC3339_RE.exec(value);
  if (!m) return null;

  const [year, month, day, hour, minute, second] = m.slice(1, 7).map(Number);
  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) return null;

  // Date.UTC would read years 0-99 as 1900-1999
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  if (day < 1 || date.getUTCDate() !== day) return null;
  const midnight = date.getTime();

  let offsetMinutes = 0;
  if (!m[8]) {
    const offsetHours = Number(m[10]);
    const offsetMins = Number(m[11]);
    if (offsetHours > 23 || offsetMins > 59) return null;
    offsetMinutes = (m[9] === "-" ? -1 : 1) * (offsetHours * 60 + offsetMins);
  }

  const fraction = m[7] ? Number(`0${m[7]}`) * 1000 : 0;
  return (
    midnight +
    ((hour * 60 + minute - offsetMinutes) * 60 + second) * 1000 +
    fraction
  );
}

const DECIMAL_RE = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;
const INFINITY_RE = /^([+-]?)inf(?:inity)?$/i;

/**
 * Parse a decimal float literal. `NaN` and `Inf` spellings are accepted;
 * empty strings and values out of float64 range are not.
 */
export function parseSum(value: string): number | null {
  if (DECIMAL_RE.test(value)) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  const inf = INFINITY_RE.exec(value);
  if (inf) return inf[1] === "-" ? -Infinity : Infinity;
  if (/^nan$/i.test(value)) return NaN;
  return null;
}

/** Decode every raw data point; any malformed field fails the whole set */
export function decodeDatapoints(raw: readonly RawDatapoint[]): DataPoint[] {
  return raw.map((dp) => {
    if (dp.timestamp === undefined) {
      throw new MetricFetchError("ParseFailure", "datapoint has no timestamp");
    }
    const timestamp = parseTimestamp(dp.timestamp);
    if (timestamp === null) {
      throw new MetricFetchError("ParseFailure", `could not parse timestamp ${JSON.stringify(dp.timestamp)}`);
    }

    if (dp.sum === undefined) {
      throw new MetricFetchError("ParseFailure", "datapoint has no sum");
    }
    const value = parseSum(dp.sum);
    if (value === null) {
      throw new MetricFetchError("ParseFailure", `could not parse sum ${JSON.stringify(dp.sum)}`);
    }

    return { timestamp, value };
  });
}

/**
 * The data point with the strictly latest timestamp. Points may arrive in
 * any order; on a tie the first one seen wins.
 */
export function selectLatest(points: readonly DataPoint[]): DataPoint | undefined {
  let latest: DataPoint | undefined;
  for (const point of points) {
    if (latest === undefined || point.timestamp > latest.timestamp) {
      latest = point;
    }
  }
  return latest;
}

// ---------------------------------------------------------------------------
// Fetcher
// ---------------------------------------------------------------------------

export interface MetricFetcher {
  /**
   * Latest value of one metric for one instance.
   * Rejects with `MetricFetchError`; nothing is retried.
   */
  fetch(metricName: string, instanceIdentifier: string, region: string): Promise<number>;
}

export interface NasMetricFetcherOptions {
  /** Clock for the query window (default: wall clock) */
  now?: () => Date;
  /** Statistic names accepted (default: the tracked NAS metrics) */
  metricNames?: ReadonlySet<string>;
}

export class NasMetricFetcher implements MetricFetcher {
  private client: NasClient;
  private now: () => Date;
  private metricNames: ReadonlySet<string>;

  constructor(client: NasClient, options?: NasMetricFetcherOptions) {
    this.client = client;
    this.now = options?.now ?? (() => new Date());
    this.metricNames = options?.metricNames ?? NAS_METRIC_NAMES;
  }

  async fetch(metricName: string, instanceIdentifier: string, region: string): Promise<number> {
    const request = await this.buildRequest(metricName, instanceIdentifier, region);

    let datapoints: RawDatapoint[];
    try {
      ({ datapoints } = await this.client.send(request));
    } catch (err) {
      throw new MetricFetchError("Transport", describeError(err), { cause: err });
    }

    const latest = selectLatest(decodeDatapoints(datapoints));
    if (!latest) {
      throw new MetricFetchError("NoData", "fetched no datapoints");
    }
    return latest.value;
  }

  private async buildRequest(
    metricName: string,
    instanceIdentifier: string,
    region: string,
  ): Promise<PreparedRequest> {
    try {
      if (!this.metricNames.has(metricName)) {
        throw new Error(`unrecognized metric ${JSON.stringify(metricName)}`);
      }
      if (!instanceIdentifier) {
        throw new Error("instance identifier is required");
      }

      const endTime = this.now();
      const startTime = new Date(endTime.getTime() - QUERY_WINDOW_MS);
      return await this.client.buildGetMetricStatisticsRequest(
        {
          metricName,
          dimensions: [{ name: INSTANCE_DIMENSION, value: instanceIdentifier }],
          startTime,
          endTime,
        },
        region,
        endTime,
      );
    } catch (err) {
      throw new MetricFetchError("RequestBuild", `failed building request: ${describeError(err)}`, {
        cause: err,
      });
    }
  }
}
