/**
 * Exporter configuration, fixed at process start.
 */

import type { Credentials } from "./nas.js";
import type { TargetInstance } from "./metrics.js";

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace";

export type LogFormat = "json" | "pretty";

export interface ListenAddress {
  host: string;
  port: number;
}

export interface ExporterConfig {
  readonly listen: ListenAddress;
  /** Path the exposition text is served under */
  readonly telemetryPath: string;
  /** Whether process and handler metrics about the exporter are exposed */
  readonly includeExporterMetrics: boolean;
  /** Maximum parallel scrape requests; 0 disables the limit */
  readonly maxRequests: number;
  readonly target: TargetInstance;
  readonly credentials: Credentials;
  readonly logLevel: LogLevel;
  readonly logFormat: LogFormat;
}
