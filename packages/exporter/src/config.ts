/**
 * Command-line configuration.
 *
 * Flags follow the `<group>.<name>` convention of Prometheus exporters; most
 * fall back to an environment variable so credentials need not appear in
 * the process list.
 */

import { Command, InvalidArgumentError, Option } from "commander";
import { Value } from "@sinclair/typebox/value";
import type { ExporterConfig, ListenAddress } from "@nas-exporter/shared";
import { ExporterConfigSchema } from "./config.schemas.js";
import { EXPORTER_NAME } from "./collector/index.js";
import { VERSION } from "./version.js";

export class ConfigError extends Error {
  constructor(public problems: string[]) {
    super(`invalid configuration: ${problems.join("; ")}`);
    this.name = "ConfigError";
  }
}

// ---------------------------------------------------------------------------
// Value parsers
// ---------------------------------------------------------------------------

function parseNonNegativeInt(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError("Not a non-negative integer.");
  }
  return Number(value);
}

/**
 * Parse `host:port`, `:port` (all interfaces) or `[v6-host]:port`.
 */
export function parseListenAddress(value: string): ListenAddress {
  const m = /^(?:\[([^\]]+)\]|([^:]*)):(\d+)$/.exec(value);
  if (!m) {
    throw new InvalidArgumentError(`Expected host:port, got ${JSON.stringify(value)}.`);
  }
  const port = Number(m[3]);
  if (port > 65535) {
    throw new InvalidArgumentError(`Port ${port} is out of range.`);
  }
  const host = m[1] ?? m[2];
  return { host: host || "0.0.0.0", port };
}

// ---------------------------------------------------------------------------
// Program
// ---------------------------------------------------------------------------

interface RawOptions {
  listenAddress: unknown;
  telemetryPath: unknown;
  disableExporterMetrics: unknown;
  maxRequests: unknown;
  nasInstanceId: unknown;
  region: unknown;
  accessKeyId: unknown;
  secretAccessKey: unknown;
  logLevel: unknown;
  logFormat: unknown;
}

export function buildProgram(): Command {
  const defaultFormat = process.env.NODE_ENV === "production" ? "json" : "pretty";

  return new Command()
    .name(EXPORTER_NAME)
    .description("Prometheus exporter for NIFCLOUD NAS instance metrics.")
    .version(VERSION, "--version", "Show application version.")
    .helpOption("-h, --help", "Show context-sensitive help.")
    .addOption(
      new Option("--web.listen-address <address>", "Address on which to expose metrics and web interface.")
        .env("NAS_EXPORTER_LISTEN_ADDRESS")
        .argParser(parseListenAddress)
        .default(parseListenAddress(":9123"), ":9123"),
    )
    .addOption(
      new Option("--web.telemetry-path <path>", "Path under which to expose metrics.")
        .env("NAS_EXPORTER_TELEMETRY_PATH")
        .default("/metrics"),
    )
    .addOption(
      new Option(
        "--web.disable-exporter-metrics",
        "Exclude metrics about the exporter itself (process_*, handler metrics).",
      ).default(false),
    )
    .addOption(
      new Option("--web.max-requests <n>", "Maximum number of parallel scrape requests. Use 0 to disable.")
        .env("NAS_EXPORTER_MAX_REQUESTS")
        .argParser(parseNonNegativeInt)
        .default(40),
    )
    .addOption(
      new Option("--nifcloud.nas-instance-id <id>", "Target NAS instance identifier.")
        .env("NIFCLOUD_NAS_INSTANCE_ID")
        .makeOptionMandatory(),
    )
    .addOption(
      new Option("--nifcloud.region <region>", "NIFCLOUD region name that target instance exists.")
        .env("NIFCLOUD_REGION")
        .default("jp-east-1"),
    )
    .addOption(
      new Option("--nifcloud.access-key-id <key>", "NIFCLOUD Access Key ID to fetch the metrics.")
        .env("NIFCLOUD_ACCESS_KEY_ID")
        .makeOptionMandatory(),
    )
    .addOption(
      new Option("--nifcloud.secret-access-key <secret>", "NIFCLOUD Secret Access Key to fetch the metrics.")
        .env("NIFCLOUD_SECRET_ACCESS_KEY")
        .makeOptionMandatory(),
    )
    .addOption(
      new Option("--log.level <level>", "Only log messages with the given severity or above.")
        .env("LOG_LEVEL")
        .choices(["fatal", "error", "warn", "info", "debug", "trace"])
        .default("info"),
    )
    .addOption(
      new Option("--log.format <format>", "Output format of log messages.")
        .env("LOG_FORMAT")
        .choices(["json", "pretty"])
        .default(defaultFormat),
    );
}

/**
 * Commander keys dotted flags by their camel-cased segments
 * (`--web.listen-address` becomes `web.listenAddress`).
 */
function readOptions(program: Command): RawOptions {
  const opts = program.opts();
  return {
    listenAddress: opts["web.listenAddress"],
    telemetryPath: opts["web.telemetryPath"],
    disableExporterMetrics: opts["web.disableExporterMetrics"],
    maxRequests: opts["web.maxRequests"],
    nasInstanceId: opts["nifcloud.nasInstanceId"],
    region: opts["nifcloud.region"],
    accessKeyId: opts["nifcloud.accessKeyId"],
    secretAccessKey: opts["nifcloud.secretAccessKey"],
    logLevel: opts["log.level"],
    logFormat: opts["log.format"],
  };
}

/** Validate assembled values into an immutable config */
export function validateConfig(candidate: unknown): ExporterConfig {
  if (!Value.Check(ExporterConfigSchema, candidate)) {
    const problems = [...Value.Errors(ExporterConfigSchema, candidate)].map(
      (e) => `${e.path || "/"}: ${e.message}`,
    );
    throw new ConfigError(problems);
  }
  return Object.freeze(candidate);
}

/**
 * Parse command-line arguments (without the node and script entries)
 * into the exporter config.
 */
export function loadConfig(argv: readonly string[], program: Command = buildProgram()): ExporterConfig {
  program.parse(argv, { from: "user" });
  const raw = readOptions(program);

  return validateConfig({
    listen: raw.listenAddress,
    telemetryPath: raw.telemetryPath,
    includeExporterMetrics: raw.disableExporterMetrics !== true,
    maxRequests: raw.maxRequests,
    target: { identifier: raw.nasInstanceId, region: raw.region },
    credentials: { accessKeyId: raw.accessKeyId, secretAccessKey: raw.secretAccessKey },
    logLevel: raw.logLevel,
    logFormat: raw.logFormat,
  });
}

/** The config with the secret key masked, for logging */
export function redactConfig(config: ExporterConfig): ExporterConfig {
  return {
    ...config,
    credentials: { accessKeyId: config.credentials.accessKeyId, secretAccessKey: "<redacted>" },
  };
}
