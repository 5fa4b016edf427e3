import { describe, it, expect, vi, afterEach } from "vitest";
import { CommanderError, InvalidArgumentError } from "commander";
import {
  ConfigError,
  buildProgram,
  loadConfig,
  parseListenAddress,
  redactConfig,
  validateConfig,
} from "./config.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const REQUIRED = [
  "--nifcloud.nas-instance-id",
  "nas01",
  "--nifcloud.access-key-id",
  "test-access-key",
  "--nifcloud.secret-access-key",
  "test-secret",
];

/** The error a call throws, or undefined */
function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

/** A program that throws instead of exiting and prints nothing */
function quietProgram() {
  return buildProgram()
    .exitOverride()
    .configureOutput({ writeOut: () => undefined, writeErr: () => undefined });
}

afterEach(() => {
  vi.unstubAllEnvs();
});

// ---------------------------------------------------------------------------
// parseListenAddress
// ---------------------------------------------------------------------------

describe("parseListenAddress", () => {
  it("binds all interfaces for :port", () => {
    expect(parseListenAddress(":9123")).toEqual({ host: "0.0.0.0", port: 9123 });
  });

  it("parses host:port", () => {
    expect(parseListenAddress("127.0.0.1:8080")).toEqual({ host: "127.0.0.1", port: 8080 });
  });

  it("parses bracketed IPv6 hosts", () => {
    expect(parseListenAddress("[::1]:9123")).toEqual({ host: "::1", port: 9123 });
  });

  it.each(["9123", "host:", "host:99999"])("rejects %j", (value) => {
    expect(() => parseListenAddress(value)).toThrow(InvalidArgumentError);
  });
});

// ---------------------------------------------------------------------------
// loadConfig
// ---------------------------------------------------------------------------

describe("loadConfig", () => {
  it("applies defaults around the required flags", () => {
    vi.stubEnv("NODE_ENV", "production");

    const config = loadConfig(REQUIRED, quietProgram());

    expect(config).toEqual({
      listen: { host: "0.0.0.0", port: 9123 },
      telemetryPath: "/metrics",
      includeExporterMetrics: true,
      maxRequests: 40,
      target: { identifier: "nas01", region: "jp-east-1" },
      credentials: { accessKeyId: "test-access-key", secretAccessKey: "test-secret" },
      logLevel: "info",
      logFormat: "json",
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("defaults to pretty logs outside production", () => {
    vi.stubEnv("NODE_ENV", "development");

    expect(loadConfig(REQUIRED, quietProgram()).logFormat).toBe("pretty");
  });

  it("reads every flag", () => {
    const config = loadConfig(
      [
        ...REQUIRED,
        "--web.listen-address",
        "127.0.0.1:9200",
        "--web.telemetry-path",
        "/probe",
        "--web.disable-exporter-metrics",
        "--web.max-requests",
        "0",
        "--nifcloud.region",
        "jp-west-1",
        "--log.level",
        "debug",
        "--log.format",
        "json",
      ],
      quietProgram(),
    );

    expect(config.listen).toEqual({ host: "127.0.0.1", port: 9200 });
    expect(config.telemetryPath).toBe("/probe");
    expect(config.includeExporterMetrics).toBe(false);
    expect(config.maxRequests).toBe(0);
    expect(config.target).toEqual({ identifier: "nas01", region: "jp-west-1" });
    expect(config.logLevel).toBe("debug");
    expect(config.logFormat).toBe("json");
  });

  it("falls back to environment variables", () => {
    vi.stubEnv("NIFCLOUD_ACCESS_KEY_ID", "env-access-key");
    vi.stubEnv("NIFCLOUD_SECRET_ACCESS_KEY", "env-secret");
    vi.stubEnv("NAS_EXPORTER_MAX_REQUESTS", "5");

    const config = loadConfig(["--nifcloud.nas-instance-id", "nas02"], quietProgram());

    expect(config.credentials).toEqual({ accessKeyId: "env-access-key", secretAccessKey: "env-secret" });
    expect(config.maxRequests).toBe(5);
    expect(config.target.identifier).toBe("nas02");
  });

  it("prefers flags over environment variables", () => {
    vi.stubEnv("NIFCLOUD_REGION", "jp-east-2");

    const config = loadConfig([...REQUIRED, "--nifcloud.region", "jp-east-3"], quietProgram());
    expect(config.target.region).toBe("jp-east-3");
  });

  it("requires the instance id and credentials", () => {
    expect(() => loadConfig(["--nifcloud.nas-instance-id", "nas01"], quietProgram())).toThrow(
      CommanderError,
    );
  });

  it("rejects a non-numeric request limit", () => {
    expect(() => loadConfig([...REQUIRED, "--web.max-requests", "many"], quietProgram())).toThrow(
      /Not a non-negative integer/,
    );
  });

  it("rejects an unknown log level", () => {
    expect(() => loadConfig([...REQUIRED, "--log.level", "loud"], quietProgram())).toThrow(CommanderError);
  });

  it("rejects a malformed region with a ConfigError", () => {
    const err = thrown(() => loadConfig([...REQUIRED, "--nifcloud.region", "tokyo"], quietProgram()));

    expect(err).toBeInstanceOf(ConfigError);
    expect(err).toMatchObject({
      problems: expect.arrayContaining([expect.stringMatching(/^\/target\/region: /)]),
    });
  });
});

// ---------------------------------------------------------------------------
// validateConfig / redactConfig
// ---------------------------------------------------------------------------

describe("validateConfig", () => {
  it("lists every problem", () => {
    const err = thrown(() => validateConfig({ telemetryPath: "metrics" }));

    expect(err).toBeInstanceOf(ConfigError);
    expect(err).toMatchObject({
      problems: expect.arrayContaining([
        expect.stringMatching(/^\/telemetryPath: /),
        expect.stringMatching(/^\/listen: /),
      ]),
    });
  });
});

describe("redactConfig", () => {
  it("masks the secret key only", () => {
    const config = loadConfig(REQUIRED, quietProgram());
    expect(redactConfig(config).credentials).toEqual({
      accessKeyId: "test-access-key",
      secretAccessKey: "<redacted>",
    });
    expect(config.credentials.secretAccessKey).toBe("test-secret");
  });
});
