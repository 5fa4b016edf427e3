import { describe, it, expect } from "vitest";
import type { ExporterConfig } from "@nas-exporter/shared";
import { buildApp, loggerOptions } from "./app.js";

const config: ExporterConfig = {
  listen: { host: "127.0.0.1", port: 9123 },
  telemetryPath: "/metrics",
  includeExporterMetrics: false,
  maxRequests: 40,
  target: { identifier: "nas01", region: "jp-east-1" },
  credentials: { accessKeyId: "test-access-key", secretAccessKey: "test-secret" },
  logLevel: "warn",
  logFormat: "json",
};

describe("loggerOptions", () => {
  it("uses plain JSON logging at the configured level", () => {
    expect(loggerOptions(config)).toEqual({ level: "warn" });
  });

  it("routes through pino-pretty for the pretty format", () => {
    expect(loggerOptions({ ...config, logFormat: "pretty" })).toEqual({
      level: "warn",
      transport: { target: "pino-pretty", options: { colorize: true } },
    });
  });
});

describe("buildApp", () => {
  it("wires a collector for the configured instance", async () => {
    const app = await buildApp({ logger: false, config });
    try {
      expect(app.collector.targetInstance).toEqual({ identifier: "nas01", region: "jp-east-1" });
      expect(app.collector.describe()).toHaveLength(13);
    } finally {
      await app.close();
    }
  });

  it("serves the telemetry path at / without a landing page", async () => {
    const app = await buildApp({ logger: false, config: { ...config, telemetryPath: "/" } });
    try {
      expect(app.hasRoute({ method: "GET", url: "/" })).toBe(true);
      expect(app.hasRoute({ method: "GET", url: "/metrics" })).toBe(false);
    } finally {
      await app.close();
    }
  });

  it("answers the liveness probe", async () => {
    const app = await buildApp({ logger: false, config });
    try {
      const res = await app.inject({ method: "GET", url: "/-/healthy" });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toMatchObject({ status: "ok" });
    } finally {
      await app.close();
    }
  });
});
