/**
 * Typebox schema for the validated exporter configuration.
 */

import { Type, type Static } from "@sinclair/typebox";

export const LogLevel = Type.Union([
  Type.Literal("fatal"),
  Type.Literal("error"),
  Type.Literal("warn"),
  Type.Literal("info"),
  Type.Literal("debug"),
  Type.Literal("trace"),
]);

export const LogFormat = Type.Union([Type.Literal("json"), Type.Literal("pretty")]);

export const ExporterConfigSchema = Type.Object({
  listen: Type.Object({
    host: Type.String({ minLength: 1 }),
    port: Type.Integer({ minimum: 0, maximum: 65535 }),
  }),
  telemetryPath: Type.String({ pattern: "^/" }),
  includeExporterMetrics: Type.Boolean(),
  maxRequests: Type.Integer({ minimum: 0 }),
  target: Type.Object({
    identifier: Type.String({ minLength: 1 }),
    region: Type.String({ pattern: "^[a-z]{2}-[a-z]+-[0-9]+$" }),
  }),
  credentials: Type.Object({
    accessKeyId: Type.String({ minLength: 1 }),
    secretAccessKey: Type.String({ minLength: 1 }),
  }),
  logLevel: LogLevel,
  logFormat: LogFormat,
});

export type ExporterConfigSchema = Static<typeof ExporterConfigSchema>;
