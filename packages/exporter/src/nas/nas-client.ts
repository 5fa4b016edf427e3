/**
 * NAS API client. Builds and signs `GetMetricStatistics` queries, then sends them.
 *
 * Only the one action the exporter needs is implemented. The client does no
 * retrying: a failed call is reported to the caller and the next scrape is
 * the only recovery.
 */

import { XMLParser } from "fast-xml-parser";
import { Value } from "@sinclair/typebox/value";
import type {
  Credentials,
  GetMetricStatisticsInput,
  GetMetricStatisticsOutput,
} from "@nas-exporter/shared";
import { signRequest } from "./signer.js";
import {
  ARRAY_PATHS,
  ErrorResponseXml,
  GetMetricStatisticsXml,
} from "./nas-client.schemas.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const NAS_API_VERSION = "N2016-02-24";
export const NAS_SIGNING_SERVICE = "nas";

const REGION_RE = /^[a-z]{2}-[a-z]+-\d+$/;
const FORM_CONTENT_TYPE = "application/x-www-form-urlencoded; charset=utf-8";

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/** The request could not be built or encoded; nothing was sent */
export class NasRequestBuildError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NasRequestBuildError";
  }
}

/** The API answered with a non-success status or an unreadable body */
export class NasApiError extends Error {
  constructor(
    public status: number,
    public code: string | undefined,
    message: string,
  ) {
    super(message);
    this.name = "NasApiError";
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Default endpoint for a region */
export function regionEndpoint(region: string): string {
  return `https://nas.${region}.api.nifcloud.com/`;
}

/** `YYYY-MM-DD HH:MM:SS` in UTC, the format the API takes for time bounds */
export function formatRequestTime(date: Date): string {
  return date.toISOString().slice(0, 19).replace("T", " ");
}

const parser = new XMLParser({
  ignoreAttributes: true,
  parseTagValue: false,
  trimValues: true,
  isArray: (_tagName, jPath) => ARRAY_PATHS.has(jPath),
});

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function parseXml(text: string): unknown {
  return parser.parse(text, true);
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export interface NasClientOptions {
  credentials: Credentials;
  /** Override the endpoint resolution (default: `https://nas.<region>.api.nifcloud.com/`) */
  endpoint?: (region: string) => string;
  /** Abort a call after this many ms (default: no deadline) */
  timeoutMs?: number;
}

/** A signed request, ready to send */
export interface PreparedRequest {
  url: string;
  method: "POST";
  headers: Record<string, string>;
  body: string;
}

export class NasClient {
  private credentials: Credentials;
  private endpoint: (region: string) => string;
  private timeoutMs: number | null;

  constructor(options: NasClientOptions) {
    this.credentials = options.credentials;
    this.endpoint = options.endpoint ?? regionEndpoint;
    this.timeoutMs = options.timeoutMs ?? null;
  }

  /**
   * Encode and sign a `GetMetricStatistics` query.
   * Rejects with `NasRequestBuildError` on invalid input.
   */
  async buildGetMetricStatisticsRequest(
    input: GetMetricStatisticsInput,
    region: string,
    signedAt: Date = new Date(),
  ): Promise<PreparedRequest> {
    if (!REGION_RE.test(region)) {
      throw new NasRequestBuildError(`invalid region ${JSON.stringify(region)}`);
    }
    if (!input.metricName) {
      throw new NasRequestBuildError("metric name is required");
    }
    for (const time of [input.startTime, input.endTime, signedAt]) {
      if (Number.isNaN(time.getTime())) {
        throw new NasRequestBuildError("invalid time bound");
      }
    }
    if (input.startTime > input.endTime) {
      throw new NasRequestBuildError("start time is after end time");
    }

    const body = new URLSearchParams({
      Action: "GetMetricStatistics",
      Version: NAS_API_VERSION,
      MetricName: input.metricName,
      StartTime: formatRequestTime(input.startTime),
      EndTime: formatRequestTime(input.endTime),
    });
    input.dimensions.forEach((dimension, i) => {
      if (!dimension.name || !dimension.value) {
        throw new NasRequestBuildError(`dimension ${i + 1} needs a name and a value`);
      }
      body.set(`Dimensions.member.${i + 1}.Name`, dimension.name);
      body.set(`Dimensions.member.${i + 1}.Value`, dimension.value);
    });
    body.sort();

    let url: URL;
    try {
      url = new URL(this.endpoint(region));
    } catch (err) {
      throw new NasRequestBuildError(`invalid endpoint: ${errorMessage(err)}`);
    }

    const encoded = body.toString();
    const headers = await signRequest(
      {
        method: "POST",
        url,
        headers: { "content-type": FORM_CONTENT_TYPE },
        body: encoded,
      },
      {
        credentials: this.credentials,
        region,
        service: NAS_SIGNING_SERVICE,
        date: signedAt,
      },
    );

    return { url: url.toString(), method: "POST", headers, body: encoded };
  }

  /**
   * Send a prepared query and decode the data points.
   * Network failures reject as-is; non-success answers reject with `NasApiError`.
   */
  async send(request: PreparedRequest): Promise<GetMetricStatisticsOutput> {
    // fetch derives Host from the URL itself
    const { host: _host, ...headers } = request.headers;

    const res = await fetch(request.url, {
      method: request.method,
      headers,
      body: request.body,
      signal: this.timeoutMs !== null ? AbortSignal.timeout(this.timeoutMs) : undefined,
    });
    const text = await res.text();

    if (!res.ok) {
      throw apiErrorFrom(res.status, text);
    }

    let parsed: unknown;
    try {
      parsed = parseXml(text);
    } catch (err) {
      throw new NasApiError(res.status, undefined, `malformed response body: ${errorMessage(err)}`);
    }
    if (!Value.Check(GetMetricStatisticsXml, parsed)) {
      throw new NasApiError(res.status, undefined, "unexpected response shape");
    }

    const response = parsed.GetMetricStatisticsResponse;
    const result = response.GetMetricStatisticsResult;
    const members =
      result.Datapoints === undefined || result.Datapoints === ""
        ? []
        : result.Datapoints.member ?? [];

    return {
      label: result.Label,
      requestId: response.ResponseMetadata?.RequestId,
      // an empty <member/> parses to "" and carries neither field
      datapoints: members.map((m) =>
        m === "" ? {} : { timestamp: m.Timestamp, sum: m.Sum },
      ),
    };
  }
}

function apiErrorFrom(status: number, text: string): NasApiError {
  let parsed: unknown;
  try {
    parsed = parseXml(text);
  } catch {
    return new NasApiError(status, undefined, `request failed with status ${status}`);
  }
  if (!Value.Check(ErrorResponseXml, parsed)) {
    return new NasApiError(status, undefined, `request failed with status ${status}`);
  }
  const { Code: code, Message: message } = parsed.ErrorResponse.Error;
  return new NasApiError(
    status,
    code,
    `request failed with status ${status}: ${code ?? "UnknownError"}: ${message ?? "no message"}`,
  );
}
