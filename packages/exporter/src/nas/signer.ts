/**
 * Request signing (signature version 4).
 *
 * NIFCLOUD's query APIs accept the same signature scheme as the AWS query
 * APIs, scoped to `<date>/<region>/<service>/aws4_request`.
 */

import { SignatureV4 } from "@smithy/signature-v4";
import { HttpRequest } from "@smithy/protocol-http";
import { Sha256 } from "@aws-crypto/sha256-js";
import type { Credentials } from "@nas-exporter/shared";

export interface UnsignedRequest {
  method: string;
  url: URL;
  /** Headers to sign; `host`, `x-amz-date` and `authorization` are added */
  headers: Record<string, string>;
  body: string;
}

export interface SigningContext {
  credentials: Credentials;
  region: string;
  service: string;
  date: Date;
}

/** Sign a request and return the full header set to send */
export async function signRequest(
  request: UnsignedRequest,
  context: SigningContext,
): Promise<Record<string, string>> {
  const signer = new SignatureV4({
    service: context.service,
    region: context.region,
    credentials: {
      accessKeyId: context.credentials.accessKeyId,
      secretAccessKey: context.credentials.secretAccessKey,
    },
    sha256: Sha256,
    // query APIs take no x-amz-content-sha256 header
    applyChecksum: false,
  });

  const { url } = request;
  const signed = await signer.sign(
    new HttpRequest({
      method: request.method.toUpperCase(),
      protocol: url.protocol,
      hostname: url.hostname,
      port: url.port ? Number(url.port) : undefined,
      path: url.pathname || "/",
      query: Object.fromEntries(url.searchParams),
      headers: { ...request.headers, host: url.host },
      body: request.body,
    }),
    { signingDate: context.date },
  );

  return { ...signed.headers };
}
