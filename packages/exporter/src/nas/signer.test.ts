import { describe, it, expect } from "vitest";
import { signRequest } from "./signer.js";

const credentials = { accessKeyId: "test-access-key", secretAccessKey: "test-secret" };
const date = new Date(Date.UTC(2024, 0, 2, 3, 4, 5));

function sign(overrides?: { body?: string; secret?: string; date?: Date }) {
  return signRequest(
    {
      method: "POST",
      url: new URL("https://nas.jp-east-1.api.nifcloud.com/"),
      headers: { "content-type": "application/x-www-form-urlencoded; charset=utf-8" },
      body: overrides?.body ?? "Action=GetMetricStatistics&Version=N2016-02-24",
    },
    {
      credentials: { ...credentials, secretAccessKey: overrides?.secret ?? credentials.secretAccessKey },
      region: "jp-east-1",
      service: "nas",
      date: overrides?.date ?? date,
    },
  );
}

// ---------------------------------------------------------------------------
// signRequest
// ---------------------------------------------------------------------------

describe("signRequest", () => {
  it("adds host, date and an authorization header scoped to the region", async () => {
    const headers = await sign();

    expect(headers["host"]).toBe("nas.jp-east-1.api.nifcloud.com");
    expect(headers["x-amz-date"]).toBe("20240102T030405Z");
    expect(headers["content-type"]).toBe("application/x-www-form-urlencoded; charset=utf-8");
    expect(headers["x-amz-content-sha256"]).toBeUndefined();
  });

  it("produces the reference signature for a known request", async () => {
    const headers = await sign();

    expect(headers["authorization"]).toBe(
      "AWS4-HMAC-SHA256 Credential=test-access-key/20240102/jp-east-1/nas/aws4_request, " +
        "SignedHeaders=content-type;host;x-amz-date, " +
        "Signature=39249002848f29c45acf1f994166d0e6177993e0287cfb98413d4c245a238e37",
    );
  });

  it("changes when the body changes", async () => {
    const [a, b] = await Promise.all([sign({ body: "Action=Other" }), sign()]);
    expect(a.authorization).not.toBe(b.authorization);
  });

  it("changes when the secret changes", async () => {
    const [a, b] = await Promise.all([sign({ secret: "other-secret" }), sign()]);
    expect(a.authorization).not.toBe(b.authorization);
  });

  it("scopes the credential to the signing date", async () => {
    const headers = await sign({ date: new Date(Date.UTC(2024, 0, 3)) });
    expect(headers["authorization"]).toContain("Credential=test-access-key/20240103/jp-east-1/nas/aws4_request");
  });
});
