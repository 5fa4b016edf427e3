/**
 * NAS Module
 *
 * Client for the NIFCLOUD NAS statistics API. Knows nothing about the
 * collector or the HTTP server; the collector reaches the API only through
 * `NasClient`.
 */

export { NasClient, NasApiError, NasRequestBuildError, regionEndpoint } from "./nas-client.js";
export type { NasClientOptions, PreparedRequest } from "./nas-client.js";
