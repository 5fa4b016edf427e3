/**
 * Typebox schemas for NAS API XML responses, after XML-to-object parsing.
 *
 * Leaf values stay strings; empty elements parse to "".
 */

import { Type, type Static } from "@sinclair/typebox";

// ---------------------------------------------------------------------------
// GetMetricStatistics
// ---------------------------------------------------------------------------

export const DatapointXml = Type.Object({
  Timestamp: Type.Optional(Type.String()),
  Sum: Type.Optional(Type.String()),
});

export type DatapointXml = Static<typeof DatapointXml>;

export const GetMetricStatisticsXml = Type.Object({
  GetMetricStatisticsResponse: Type.Object({
    GetMetricStatisticsResult: Type.Object({
      Datapoints: Type.Optional(
        Type.Union([
          Type.Literal(""),
          Type.Object({
            member: Type.Optional(Type.Array(Type.Union([Type.Literal(""), DatapointXml]))),
          }),
        ]),
      ),
      Label: Type.Optional(Type.String()),
    }),
    ResponseMetadata: Type.Optional(
      Type.Object({ RequestId: Type.Optional(Type.String()) }),
    ),
  }),
});

export type GetMetricStatisticsXml = Static<typeof GetMetricStatisticsXml>;

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export const ErrorResponseXml = Type.Object({
  ErrorResponse: Type.Object({
    Error: Type.Object({
      Code: Type.Optional(Type.String()),
      Message: Type.Optional(Type.String()),
    }),
  }),
});

export type ErrorResponseXml = Static<typeof ErrorResponseXml>;

/** Paths whose elements are always parsed as arrays, even with one child */
export const ARRAY_PATHS = new Set([
  "GetMetricStatisticsResponse.GetMetricStatisticsResult.Datapoints.member",
]);
