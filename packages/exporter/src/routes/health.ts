import type { FastifyPluginAsync } from "fastify";
import { Type, type Static } from "@sinclair/typebox";

const HealthResponse = Type.Object({
  status: Type.Literal("ok"),
  timestamp: Type.String(),
});

type HealthResponse = Static<typeof HealthResponse>;

/** Liveness only: the exporter holds no connections worth probing */
export const healthRoutes: FastifyPluginAsync = async (app) => {
  app.get<{ Reply: HealthResponse }>(
    "/",
    { schema: { response: { 200: HealthResponse } } },
    async (_request, reply) => {
      return reply.status(200).send({
        status: "ok",
        timestamp: new Date().toISOString(),
      });
    },
  );
};
