import type { FastifyPluginAsync } from "fastify";
import { HealthResponse } from "./health.schemas.js";

export const healthRoutes: FastifyPluginAsync = async (app) => {
  app.get(
    "/",
    { schema: { response: { 200: HealthResponse, 503: HealthResponse } } },
    async (_request, reply) => {
      const payload: HealthResponse = app.watchdog.health();
      return reply.status(payload.status === "running" ? 200 : 503).send(payload);
    },
  );
};
