/**
 * Prometheus scrape endpoint.
 *
 * Every request fetches a fresh status; a failed fetch fails the scrape
 * (see the error handler in app.ts) instead of serving old values.
 */

import type { FastifyPluginAsync } from "fastify";

export const metricsRoutes: FastifyPluginAsync = async (app) => {
  // -------------------------------------------------------------------------
  // GET /metrics
  // -------------------------------------------------------------------------
  app.get("/", async (_request, reply) => {
    await app.peerCollector.collect();
    const body = await app.metricsRegistry.metrics();
    return reply.type(app.metricsRegistry.contentType).send(body);
  });
};
