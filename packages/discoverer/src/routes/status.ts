/**
 * Status routes — read-only view of the discovery loop.
 *
 * GET /health   200 while the last pass succeeded (or none ran yet), 503 after a failure
 * GET /targets  the last successfully written target groups
 */

import type { FastifyPluginAsync } from "fastify";
import type { HealthResponse } from "@swarm-sd/shared";
import { TargetsQuery } from "./status.schemas.js";

export const healthRoutes: FastifyPluginAsync = async (app) => {
  app.get("/", async (_request, reply) => {
    const loop = app.discoveryLoop;
    const lastPass = loop.lastPass;
    const ok = lastPass === null || lastPass.ok;

    const payload: HealthResponse = {
      status: ok ? "ok" : "degraded",
      consecutiveFailures: loop.consecutiveFailures,
      lastPass,
      timestamp: new Date().toISOString(),
    };

    return reply.status(ok ? 200 : 503).send(payload);
  });
};

export const targetRoutes: FastifyPluginAsync = async (app) => {
  app.get<{ Querystring: TargetsQuery }>(
    "/",
    { schema: { querystring: TargetsQuery } },
    async (request, reply) => {
      const { job } = request.query;
      const targets = app.discoveryLoop.lastResult ?? [];
      return reply.send(
        job === undefined ? targets : targets.filter((t) => t.labels.job === job),
      );
    },
  );
};
