import Fastify, { type FastifyServerOptions, type FastifyError } from "fastify";

import type { DiscoveryLoop } from "./scheduler/discovery-loop.js";
import { healthRoutes, targetRoutes } from "./routes/status.js";

export interface BuildAppOptions extends FastifyServerOptions {
  /** The loop whose state the routes report */
  discoveryLoop: DiscoveryLoop;
}

/**
 * Build the status server.
 * Exported separately from the server start so tests can use `app.inject()`.
 */
export async function buildApp(opts: BuildAppOptions) {
  const { discoveryLoop, ...fastifyOpts } = opts;

  const app = Fastify(fastifyOpts);
  app.decorate("discoveryLoop", discoveryLoop);

  // ---------------------------------------------------------------------------
  // Global error handler — normalise error responses
  // ---------------------------------------------------------------------------
  app.setErrorHandler((error: FastifyError, _request, reply) => {
    // Validation errors from Typebox schemas (Fastify AJV)
    if (error.validation) {
      const details = error.validation.map((v) => ({
        field: v.instancePath || "query",
        message: v.message ?? "Invalid value",
      }));
      reply.status(400).send({ error: "Validation failed", details });
      return;
    }

    if (error.statusCode && error.statusCode < 500) {
      reply.status(error.statusCode).send({ error: error.message });
      return;
    }

    app.log.error(error);
    reply.status(error.statusCode ?? 500).send({ error: "Internal server error" });
  });

  // ---------------------------------------------------------------------------
  // Routes
  // ---------------------------------------------------------------------------
  await app.register(healthRoutes, { prefix: "/health" });
  await app.register(targetRoutes, { prefix: "/targets" });

  return app;
}
