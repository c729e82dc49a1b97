import "fastify";
import type { DiscoveryLoop } from "../scheduler/discovery-loop.js";

declare module "fastify" {
  interface FastifyInstance {
    discoveryLoop: DiscoveryLoop;
  }
}
