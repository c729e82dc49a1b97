export { DiscoveryLoop } from "./discovery-loop.js";
export type { DiscoveryLoopOptions } from "./discovery-loop.js";
