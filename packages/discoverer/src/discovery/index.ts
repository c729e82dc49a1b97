/**
 * Discovery Module
 *
 * Pure pass logic: network selection, port resolution, label
 * sanitisation and endpoint assembly. Depends only on IOrchestrator and a
 * logger, never on Docker, the filesystem or timers.
 */

export { Discoverer } from "./discoverer.js";
export type { DiscovererOptions } from "./discoverer.js";
export { NetworkSelector } from "./network-selector.js";
export type { NetworkSelectorOptions } from "./network-selector.js";
export { resolvePort } from "./port-resolver.js";
export { sanitizeLabels } from "./label-sanitizer.js";
export { buildEndpoint } from "./endpoint-builder.js";
export type { BuildEndpointInput } from "./endpoint-builder.js";
