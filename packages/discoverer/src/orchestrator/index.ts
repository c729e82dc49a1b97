/**
 * Orchestrator Module
 *
 * The only code that talks to the Docker Engine. Everything downstream
 * depends on the IOrchestrator interface, never on dockerode.
 */

export { DockerOrchestrator } from "./docker-orchestrator.js";
export type { IOrchestrator } from "@swarm-sd/shared";
