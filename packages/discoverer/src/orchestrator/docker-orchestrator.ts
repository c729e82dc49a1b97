/**
 * Docker-based orchestrator implementation.
 *
 * Reads swarm services and tasks through dockerode and normalises the
 * Engine API payloads into the plain records the discovery core works on.
 * Payloads are checked against Typebox schemas first; anything that does
 * not match is treated as a collaborator failure.
 */

import Docker from "dockerode";
import type { TSchema, Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type {
  IOrchestrator,
  ServiceRecord,
  TaskRecord,
} from "@swarm-sd/shared";
import { OrchestratorError, errorMessage } from "../errors.js";
import {
  SwarmService,
  SwarmServiceList,
  SwarmTaskList,
  type SwarmTask,
} from "./docker.schemas.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** dockerode rejects with the HTTP status on `statusCode` */
function isNotFound(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "statusCode" in err &&
    err.statusCode === 404
  );
}

function parsePayload<T extends TSchema>(
  schema: T,
  payload: unknown,
  what: string,
): Static<T> {
  if (Value.Check(schema, payload)) return payload;
  const first = Value.Errors(schema, payload).First();
  throw new OrchestratorError(
    `Unexpected ${what} payload from Docker at "${first?.path ?? "/"}": ${first?.message ?? "invalid"}`,
  );
}

function toServiceRecord(svc: SwarmService): ServiceRecord {
  const container = svc.Spec.TaskTemplate?.ContainerSpec;
  return {
    id: svc.ID,
    name: svc.Spec.Name,
    labels: svc.Spec.Labels ?? {},
    container: {
      labels: container?.Labels ?? {},
      env: container?.Env ?? [],
    },
  };
}

function toTaskRecord(task: SwarmTask): TaskRecord {
  const record: TaskRecord = {
    id: task.ID,
    serviceId: task.ServiceID,
    desiredState: task.DesiredState,
  };
  if (task.NetworksAttachments) {
    record.networkAttachments = task.NetworksAttachments.map((att) => ({
      network: att.Network.Spec.Name,
      addresses: att.Addresses ?? [],
    }));
  }
  const containerId = task.Status?.ContainerStatus?.ContainerID;
  if (containerId) record.containerId = containerId;
  return record;
}

// ---------------------------------------------------------------------------
// DockerOrchestrator
// ---------------------------------------------------------------------------

export class DockerOrchestrator implements IOrchestrator {
  private docker: Docker;

  constructor(options?: { socketPath?: string }) {
    // Without a socket path dockerode honours DOCKER_HOST, then the default socket
    this.docker = options?.socketPath
      ? new Docker({ socketPath: options.socketPath })
      : new Docker();
  }

  async listServices(): Promise<ServiceRecord[]> {
    let raw: unknown;
    try {
      raw = await this.docker.listServices();
    } catch (err) {
      throw new OrchestratorError(
        `Failed to list services: ${errorMessage(err)}`,
        { cause: err },
      );
    }
    return parsePayload(SwarmServiceList, raw, "service list").map(toServiceRecord);
  }

  async getService(name: string): Promise<ServiceRecord | null> {
    let raw: unknown;
    try {
      raw = await this.docker.getService(name).inspect();
    } catch (err) {
      if (isNotFound(err)) return null;
      throw new OrchestratorError(
        `Failed to inspect service "${name}": ${errorMessage(err)}`,
        { cause: err },
      );
    }
    return toServiceRecord(parsePayload(SwarmService, raw, "service"));
  }

  async listTasks(serviceId: string): Promise<TaskRecord[]> {
    const opts = { filters: { service: [serviceId] } };
    let raw: unknown;
    try {
      raw = await this.docker.listTasks(opts);
    } catch (err) {
      throw new OrchestratorError(
        `Failed to list tasks for service "${serviceId}": ${errorMessage(err)}`,
        { cause: err },
      );
    }
    return parsePayload(SwarmTaskList, raw, "task list").map(toTaskRecord);
  }
}
