/**
 * Orchestrator interface — the public contract for the discovery core's
 * view of the swarm.
 *
 * The discoverer reads services and tasks through this interface only.
 * The Docker implementation lives in the discoverer package; tests
 * substitute an in-memory fake.
 *
 * IMPORTANT: This interface must remain independent of dockerode. Records
 * are plain data already normalised from the Engine API payloads.
 */

/** String → string label map (service or container level) */
export type LabelMap = Record<string, string>;

/** Container-level part of a service spec */
export interface ContainerSpec {
  labels: LabelMap;
  /** Environment entries in `KEY=VALUE` form */
  env: string[];
}

/** A swarm service as listed by the orchestrator */
export interface ServiceRecord {
  id: string;
  name: string;
  labels: LabelMap;
  container: ContainerSpec;
}

/** Association between a task and an overlay network */
export interface NetworkAttachment {
  /** Network name (Spec.Name) */
  network: string;
  /** Addresses in CIDR form, e.g. "10.0.0.5/24" */
  addresses: string[];
}

/** Task states the orchestrator can ask for */
export type TaskDesiredState =
  | "running"
  | "shutdown"
  | "accepted"
  | "ready"
  | "remove"
  | (string & {});

/** One instance of a service */
export interface TaskRecord {
  id: string;
  serviceId: string;
  desiredState: TaskDesiredState;
  /** Undefined when the orchestrator reports no attachments at all */
  networkAttachments?: NetworkAttachment[];
  /** From Status.ContainerStatus, when the task has a container */
  containerId?: string;
}

/** The orchestrator's public interface */
export interface IOrchestrator {
  /** List every service with its spec */
  listServices(): Promise<ServiceRecord[]>;

  /** Look up a service by name or id; resolves null when it does not exist */
  getService(name: string): Promise<ServiceRecord | null>;

  /** List the tasks of a service */
  listTasks(serviceId: string): Promise<TaskRecord[]>;
}
