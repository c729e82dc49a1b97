import type {
  EndpointRecord,
  LabelMap,
  NetworkAttachment,
  TaskRecord,
} from "@swarm-sd/shared";
import {
  CONTAINER_LABEL_PREFIX,
  SERVICE_LABEL_PREFIX,
  sanitizeLabels,
} from "./label-sanitizer.js";

/** Prometheus relabel key that overrides the scrape path */
const METRICS_PATH_LABEL = "__metrics_path__";

export interface BuildEndpointInput {
  serviceName: string;
  task: TaskRecord;
  /** The task's first attachment on a monitoring network */
  network: NetworkAttachment;
  port: string;
  serviceLabels: LabelMap;
  containerLabels: LabelMap;
  /** Custom scrape path, from PROM_METRICS_PATH */
  metricsPath?: string;
}

/** "10.0.0.5/24" → "10.0.0.5" */
export function stripCidr(address: string): string {
  const slash = address.indexOf("/");
  return slash === -1 ? address : address.slice(0, slash);
}

/**
 * Assemble the target group for one task. Returns undefined when the
 * attachment carries no usable address.
 */
export function buildEndpoint(input: BuildEndpointInput): EndpointRecord | undefined {
  const [first] = input.network.addresses;
  if (first === undefined) return undefined;
  const host = stripCidr(first);
  if (host === "") return undefined;

  const labels: Record<string, string> = {
    job: input.serviceName,
    ...sanitizeLabels(SERVICE_LABEL_PREFIX, input.serviceLabels),
    ...sanitizeLabels(CONTAINER_LABEL_PREFIX, input.containerLabels),
  };
  if (input.task.containerId !== undefined) {
    labels.container_id = input.task.containerId;
  }
  if (input.metricsPath !== undefined) {
    labels[METRICS_PATH_LABEL] = input.metricsPath;
  }

  return {
    targets: [`${host}:${input.port}`],
    labels,
  };
}
