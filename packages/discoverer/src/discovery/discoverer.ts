/**
 * Discoverer — one discovery pass over the swarm.
 *
 * Walks every service in listing order, decides whether it exposes a
 * metrics port, and emits at most one target per running task: the task's
 * first attachment on a monitoring network.
 *
 * No timing and no state between passes live here; scheduling belongs to
 * the DiscoveryLoop.
 */

import type {
  DiscoveryResult,
  IOrchestrator,
  MonitoringNetworkSet,
  ServiceRecord,
} from "@swarm-sd/shared";
import type { Logger } from "../logger.js";
import { buildEndpoint } from "./endpoint-builder.js";
import { envValues, resolvePort } from "./port-resolver.js";

/** Environment variable carrying a custom scrape path */
const METRICS_PATH_ENV = "PROM_METRICS_PATH";

export interface DiscovererOptions {
  /** Service label that declares the metrics port */
  portLabel: string;
  /** Environment variable that declares the metrics port(s) */
  portEnv: string;
  /** The Prometheus service itself, never emitted */
  monitoringServiceName: string;
  /** Label (service or container) that opts a service out */
  optOutLabel: string;
  logger: Logger;
}

export class Discoverer {
  private orchestrator: IOrchestrator;
  private options: Omit<DiscovererOptions, "logger">;
  private logger: Logger;

  constructor(orchestrator: IOrchestrator, options: DiscovererOptions) {
    const { logger, ...rest } = options;
    this.orchestrator = orchestrator;
    this.options = rest;
    this.logger = logger;
  }

  /**
   * Run a single pass. Rejects if the service listing or any task listing
   * fails; every per-service or per-task problem is only logged.
   */
  async runOnePass(networks: MonitoringNetworkSet): Promise<DiscoveryResult> {
    const result: DiscoveryResult = [];
    const services = await this.orchestrator.listServices();

    for (const service of services) {
      const port = this.portFor(service);
      if (port === undefined) continue;

      const tasks = await this.orchestrator.listTasks(service.id);
      const metricsPath = singleEnvValue(service.container.env, METRICS_PATH_ENV);

      for (const task of tasks) {
        // Tasks the scheduler is shutting down or has replaced
        if (task.desiredState !== "running") continue;

        if (!task.networkAttachments || task.networkAttachments.length === 0) {
          this.logger.debug(
            { service: service.name, task: task.id },
            "Task is on no networks, skipping",
          );
          continue;
        }

        const network = task.networkAttachments.find((a) => networks.has(a.network));
        if (!network) {
          this.logger.debug(
            { service: service.name, task: task.id },
            "Task is on no monitoring network, skipping",
          );
          continue;
        }

        const endpoint = buildEndpoint({
          serviceName: service.name,
          task,
          network,
          port,
          serviceLabels: service.labels,
          containerLabels: service.container.labels,
          metricsPath,
        });
        if (!endpoint) {
          this.logger.debug(
            { service: service.name, task: task.id, network: network.network },
            "Network attachment has no address, skipping",
          );
          continue;
        }

        result.push(endpoint);
        this.logger.debug(
          { service: service.name, target: endpoint.targets[0] },
          "Add endpoint",
        );
      }
    }

    return result;
  }

  /** The service's metrics port, or undefined when it must be skipped */
  private portFor(service: ServiceRecord): string | undefined {
    const { name, labels, container } = service;
    const { monitoringServiceName, optOutLabel, portLabel, portEnv } = this.options;

    // Prometheus scrapes itself
    if (name === monitoringServiceName) {
      this.logger.debug({ service: name }, "Service is the monitoring service, skipping");
      return undefined;
    }

    if (Object.hasOwn(labels, optOutLabel) || Object.hasOwn(container.labels, optOutLabel)) {
      this.logger.debug({ service: name }, `Service has a '${optOutLabel}' label, skipping`);
      return undefined;
    }

    const port = resolvePort(labels, container.env, portLabel, portEnv);
    if (port === undefined || port === "") {
      this.logger.debug({ service: name }, "Unable to find port for service, skipping");
      return undefined;
    }
    return port;
  }
}

function singleEnvValue(env: string[], key: string): string | undefined {
  const values = envValues(env, key);
  return values.length === 1 ? values[0] : undefined;
}
