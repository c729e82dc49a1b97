/**
 * Network selection — which overlay networks Prometheus can scrape on.
 *
 * By default the networks are read off the Prometheus service's own first
 * task. A missing service (or one without tasks or attachments) is a normal
 * setup, not an error: the configured default set is used instead.
 */

import type { IOrchestrator, MonitoringNetworkSet } from "@swarm-sd/shared";
import type { Logger } from "../logger.js";

export interface NetworkSelectorOptions {
  /** Used when the monitoring service cannot tell us its networks */
  defaultNetworks: string[];
  /** Static override; the orchestrator is never asked when set */
  staticNetworks?: string[];
  /** Re-detect before every pass instead of caching the first answer */
  refreshEveryPass?: boolean;
  logger: Logger;
}

export class NetworkSelector {
  private orchestrator: IOrchestrator;
  private defaultNetworks: MonitoringNetworkSet;
  private staticNetworks: MonitoringNetworkSet | null;
  private refreshEveryPass: boolean;
  private logger: Logger;

  /** Last detected set (when caching) */
  private cached: MonitoringNetworkSet | null = null;

  constructor(orchestrator: IOrchestrator, options: NetworkSelectorOptions) {
    this.orchestrator = orchestrator;
    this.defaultNetworks = new Set(options.defaultNetworks);
    this.staticNetworks = options.staticNetworks
      ? new Set(options.staticNetworks)
      : null;
    this.refreshEveryPass = options.refreshEveryPass ?? false;
    this.logger = options.logger;
  }

  /** Detect the networks of the named monitoring service */
  async resolve(monitoringServiceName: string): Promise<MonitoringNetworkSet> {
    const service = await this.orchestrator.getService(monitoringServiceName);
    if (!service) {
      this.logger.debug(
        { service: monitoringServiceName },
        "Monitoring service not found, using default networks",
      );
      return this.defaultNetworks;
    }

    const [task] = await this.orchestrator.listTasks(service.id);
    if (!task) {
      this.logger.debug(
        { service: monitoringServiceName },
        "Monitoring service has no tasks, using default networks",
      );
      return this.defaultNetworks;
    }

    if (!task.networkAttachments || task.networkAttachments.length === 0) {
      this.logger.debug(
        { service: monitoringServiceName },
        "Monitoring service is not on any networks, using defaults",
      );
      return this.defaultNetworks;
    }

    const networks = new Set(task.networkAttachments.map((a) => a.network));
    this.logger.debug({ networks: [...networks] }, "Discovered networks");
    return networks;
  }

  /** The set to use for the next pass (static, cached or freshly detected) */
  async forPass(monitoringServiceName: string): Promise<MonitoringNetworkSet> {
    if (this.staticNetworks) return this.staticNetworks;
    if (this.cached && !this.refreshEveryPass) return this.cached;
    this.cached = await this.resolve(monitoringServiceName);
    return this.cached;
  }
}
