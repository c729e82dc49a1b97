/**
 * Discovery Loop — runs a discovery pass, writes the target file, sleeps,
 * repeats.
 *
 * Passes never overlap: the next one is scheduled only once the previous
 * one has settled. A failed pass is logged and counted, and the loop
 * carries on at the next interval. stop() only cancels the sleep; a pass
 * already running is allowed to finish.
 *
 * IMPORTANT: This module must remain independent of the web framework.
 * The status server reads its state through the public getters.
 */

import type { DiscoveryResult, PassSnapshot } from "@swarm-sd/shared";
import type { Discoverer } from "../discovery/discoverer.js";
import type { NetworkSelector } from "../discovery/network-selector.js";
import type { TargetWriter } from "../output/target-file-writer.js";
import { errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";

export interface DiscoveryLoopOptions {
  /** Pause between passes in milliseconds (default: 60000 = 60s) */
  intervalMs?: number;
  /** Name of the Prometheus service, for network detection */
  monitoringServiceName: string;
  logger: Logger;
  /** Called after every pass, successful or not; a throw is logged */
  onPass?: (snapshot: PassSnapshot) => void;
}

const DEFAULT_INTERVAL_MS = 60_000;

export class DiscoveryLoop {
  private selector: NetworkSelector;
  private discoverer: Discoverer;
  private writer: TargetWriter;
  private intervalMs: number;
  private monitoringServiceName: string;
  private logger: Logger;
  private onPass?: DiscoveryLoopOptions["onPass"];

  private running = false;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private inFlight: Promise<void> | null = null;

  private last: PassSnapshot | null = null;
  private lastGood: DiscoveryResult | null = null;
  private failures = 0;

  constructor(
    selector: NetworkSelector,
    discoverer: Discoverer,
    writer: TargetWriter,
    options: DiscoveryLoopOptions,
  ) {
    this.selector = selector;
    this.discoverer = discoverer;
    this.writer = writer;
    this.intervalMs = options.intervalMs ?? DEFAULT_INTERVAL_MS;
    this.monitoringServiceName = options.monitoringServiceName;
    this.logger = options.logger;
    this.onPass = options.onPass;
  }

  /** Start the loop; the first pass runs immediately */
  start(): void {
    if (this.running) return; // already running
    this.running = true;
    this.inFlight = this.tick();
  }

  /** Stop scheduling passes; resolves once an in-flight pass has finished */
  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    await this.inFlight;
    this.inFlight = null;
  }

  /** Whether the loop is currently scheduled */
  get isRunning(): boolean {
    return this.running;
  }

  /** Outcome of the most recent pass, null before the first one */
  get lastPass(): PassSnapshot | null {
    return this.last;
  }

  /** Result of the most recent successful pass */
  get lastResult(): DiscoveryResult | null {
    return this.lastGood;
  }

  /** Failed passes since the last successful one */
  get consecutiveFailures(): number {
    return this.failures;
  }

  /**
   * Run one pass and write its result. Never rejects: failures are
   * logged and reported in the returned snapshot.
   */
  async runPass(): Promise<PassSnapshot> {
    const startedAt = new Date().toISOString();
    this.logger.debug("Start discovery");

    let snapshot: PassSnapshot;
    try {
      const networks = await this.selector.forPass(this.monitoringServiceName);
      const result = await this.discoverer.runOnePass(networks);
      this.logger.debug("Finish discovery");
      await this.writer.write(result);

      this.lastGood = result;
      this.failures = 0;
      snapshot = {
        ok: true,
        endpointCount: result.length,
        startedAt,
        finishedAt: new Date().toISOString(),
      };
      this.logger.info({ endpoints: result.length }, "Discovery pass complete");
    } catch (err) {
      this.failures++;
      snapshot = {
        ok: false,
        endpointCount: 0,
        startedAt,
        finishedAt: new Date().toISOString(),
        error: errorMessage(err),
      };
      this.logger.error(
        { err, consecutiveFailures: this.failures },
        "Discovery pass failed, retrying next interval",
      );
    }

    this.last = snapshot;
    try {
      this.onPass?.(snapshot);
    } catch (err) {
      this.logger.error({ err }, "onPass callback failed");
    }
    return snapshot;
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private async tick(): Promise<void> {
    await this.runPass();
    if (!this.running) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.inFlight = this.tick();
    }, this.intervalMs);
  }
}
