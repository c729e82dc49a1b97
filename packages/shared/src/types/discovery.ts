/**
 * Types for discovery output and pass reporting.
 *
 * EndpointRecord matches Prometheus' file_sd target group shape, so a
 * DiscoveryResult serialises straight into the target file.
 */

/** Names of the networks Prometheus can reach targets on */
export type MonitoringNetworkSet = ReadonlySet<string>;

/** A single scrape target group (one target per task) */
export interface EndpointRecord {
  /** Exactly one "<ip>:<port>" entry */
  targets: [string];
  /** Always contains `job`; other keys are underscore-joined */
  labels: Record<string, string>;
}

/** Everything one discovery pass produced, in listing order */
export type DiscoveryResult = EndpointRecord[];

// ---------------------------------------------------------------------------
// Pass reporting
// ---------------------------------------------------------------------------

/** Outcome of the most recent discovery pass */
export interface PassSnapshot {
  ok: boolean;
  endpointCount: number;
  /** ISO 8601 timestamp */
  startedAt: string;
  /** ISO 8601 timestamp */
  finishedAt: string;
  /** Error message when the pass failed */
  error?: string;
}

export type DiscoveryHealth = "ok" | "degraded";

/** Body of GET /health on the status server */
export interface HealthResponse {
  status: DiscoveryHealth;
  consecutiveFailures: number;
  lastPass: PassSnapshot | null;
  timestamp: string;
}
