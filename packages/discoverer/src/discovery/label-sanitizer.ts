import type { LabelMap } from "@swarm-sd/shared";

/** Prefix for labels copied from the service spec */
export const SERVICE_LABEL_PREFIX = "service_label";
/** Prefix for labels copied from the container spec */
export const CONTAINER_LABEL_PREFIX = "container_label";

export type LabelPrefix = typeof SERVICE_LABEL_PREFIX | typeof CONTAINER_LABEL_PREFIX;

/**
 * Turn Docker label keys into Prometheus-safe label names:
 * `com.example.team` under `service_label` becomes
 * `service_label_com_example_team`.
 *
 * Keys that only differ in `.` vs `_` collapse to the same name; the one
 * iterated last wins.
 */
export function sanitizeLabels(prefix: LabelPrefix, labels: LabelMap): LabelMap {
  const out: LabelMap = {};
  for (const [key, value] of Object.entries(labels)) {
    out[`${prefix}_${key.replaceAll(".", "_")}`] = value;
  }
  return out;
}
