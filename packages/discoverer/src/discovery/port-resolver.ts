import type { LabelMap } from "@swarm-sd/shared";

/**
 * Values of every `key=...` entry in a `KEY=VALUE` environment list.
 * The value is everything after the first `=`.
 */
export function envValues(env: string[], key: string): string[] {
  const prefix = `${key}=`;
  return env
    .filter((entry) => entry.startsWith(prefix))
    .map((entry) => entry.slice(prefix.length));
}

/**
 * Resolve a service's metrics port.
 *
 * A service label named `labelKey` always wins and is used as-is. Failing
 * that, a single `envKey=` environment entry is read as a comma-separated
 * port list (the convention used by the proxy's SERVICE_PORTS) and its
 * first element is taken. Two or more matching entries resolve to
 * nothing rather than picking one.
 */
export function resolvePort(
  serviceLabels: LabelMap,
  env: string[],
  labelKey: string,
  envKey: string,
): string | undefined {
  if (Object.hasOwn(serviceLabels, labelKey)) {
    return serviceLabels[labelKey];
  }

  const matches = envValues(env, envKey);
  if (matches.length !== 1) return undefined;
  return matches[0].split(",")[0];
}
