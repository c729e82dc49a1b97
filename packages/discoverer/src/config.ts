/**
 * Configuration — CLI flags, then environment variables, then defaults.
 *
 * The merged result is validated against a Typebox schema so a typo in an
 * environment variable fails at startup instead of mid-pass.
 */

import { parseArgs } from "node:util";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigError, errorMessage } from "./errors.js";

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

const DEFAULT_OUTPUT_PATH = "/etc/prometheus/swarm.d/swarm-endpoints.json";
const DEFAULT_PORT_LABEL = "prometheus.port";
const DEFAULT_PORT_ENV = "SERVICE_PORTS";
const DEFAULT_SERVICE_NAME = "prometheus";
const DEFAULT_NETWORKS = ["proxy"];
const DEFAULT_OPT_OUT_LABEL = "nometrics";
const DEFAULT_INTERVAL_SECONDS = 60;

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const NetworkList = Type.Array(Type.String({ minLength: 1 }), { minItems: 1 });

const LogLevel = Type.Union([
  Type.Literal("fatal"),
  Type.Literal("error"),
  Type.Literal("warn"),
  Type.Literal("info"),
  Type.Literal("debug"),
  Type.Literal("trace"),
  Type.Literal("silent"),
]);

export const DiscovererConfig = Type.Object({
  outputPath: Type.String({ minLength: 1 }),
  portLabel: Type.String({ minLength: 1 }),
  portEnv: Type.String({ minLength: 1 }),
  serviceName: Type.String({ minLength: 1 }),
  /** Static monitoring networks; skips auto-detection when set */
  networks: Type.Optional(NetworkList),
  defaultNetworks: NetworkList,
  optOutLabel: Type.String({ minLength: 1 }),
  intervalMs: Type.Integer({ minimum: 1000 }),
  refreshNetworks: Type.Boolean(),
  dockerSocket: Type.Optional(Type.String({ minLength: 1 })),
  statusPort: Type.Optional(Type.Integer({ minimum: 1, maximum: 65535 })),
  statusHost: Type.String({ minLength: 1 }),
  logLevel: LogLevel,
  prettyLogs: Type.Boolean(),
});

export type DiscovererConfig = Static<typeof DiscovererConfig>;

export type LoadConfigResult =
  | { help: true; usage: string }
  | { help: false; config: DiscovererConfig };

export const USAGE = `Usage: swarm-sd [options]

Discover Prometheus metrics endpoints in a Docker swarm.

Options:
  -o, --output <path>          Path to write the target JSON to
  -l, --label <name>           Service label holding the metrics port
  -e, --env-name <name>        Environment variable holding the metrics port
  -s, --service <name>         Name of the Prometheus service
  -n, --networks <a,b>         Static monitoring networks (skips detection)
      --default-networks <a,b> Networks used when detection finds nothing
      --opt-out-label <name>   Label that excludes a service
  -i, --interval <seconds>     Seconds between discovery passes
      --refresh-networks       Re-detect monitoring networks every pass
      --docker-socket <path>   Docker Engine socket
      --status-port <port>     Serve /health and /targets on this port
      --status-host <host>     Bind address for the status server
  -d, --debug                  Enable debug logging
  -h, --help                   Show this help
`;

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

function parseList(raw: string | undefined): string[] | undefined {
  if (raw === undefined) return undefined;
  const items = raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
  return items.length > 0 ? items : undefined;
}

function parseNumber(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === "") return undefined;
  return Number(raw);
}

function parseFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        output: { type: "string", short: "o" },
        label: { type: "string", short: "l" },
        "env-name": { type: "string", short: "e" },
        service: { type: "string", short: "s" },
        networks: { type: "string", short: "n" },
        "default-networks": { type: "string" },
        "opt-out-label": { type: "string" },
        interval: { type: "string", short: "i" },
        "refresh-networks": { type: "boolean" },
        "docker-socket": { type: "string" },
        "status-port": { type: "string" },
        "status-host": { type: "string" },
        debug: { type: "boolean", short: "d" },
        help: { type: "boolean", short: "h" },
      },
    }).values;
  } catch (err) {
    // parseArgs throws TypeError for unknown flags and missing values
    throw new ConfigError(errorMessage(err), { cause: err });
  }
}

/**
 * Merge argv and env into a validated config.
 * Throws ConfigError on unknown flags or invalid values.
 */
export function loadConfig(
  argv: string[],
  env: NodeJS.ProcessEnv,
): LoadConfigResult {
  const values = parseFlags(argv);

  if (values.help) return { help: true, usage: USAGE };

  const intervalSeconds =
    parseNumber(values.interval ?? env.SWARM_SD_INTERVAL) ??
    DEFAULT_INTERVAL_SECONDS;

  const candidate = {
    outputPath: values.output ?? env.SWARM_SD_OUTPUT ?? DEFAULT_OUTPUT_PATH,
    portLabel: values.label ?? env.SWARM_SD_PORT_LABEL ?? DEFAULT_PORT_LABEL,
    portEnv: values["env-name"] ?? env.SWARM_SD_PORT_ENV ?? DEFAULT_PORT_ENV,
    serviceName: values.service ?? env.SWARM_SD_SERVICE ?? DEFAULT_SERVICE_NAME,
    networks: parseList(values.networks ?? env.SWARM_SD_NETWORKS),
    defaultNetworks:
      parseList(values["default-networks"] ?? env.SWARM_SD_DEFAULT_NETWORKS) ??
      DEFAULT_NETWORKS,
    optOutLabel:
      values["opt-out-label"] ?? env.SWARM_SD_OPT_OUT_LABEL ?? DEFAULT_OPT_OUT_LABEL,
    intervalMs: intervalSeconds * 1000,
    refreshNetworks:
      values["refresh-networks"] ?? env.SWARM_SD_REFRESH_NETWORKS === "true",
    dockerSocket: values["docker-socket"] ?? env.DOCKER_SOCKET,
    statusPort: parseNumber(values["status-port"] ?? env.SWARM_SD_STATUS_PORT),
    statusHost: values["status-host"] ?? env.SWARM_SD_STATUS_HOST ?? "0.0.0.0",
    logLevel: values.debug ? "debug" : (env.LOG_LEVEL ?? "info"),
    prettyLogs: env.NODE_ENV !== "production",
  };

  // Unset optional keys are left out of the config entirely
  const cleaned = Object.fromEntries(
    Object.entries(candidate).filter(([, v]) => v !== undefined),
  );

  if (!Value.Check(DiscovererConfig, cleaned)) {
    const first = Value.Errors(DiscovererConfig, cleaned).First();
    const field = first?.path.replace(/^\//, "") || "config";
    throw new ConfigError(
      `Invalid configuration at "${field}": ${first?.message ?? "invalid value"}`,
    );
  }

  return { help: false, config: cleaned };
}
