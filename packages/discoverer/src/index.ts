#!/usr/bin/env node
/**
 * swarm-sd — Prometheus file_sd discovery for Docker Swarm.
 *
 * Wires config, logger, the Docker client and the discovery loop together,
 * optionally starts the status server, and shuts everything down on
 * SIGINT/SIGTERM without interrupting a pass in flight.
 */

import { loadConfig, USAGE, type LoadConfigResult } from "./config.js";
import { ConfigError, errorMessage } from "./errors.js";
import { createLogger } from "./logger.js";
import { DockerOrchestrator } from "./orchestrator/index.js";
import { Discoverer, NetworkSelector } from "./discovery/index.js";
import { TargetFileWriter } from "./output/target-file-writer.js";
import { DiscoveryLoop } from "./scheduler/index.js";
import { buildApp } from "./app.js";

function readConfig(): LoadConfigResult {
  try {
    return loadConfig(process.argv.slice(2), process.env);
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`${err.message}\n\n${USAGE}`);
      process.exit(2);
    }
    throw err;
  }
}

async function main(): Promise<void> {
  const loaded = readConfig();
  if (loaded.help) {
    console.log(loaded.usage);
    return;
  }
  const { config } = loaded;

  const logger = createLogger({ level: config.logLevel, pretty: config.prettyLogs });
  logger.info("swarm-sd starting");

  // One Docker client for the life of the process
  const orchestrator = new DockerOrchestrator({ socketPath: config.dockerSocket });

  const selector = new NetworkSelector(orchestrator, {
    defaultNetworks: config.defaultNetworks,
    staticNetworks: config.networks,
    refreshEveryPass: config.refreshNetworks,
    logger: logger.child({ component: "network-selector" }),
  });
  const discoverer = new Discoverer(orchestrator, {
    portLabel: config.portLabel,
    portEnv: config.portEnv,
    monitoringServiceName: config.serviceName,
    optOutLabel: config.optOutLabel,
    logger: logger.child({ component: "discoverer" }),
  });
  const writer = new TargetFileWriter(config.outputPath);
  const loop = new DiscoveryLoop(selector, discoverer, writer, {
    intervalMs: config.intervalMs,
    monitoringServiceName: config.serviceName,
    logger: logger.child({ component: "loop" }),
  });

  const app =
    config.statusPort !== undefined
      ? await buildApp({ discoveryLoop: loop, loggerInstance: logger })
      : null;

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, "Shutting down after the current pass");
    await loop.stop();
    await app?.close();
    process.exit(0);
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err) => {
        logger.error({ err }, "Shutdown failed");
        process.exit(1);
      });
    });
  }

  if (app && config.statusPort !== undefined) {
    await app.listen({ port: config.statusPort, host: config.statusHost });
  }

  logger.info(
    {
      output: config.outputPath,
      intervalMs: config.intervalMs,
      networks: config.networks ?? "auto",
    },
    "Starting discovery loop",
  );
  loop.start();
}

main().catch((err) => {
  console.error("swarm-sd failed:", errorMessage(err));
  process.exit(1);
});
