import "dotenv/config";
import type { Server } from "http";
import { createLogger, configureLogging } from "../shared/logger/index.js";
import { enabledModules, loadConfig, loadManifest, runtimeOptionsFrom } from "../shared/config/index.js";
import { errorMessage } from "../shared/utils/index.js";
import { EventManager } from "../router/engine/index.js";
import { ModuleSupervisor } from "../router/supervisor/index.js";
import { RouterAPI, createApiServer } from "../router/api/index.js";
import { createDefaultCatalog } from "../modules/catalog.js";

const logger = createLogger("system");

/** How long to wait for module processes after the router has stopped. */
const EXIT_WAIT_MS = 2000;

async function main(): Promise<void> {
  const config = loadConfig();
  configureLogging({ level: config.logLevel, dir: config.logDir });
  logger.info("Starting module orchestrator", { modulesConfig: config.modulesConfigPath });

  const manifest = await loadManifest(config.modulesConfigPath);
  const { system } = manifest;

  const eventManager = new EventManager({
    queueTimeoutMs: system.queueTimeoutMs,
    shutdownGraceMs: system.shutdownGraceMs,
    shutdownRetries: system.shutdownRetries,
  });
  const routerLoop = eventManager.run();

  const supervisor = new ModuleSupervisor(eventManager, {
    isolation: system.isolation,
    runtime: runtimeOptionsFrom(system),
    catalog: createDefaultCatalog(),
  });
  const definitions = enabledModules(manifest);
  supervisor.launchAll(definitions);
  logger.info("Modules launched", { modules: definitions.map((d) => d.identity), isolation: system.isolation });

  let server: Server | null = null;
  if (config.api.enabled) {
    const { host, port } = config.api;
    server = createApiServer(new RouterAPI(eventManager), host, port);
    server.listen(port, host, () => {
      logger.info(`Status API listening on http://${host}:${port}`);
    });
  }

  const shutdown = (signal: string): void => {
    logger.info(`${signal} received. Shutting down...`);
    eventManager.broadcastShutdown().catch((err) => {
      logger.error("Shutdown failed", { error: errorMessage(err) });
    });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  await routerLoop;
  server?.close();
  await supervisor.waitForExit(EXIT_WAIT_MS);
  logger.info("All modules terminated. Exiting.");
}

main().then(
  () => process.exit(0),
  (err) => {
    logger.error("Fatal error", { error: errorMessage(err) });
    process.exit(1);
  },
);
