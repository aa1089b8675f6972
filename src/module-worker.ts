/**
 * Entry point of a module's child process. The supervisor passes the module
 * definition and runtime options through the environment; the parent's IPC
 * channel is the module's link to the router.
 */

import "dotenv/config";
import { createLogger } from "../shared/logger/index.js";
import { readWorkerEnv } from "../shared/config/index.js";
import { IpcLink } from "../shared/messaging/index.js";
import { errorMessage } from "../shared/utils/index.js";
import { Communicator } from "../modules/communicator/index.js";
import { createDefaultCatalog } from "../modules/catalog.js";

const logger = createLogger("module-worker");

async function main(): Promise<number> {
  if (!process.send) {
    logger.error("Module worker must be started by the supervisor (no IPC channel)");
    return 1;
  }

  const { definition, runtime } = readWorkerEnv();
  const link = new IpcLink(process, `${definition.identity}:parent`);
  const communicator = new Communicator(definition.identity, link, {
    drainTimeoutMs: runtime.drainTimeoutMs,
    pollMs: runtime.queueTimeoutMs,
  });
  const module = createDefaultCatalog().create(definition, communicator, runtime);

  const controller = new AbortController();
  process.on("SIGTERM", () => {
    logger.warn(`SIGTERM received by '${definition.identity}'`);
    controller.abort();
  });
  // Ctrl-C reaches the whole process group; the router's Shutdown drives the stop.
  process.on("SIGINT", () => {
    logger.debug(`Ignoring SIGINT in '${definition.identity}'`);
  });

  const exit = await module.run(controller.signal);
  return exit.status === "stopped" ? 0 : 1;
}

main().then(
  (code) => process.exit(code),
  (err) => {
    logger.error("Module worker failed", { error: errorMessage(err) });
    process.exit(1);
  },
);
