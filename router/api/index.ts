import { createServer, type IncomingMessage, type Server } from "http";
import type { ModuleSnapshot } from "../../shared/types/module.js";
import { createLogger } from "../../shared/logger/index.js";
import { errorMessage } from "../../shared/utils/index.js";
import type { EventManager, ShutdownReport } from "../engine/index.js";

const logger = createLogger("router-api");

export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

export class RouterAPI {
  constructor(private eventManager: EventManager) {}

  listModules(): ModuleSnapshot[] {
    return this.eventManager.snapshot();
  }

  getModule(identity: string): ModuleSnapshot {
    const snapshot = this.eventManager.describe(identity);
    if (!snapshot) throw new NotFoundError(`Module not found: ${identity}`);
    return snapshot;
  }

  requestShutdown(): { accepted: boolean } {
    const accepted = !this.eventManager.isShuttingDown;
    void this.eventManager.broadcastShutdown().then(
      (report: ShutdownReport) => logger.info("Shutdown requested through API finished", { ...report }),
      (err) => logger.error("Shutdown requested through API failed", { error: errorMessage(err) }),
    );
    return { accepted };
  }
}

export async function handleRoute(url: URL, method: string, api: RouterAPI): Promise<unknown> {
  const pathname = url.pathname;

  if (pathname === "/api/modules" && method === "GET") {
    return { modules: api.listModules() };
  }

  const moduleMatch = pathname.match(/^\/api\/modules\/([^/]+)$/);
  if (moduleMatch && method === "GET") {
    let identity: string;
    try {
      identity = decodeURIComponent(moduleMatch[1]);
    } catch {
      throw new NotFoundError(`Module not found: ${moduleMatch[1]}`);
    }
    return api.getModule(identity);
  }

  if (pathname === "/api/shutdown" && method === "POST") {
    return api.requestShutdown();
  }

  throw new NotFoundError(`No route for ${method} ${pathname}`);
}

function drainBody(req: IncomingMessage): Promise<void> {
  return new Promise((resolve) => {
    req.on("data", () => {});
    req.on("end", () => resolve());
    req.on("error", () => resolve());
  });
}

export function createApiServer(api: RouterAPI, host: string, port: number): Server {
  return createServer(async (req, res) => {
    const url = new URL(req.url ?? "/", `http://${host}:${port}`);
    const method = req.method ?? "GET";

    res.setHeader("Content-Type", "application/json");

    try {
      await drainBody(req);
      const result = await handleRoute(url, method, api);
      res.writeHead(200);
      res.end(JSON.stringify(result));
    } catch (err) {
      const status = err instanceof NotFoundError ? 404 : 500;
      res.writeHead(status);
      res.end(JSON.stringify({ error: errorMessage(err) }));
    }
  });
}
