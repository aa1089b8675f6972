import { EventEmitter } from "events";
import type { Serializable } from "child_process";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { ROUTER_ID, type Message } from "../../shared/types/message.js";
import type { ModuleRuntimeOptions } from "../../shared/types/module.js";
import { EventEmitterLink, createMessage, parseMessage } from "../../shared/messaging/index.js";
import { BaseModule } from "../../modules/base-module.js";
import { ModuleCatalog, createDefaultCatalog } from "../../modules/catalog.js";
import { EventManager } from "../engine/index.js";
import { ModuleSupervisor, type SpawnedProcess } from "./index.js";

const runtime: ModuleRuntimeOptions = {
  queueTimeoutMs: 20,
  registrationTimeoutMs: 1000,
  drainTimeoutMs: 200,
  loggerIdentity: "Logger",
};

class FakeChild extends EventEmitter implements SpawnedProcess {
  pid: number | undefined = 4242;
  connected = true;
  exitCode: number | null = null;
  signalCode: NodeJS.Signals | null = null;
  ignoreSigterm = false;
  readonly sent: Serializable[] = [];
  readonly signals: NodeJS.Signals[] = [];

  send(message: Serializable, callback?: (error: Error | null) => void): boolean {
    this.sent.push(message);
    callback?.(null);
    return true;
  }

  disconnect(): void {
    this.connected = false;
  }

  kill(signal: NodeJS.Signals = "SIGTERM"): boolean {
    this.signals.push(signal);
    if (signal === "SIGTERM" && this.ignoreSigterm) return true;
    setImmediate(() => this.exit(null, signal));
    return true;
  }

  exit(code: number | null, signal: NodeJS.Signals | null): void {
    this.connected = false;
    this.exitCode = code;
    this.signalCode = signal;
    this.emit("exit", code, signal);
  }

  sentTypes(): string[] {
    return this.sent.map((frame) => parseMessage(frame)?.type ?? "?");
  }
}

/** Takes the first message it gets and never returns from the handler. */
class StuckModule extends BaseModule {
  readonly received: string[] = [];

  async handleMessage(message: Message): Promise<void> {
    this.received.push(message.type);
    await new Promise<void>(() => {});
  }
}

describe("ModuleSupervisor", () => {
  let router: EventManager;
  let controller: AbortController;
  let loop: Promise<void>;

  beforeEach(() => {
    router = new EventManager({ queueTimeoutMs: 20, shutdownGraceMs: 200, killWaitMs: 100 });
    controller = new AbortController();
    loop = router.run(controller.signal);
  });

  afterEach(async () => {
    controller.abort();
    await loop;
    vi.restoreAllMocks();
  });

  describe("in-process isolation", () => {
    it("runs catalog modules that answer traffic and stop on shutdown", async () => {
      vi.spyOn(process.stdout, "write").mockImplementation(() => true);
      const supervisor = new ModuleSupervisor(router, { isolation: "in-process", runtime, catalog: createDefaultCatalog() });
      const handles = supervisor.launchAll([
        { key: "logger", identity: "Logger", kind: "logger", params: {} },
        { key: "ping", identity: "Ping", kind: "ping", params: {} },
      ]);
      expect(handles.map((h) => h.mode)).toEqual(["in-process", "in-process"]);
      await vi.waitFor(() => expect(router.stateOf("Ping")).toBe("active"));
      await vi.waitFor(() => expect(router.stateOf("Logger")).toBe("active"));

      const [probe, probeSide] = EventEmitterLink.pair();
      const received: Message[] = [];
      probe.onMessage((frame) => {
        const message = parseMessage(frame);
        if (message) received.push(message);
      });
      router.attach("Probe", probeSide);
      probe.send(createMessage({ sender: "Probe", destination: ROUTER_ID, type: "Register" }));
      await vi.waitFor(() => expect(router.stateOf("Probe")).toBe("active"));
      probe.send(createMessage({ sender: "Probe", destination: "Ping", type: "Ping", payload: { seq: 1 } }));

      await vi.waitFor(() => expect(received.map((m) => m.type)).toEqual(["Registered", "Pong"]));
      expect(received[1]).toMatchObject({ sender: "Ping", payload: { seq: 1 } });

      const report = await router.broadcastShutdown();
      expect([...report.acknowledged].sort()).toEqual(["Logger", "Ping"]);
      expect(report.forced).toEqual(["Probe"]);
      expect(await Promise.all(handles.map((h) => h.exited))).toEqual([0, 0]);
    });

    it("refuses a second launch of the same identity and unknown kinds", () => {
      const supervisor = new ModuleSupervisor(router, { isolation: "in-process", runtime, catalog: createDefaultCatalog() });
      supervisor.launch({ key: "ping", identity: "Ping", kind: "ping", params: {} });

      expect(() => supervisor.launch({ key: "ping2", identity: "Ping", kind: "ping", params: {} })).toThrow(
        "Module 'Ping' is already running",
      );
      expect(() => supervisor.launch({ key: "cam", identity: "Camera", kind: "camera", params: {} })).toThrow(
        "Unknown module kind 'camera' for 'cam'",
      );
      expect(supervisor.list().map((h) => h.identity)).toEqual(["Ping"]);
    });

    it("skips modules that cannot start and launches the rest", () => {
      const supervisor = new ModuleSupervisor(router, { isolation: "in-process", runtime, catalog: createDefaultCatalog() });

      const launched = supervisor.launchAll([
        { key: "cam", identity: "Camera", kind: "camera", params: {} },
        { key: "ping", identity: "Ping", kind: "ping", params: {} },
      ]);

      expect(launched.map((h) => h.identity)).toEqual(["Ping"]);
      expect(supervisor.get("Camera")).toBeUndefined();
    });

    it("aborts an in-process module on terminate", async () => {
      const supervisor = new ModuleSupervisor(router, { isolation: "in-process", runtime, catalog: createDefaultCatalog() });
      const handle = supervisor.launch({ key: "ping", identity: "Ping", kind: "ping", params: {} });
      await vi.waitFor(() => expect(router.stateOf("Ping")).toBe("active"));

      await handle.terminate("test");

      expect(await handle.exited).toBe(0);
      await vi.waitFor(() => expect(router.stateOf("Ping")).toBe("terminated"));
    });

    it("gives up on an in-process module stuck in a handler", async () => {
      const modules: StuckModule[] = [];
      const catalog = new ModuleCatalog().register("stuck", (definition, communicator, options) => {
        const module = new StuckModule(definition.identity, communicator, options);
        modules.push(module);
        return module;
      });
      const supervisor = new ModuleSupervisor(router, { isolation: "in-process", runtime, catalog, killGraceMs: 50 });
      supervisor.launch({ key: "stuck", identity: "Stuck", kind: "stuck", params: {} });
      await vi.waitFor(() => expect(router.stateOf("Stuck")).toBe("active"));
      router.route(createMessage({ sender: ROUTER_ID, destination: "Stuck", type: "Work" }));
      await vi.waitFor(() => expect(modules[0]?.received).toEqual(["Work"]));

      const report = await router.broadcastShutdown();
      expect(report.forced).toEqual(["Stuck"]);

      const started = Date.now();
      await supervisor.waitForExit(100);
      expect(Date.now() - started).toBeLessThan(100 + 50 + 100);
      expect(router.stateOf("Stuck")).toBe("terminated");
    });
  });

  describe("process isolation", () => {
    function launchFake(child: FakeChild) {
      const spawn = vi.fn(() => child);
      const supervisor = new ModuleSupervisor(router, {
        isolation: "process",
        runtime,
        catalog: createDefaultCatalog(),
        killGraceMs: 50,
        spawnProcess: spawn,
      });
      supervisor.launch({ key: "ping", identity: "Ping", kind: "ping", params: {} });
      return { supervisor, spawn };
    }

    it("routes frames from the child through the router", async () => {
      const child = new FakeChild();
      const { spawn } = launchFake(child);

      child.emit("message", { sender: "Ping", destination: ROUTER_ID, type: "Register" });

      await vi.waitFor(() => expect(child.sentTypes()).toEqual(["Registered"]));
      expect(router.stateOf("Ping")).toBe("active");
      expect(spawn).toHaveBeenCalledWith({ key: "ping", identity: "Ping", kind: "ping", params: {} }, runtime);
    });

    it("treats a child exit as a deregistration", async () => {
      const child = new FakeChild();
      const { supervisor } = launchFake(child);
      child.emit("message", { sender: "Ping", destination: ROUTER_ID, type: "Register" });
      await vi.waitFor(() => expect(router.stateOf("Ping")).toBe("active"));

      child.exit(1, null);

      await vi.waitFor(() => expect(router.stateOf("Ping")).toBe("terminated"));
      expect(await supervisor.get("Ping")?.exited).toBe(1);
    });

    it("kills a child that ignores the shutdown", async () => {
      const child = new FakeChild();
      launchFake(child);
      child.emit("message", { sender: "Ping", destination: ROUTER_ID, type: "Register" });
      await vi.waitFor(() => expect(router.stateOf("Ping")).toBe("active"));

      const report = await router.broadcastShutdown();

      expect(report.forced).toEqual(["Ping"]);
      expect(child.signals).toEqual(["SIGTERM"]);
      expect(child.sentTypes()).toEqual(["Registered", "Shutdown", "Shutdown"]);
      expect(router.stateOf("Ping")).toBe("terminated");
    });

    it("survives a child that fails to spawn", async () => {
      const child = new FakeChild();
      child.pid = undefined;
      const { supervisor } = launchFake(child);

      expect(() => child.emit("error", new Error("spawn /missing/node ENOENT"))).not.toThrow();

      expect(await supervisor.get("Ping")?.exited).toBeNull();
      expect(child.listenerCount("message")).toBe(0);
      expect(router.isRunning).toBe(true);
      await supervisor.waitForExit(100);
    });

    it("keeps a running child registered after a non-fatal process error", async () => {
      const child = new FakeChild();
      launchFake(child);
      child.emit("message", { sender: "Ping", destination: ROUTER_ID, type: "Register" });
      await vi.waitFor(() => expect(router.stateOf("Ping")).toBe("active"));

      expect(() => child.emit("error", new Error("kill EPERM"))).not.toThrow();

      await new Promise((resolve) => setTimeout(resolve, 50));
      expect(router.stateOf("Ping")).toBe("active");
    });

    it("escalates to SIGKILL when SIGTERM is ignored", async () => {
      const child = new FakeChild();
      child.ignoreSigterm = true;
      const { supervisor } = launchFake(child);
      const handle = supervisor.get("Ping");

      await handle?.terminate("test");

      expect(child.signals).toEqual(["SIGTERM", "SIGKILL"]);
      expect(await handle?.exited).toBeNull();
    });
  });
});
