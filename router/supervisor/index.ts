import { fork } from "child_process";
import { fileURLToPath } from "url";
import type { IsolationMode, ModuleDefinition, ModuleRuntimeOptions } from "../../shared/types/module.js";
import { EventEmitterLink, IpcLink, type IpcPort, type Link } from "../../shared/messaging/index.js";
import { workerEnv } from "../../shared/config/index.js";
import { createLogger } from "../../shared/logger/index.js";
import { errorMessage, withTimeout } from "../../shared/utils/index.js";
import { Communicator } from "../../modules/communicator/index.js";
import type { ModuleCatalog } from "../../modules/catalog.js";
import type { EventManager, IsolationUnit } from "../engine/index.js";

const logger = createLogger("supervisor");

const DEFAULT_KILL_GRACE_MS = 1000;

/**
 * The parts of a forked ChildProcess the supervisor relies on.
 */
export interface SpawnedProcess extends IpcPort {
  readonly pid?: number;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: "exit", listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
}

export type ProcessSpawner = (definition: ModuleDefinition, runtime: ModuleRuntimeOptions) => SpawnedProcess;

export interface ModuleHandle extends IsolationUnit {
  readonly identity: string;
  readonly mode: IsolationMode;
  /** Resolves with the unit's exit code (null when killed by a signal). */
  readonly exited: Promise<number | null>;
}

export interface SupervisorOptions {
  isolation: IsolationMode;
  runtime: ModuleRuntimeOptions;
  catalog: ModuleCatalog;
  /**
   * Time between SIGTERM and SIGKILL for an unresponsive child, and how long
   * an aborted in-process module may take to finish.
   */
  killGraceMs?: number;
  spawnProcess?: ProcessSpawner;
}

class InProcessUnit implements ModuleHandle {
  readonly mode = "in-process";
  private readonly controller = new AbortController();
  private resolveExit: (code: number) => void = () => {};
  readonly exited = new Promise<number | null>((resolve) => {
    this.resolveExit = resolve;
  });

  constructor(
    readonly identity: string,
    private readonly start: (signal: AbortSignal) => Promise<number>,
    private readonly killGraceMs: number,
  ) {}

  launch(): void {
    void this.start(this.controller.signal).then(
      (code) => this.resolveExit(code),
      (err) => {
        logger.error(`In-process module '${this.identity}' crashed`, { error: errorMessage(err) });
        this.resolveExit(1);
      },
    );
  }

  async terminate(reason: string): Promise<void> {
    logger.warn(`Aborting in-process module '${this.identity}'`, { reason });
    this.controller.abort();
    // A task stuck in a handler never sees the abort; it is left behind.
    const exited = await withTimeout(this.exited.then(() => true), this.killGraceMs, false);
    if (!exited) {
      logger.error(`In-process module '${this.identity}' did not stop; abandoning its task`, {
        waitedMs: this.killGraceMs,
      });
    }
  }
}

class ChildProcessUnit implements ModuleHandle {
  readonly mode = "process";
  readonly exited: Promise<number | null>;

  constructor(
    readonly identity: string,
    private readonly child: SpawnedProcess,
    private readonly link: Link,
    private readonly killGraceMs: number,
  ) {
    this.exited = new Promise((resolve) => {
      child.once("exit", (code) => resolve(code));
      child.on("error", (err: Error) => {
        logger.error(`Process of '${identity}' reported an error`, { pid: child.pid, error: err.message });
        // No pid means the fork itself failed and no exit event will follow.
        if (child.pid === undefined) {
          resolve(null);
          this.link.close("spawn failed");
        }
      });
    });
  }

  get hasExited(): boolean {
    return this.child.exitCode !== null || this.child.signalCode !== null;
  }

  async terminate(reason: string): Promise<void> {
    if (this.hasExited) return;
    logger.warn(`Terminating process of '${this.identity}'`, { pid: this.child.pid, reason });
    this.child.kill("SIGTERM");
    const exited = await withTimeout(this.exited.then(() => true), this.killGraceMs, false);
    if (!exited && !this.hasExited) {
      logger.warn(`Killing process of '${this.identity}'`, { pid: this.child.pid });
      this.child.kill("SIGKILL");
    }
  }
}

/**
 * Forks the module worker entry beside this build: the TypeScript source
 * through tsx during development, the compiled file otherwise.
 */
export const forkModuleWorker: ProcessSpawner = (definition, runtime) => {
  const fromSource = import.meta.url.endsWith(".ts");
  const entry = fileURLToPath(new URL(`../../src/module-worker.${fromSource ? "ts" : "js"}`, import.meta.url));
  return fork(entry, [], {
    env: { ...process.env, ...workerEnv(definition, runtime) },
    execArgv: fromSource ? ["--import", "tsx"] : [],
    stdio: ["inherit", "inherit", "inherit", "ipc"],
  });
};

/**
 * Starts modules in their isolation units and attaches each one to the
 * router. A unit's exit closes its link, which the router treats as a
 * deregistration.
 */
export class ModuleSupervisor {
  private handles = new Map<string, ModuleHandle>();

  constructor(
    private eventManager: EventManager,
    private options: SupervisorOptions,
  ) {}

  launch(definition: ModuleDefinition): ModuleHandle {
    if (this.handles.has(definition.identity)) {
      throw new Error(`Module '${definition.identity}' is already running`);
    }
    if (!this.options.catalog.has(definition.kind)) {
      throw new Error(`Unknown module kind '${definition.kind}' for '${definition.key}'`);
    }

    const handle =
      this.options.isolation === "in-process" ? this.launchInProcess(definition) : this.launchProcess(definition);
    this.handles.set(definition.identity, handle);
    void handle.exited.then((code) => {
      logger.info(`Module '${definition.identity}' exited`, { code, mode: handle.mode });
    });
    return handle;
  }

  /**
   * Launches every definition; one that fails to start is logged and
   * skipped so the rest of the system still comes up.
   */
  launchAll(definitions: ModuleDefinition[]): ModuleHandle[] {
    const launched: ModuleHandle[] = [];
    for (const definition of definitions) {
      try {
        launched.push(this.launch(definition));
        logger.info(`Starting module: ${definition.identity}`, { kind: definition.kind });
      } catch (err) {
        logger.error(`Could not start module '${definition.identity}'`, { error: errorMessage(err) });
      }
    }
    return launched;
  }

  get(identity: string): ModuleHandle | undefined {
    return this.handles.get(identity);
  }

  list(): ModuleHandle[] {
    return Array.from(this.handles.values());
  }

  /**
   * Waits for every unit to exit; units still alive after `timeoutMs` are
   * terminated.
   */
  async waitForExit(timeoutMs: number): Promise<void> {
    const handles = this.list();
    const done = await withTimeout(Promise.all(handles.map((h) => h.exited)).then(() => true), timeoutMs, false);
    if (done) return;
    await Promise.all(handles.map((h) => h.terminate("supervisor exit timeout")));
  }

  private launchInProcess(definition: ModuleDefinition): ModuleHandle {
    const [moduleSide, routerSide] = EventEmitterLink.pair();
    const communicator = new Communicator(definition.identity, moduleSide, {
      drainTimeoutMs: this.options.runtime.drainTimeoutMs,
      pollMs: this.options.runtime.queueTimeoutMs,
    });
    const module = this.options.catalog.create(definition, communicator, this.options.runtime);
    const unit = new InProcessUnit(
      definition.identity,
      async (signal) => {
        const exit = await module.run(signal);
        return exit.status === "stopped" ? 0 : 1;
      },
      this.options.killGraceMs ?? DEFAULT_KILL_GRACE_MS,
    );
    this.eventManager.attach(definition.identity, routerSide, unit);
    unit.launch();
    return unit;
  }

  private launchProcess(definition: ModuleDefinition): ModuleHandle {
    const spawn = this.options.spawnProcess ?? forkModuleWorker;
    const child = spawn(definition, this.options.runtime);
    const link = new IpcLink(child, definition.identity);
    const unit = new ChildProcessUnit(definition.identity, child, link, this.options.killGraceMs ?? DEFAULT_KILL_GRACE_MS);
    this.eventManager.attach(definition.identity, link, unit);
    return unit;
  }
}
