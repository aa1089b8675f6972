import {
  LOG_MESSAGE_TYPE,
  ROUTER_ID,
  type LogMessageLevel,
  type LogMessagePayload,
  type Message,
  type Payload,
} from "../shared/types/message.js";
import type { ModuleExit, ModuleRuntimeOptions } from "../shared/types/module.js";
import { createMessage } from "../shared/messaging/index.js";
import { createLogger, type Logger } from "../shared/logger/index.js";
import { errorMessage } from "../shared/utils/index.js";
import type { Communicator } from "./communicator/index.js";

export class RegistrationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RegistrationError";
  }
}

/**
 * Hooks every module variant provides. BaseModule supplies defaults for all
 * of them.
 */
export interface ModuleLifecycle {
  onStart(): Promise<void>;
  mainLoop(): Promise<void>;
  handleMessage(message: Message): Promise<void>;
  onStop(): Promise<void>;
}

export const DEFAULT_RUNTIME_OPTIONS: ModuleRuntimeOptions = {
  queueTimeoutMs: 100,
  registrationTimeoutMs: 3000,
  drainTimeoutMs: 500,
  loggerIdentity: "Logger",
};

type StopReason = "shutdown" | "local" | "aborted";

const LOCAL_LEVEL: Record<LogMessageLevel, "debug" | "info" | "warn" | "error"> = {
  DEBUG: "debug",
  INFO: "info",
  WARNING: "warn",
  ERROR: "error",
};

export abstract class BaseModule implements ModuleLifecycle {
  protected logger: Logger;
  protected readonly options: ModuleRuntimeOptions;
  protected signal: AbortSignal | undefined;
  private stopReason: StopReason | null = null;
  private registered = false;
  private backlog: Message[] = [];

  constructor(
    readonly identity: string,
    protected readonly communicator: Communicator,
    options: Partial<ModuleRuntimeOptions> = {},
  ) {
    this.options = { ...DEFAULT_RUNTIME_OPTIONS, ...options };
    this.logger = createLogger(identity);
  }

  get isRegistered(): boolean {
    return this.registered;
  }

  get stopRequested(): boolean {
    return this.stopReason !== null;
  }

  /**
   * Full lifecycle: onStart → mainLoop → onStop. onStop, the closing
   * ShutdownAck/Deregister and the communicator teardown run on every exit
   * path, including a failed start.
   */
  async run(signal?: AbortSignal): Promise<ModuleExit> {
    this.signal = signal;
    this.communicator.start(signal);
    this.logger.info(`Module '${this.identity}' starting.`);

    let exit: ModuleExit;
    try {
      await this.onStart();
      await this.mainLoop();
      exit = { status: "stopped", reason: this.stopReason ?? "local" };
    } catch (err) {
      this.logger.error(`Module '${this.identity}' failed`, { error: errorMessage(err) });
      exit = { status: "failed", error: errorMessage(err) };
    }

    try {
      await this.onStop();
    } catch (err) {
      this.logger.error(`onStop failed for '${this.identity}'`, { error: errorMessage(err) });
    }

    if (this.registered) {
      if (this.stopReason === "shutdown") {
        this.sendMessage(ROUTER_ID, "ShutdownAck");
      } else {
        this.sendMessage(ROUTER_ID, "Deregister", { reason: exit.status === "failed" ? exit.error : "stopped" });
      }
    }

    await this.communicator.close();
    this.logger.info(`Module '${this.identity}' terminated.`, { ...exit });
    return exit;
  }

  /** Asks the main loop to finish after the current iteration. */
  stop(): void {
    this.requestStop("local");
  }

  sendMessage(destination: string, type: string, payload: Payload = {}): boolean {
    return this.communicator.send(createMessage({ sender: this.identity, destination, type, payload }));
  }

  /**
   * Writes the local log and forwards a LogMessage to the logger module.
   */
  log(level: LogMessageLevel, message: string): void {
    this.logger[LOCAL_LEVEL[level]](message);
    if (this.identity !== this.options.loggerIdentity) {
      const payload: LogMessagePayload = { level, message };
      this.sendMessage(this.options.loggerIdentity, LOG_MESSAGE_TYPE, payload);
    }
  }

  async onStart(): Promise<void> {
    await this.register();
  }

  /**
   * Polls the inbound queue, dispatches what arrives and runs one tick() per
   * iteration until a stop is requested or the pump fails.
   */
  async mainLoop(): Promise<void> {
    while (!this.stopRequested) {
      if (this.signal?.aborted) {
        this.requestStop("aborted");
        break;
      }

      const outcome = this.communicator.pumpOutcome;
      if (outcome.status === "failed") {
        throw new Error(`Communication pump failed: ${outcome.error}`);
      }

      const message = this.backlog.shift() ?? (await this.communicator.receive(this.options.queueTimeoutMs, this.signal));
      if (message) {
        await this.dispatch(message);
      }
      if (!this.stopRequested) {
        await this.tick();
      }
    }
  }

  async handleMessage(message: Message): Promise<void> {
    this.logger.warn(`Unhandled message type '${message.type}' from '${message.sender}'; dropping`);
  }

  async onStop(): Promise<void> {}

  /** One increment of the module's own work. Runs after every poll. */
  protected async tick(): Promise<void> {}

  protected async onDeliveryFailed(message: Message): Promise<void> {
    const type = typeof message.payload.type === "string" ? message.payload.type : "unknown";
    const level = type === LOG_MESSAGE_TYPE ? "debug" : "warn";
    this.logger[level](`Router could not deliver '${type}'`, { ...message.payload });
  }

  /**
   * Sends Register and waits for the router's answer. Silence past
   * registrationTimeoutMs, a rejection or a dead pump is fatal.
   */
  protected async register(): Promise<void> {
    this.sendMessage(ROUTER_ID, "Register", { identity: this.identity });
    const deadline = Date.now() + this.options.registrationTimeoutMs;

    while (!this.registered) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw new RegistrationError(`No registration acknowledgement within ${this.options.registrationTimeoutMs} ms`);
      }
      if (this.signal?.aborted) {
        throw new RegistrationError("Aborted while registering");
      }

      const message = await this.communicator.receive(Math.min(remaining, this.options.queueTimeoutMs), this.signal);
      if (!message) {
        const outcome = this.communicator.pumpOutcome;
        if (outcome.status === "failed") {
          throw new RegistrationError(`Transport failed while registering: ${outcome.error}`);
        }
        continue;
      }

      if (message.sender === ROUTER_ID && message.type === "Registered") {
        this.registered = true;
        this.logger.info(`Module '${this.identity}' registered.`);
      } else if (message.sender === ROUTER_ID && message.type === "RegisterRejected") {
        const reason = typeof message.payload.reason === "string" ? message.payload.reason : "unknown";
        throw new RegistrationError(`Registration rejected: ${reason}`);
      } else {
        this.backlog.push(message);
      }
    }
  }

  private async dispatch(message: Message): Promise<void> {
    if (message.sender === ROUTER_ID) {
      switch (message.type) {
        case "Shutdown":
          this.logger.info(`Module '${this.identity}' received stop signal.`);
          this.requestStop("shutdown");
          return;
        case "DeliveryFailed":
          await this.onDeliveryFailed(message);
          return;
        case "Registered":
        case "RegisterRejected":
          this.logger.debug(`Ignoring late '${message.type}'`);
          return;
      }
    }

    try {
      await this.handleMessage(message);
    } catch (err) {
      this.logger.error(`Error handling '${message.type}' from '${message.sender}'`, { error: errorMessage(err) });
    }
  }

  private requestStop(reason: StopReason): void {
    // A router shutdown request wins over a local one so the ack still goes out.
    if (this.stopReason === null || reason === "shutdown") {
      this.stopReason = reason;
    }
  }
}
