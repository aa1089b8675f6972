import { EventEmitter } from "events";
import { v4 as uuidv4 } from "uuid";
import {
  BROADCAST_ID,
  RESERVED_IDENTITIES,
  ROUTER_ID,
  isControlType,
  type DeliveryFailedPayload,
  type DeliveryFailureReason,
  type Message,
  type RegisterRejectedPayload,
  type RegisterRejectedReason,
} from "../../shared/types/message.js";
import type { ModuleSnapshot, ModuleState, StateTransition } from "../../shared/types/module.js";
import { createMessage, parseMessage, restamp, MessageQueue, type Link } from "../../shared/messaging/index.js";
import { createLogger } from "../../shared/logger/index.js";
import { errorMessage, withTimeout } from "../../shared/utils/index.js";
import { ModuleRegistry, type Endpoint } from "../registry/index.js";

const logger = createLogger("event-manager");

/**
 * Whatever hosts a module: a child process or an in-process task.
 * Used only to escalate when a module ignores a shutdown request.
 */
export interface IsolationUnit {
  terminate(reason: string): Promise<void>;
}

export interface EventManagerOptions {
  /** Poll interval of the dispatch loop. */
  queueTimeoutMs: number;
  shutdownGraceMs: number;
  /** Extra Shutdown deliveries to laggards inside the grace period. */
  shutdownRetries: number;
  /**
   * Upper bound on waiting for a force-terminated unit. Reserved at the end
   * of the grace period; never extends it.
   */
  killWaitMs: number;
}

export const DEFAULT_EVENT_MANAGER_OPTIONS: EventManagerOptions = {
  queueTimeoutMs: 100,
  shutdownGraceMs: 5000,
  shutdownRetries: 1,
  killWaitMs: 250,
};

export type RouteOutcome = "delivered" | "broadcast" | "control" | "undeliverable" | "rejected";

export type RegistrationResult =
  | { accepted: true }
  | { accepted: false; reason: RegisterRejectedReason | "endpoint-closed" };

export interface ShutdownReport {
  acknowledged: string[];
  forced: string[];
  durationMs: number;
}

interface Connection {
  id: string;
  identity: string;
  link: Link;
  unit: IsolationUnit | null;
  endpoint: Endpoint;
  unsubscribe: Array<() => void>;
}

interface TransportItem {
  connectionId: string | null;
  message: Message;
  /** Synthesized by the router when a connection closes. */
  disconnect?: boolean;
}

const UNDELIVERABLE_REASONS: Record<ModuleState, DeliveryFailureReason> = {
  unregistered: "unknown-destination",
  registering: "unknown-destination",
  active: "endpoint-closed",
  stopping: "destination-stopping",
  terminated: "destination-terminated",
};

/**
 * Central router. Connections feed one transport queue; a single dispatch
 * loop drains it, so registry mutations never interleave and messages from
 * one sender keep their order.
 */
export class EventManager {
  readonly identity = ROUTER_ID;
  private readonly options: EventManagerOptions;
  private readonly emitter = new EventEmitter();
  private readonly registry: ModuleRegistry;
  private readonly transport = new MessageQueue<TransportItem>();
  private readonly connections = new Map<string, Connection>();
  private readonly acknowledged = new Set<string>();
  private readonly loopAbort = new AbortController();
  private running = false;
  private shutdownPromise: Promise<ShutdownReport> | null = null;

  constructor(options: Partial<EventManagerOptions> = {}) {
    this.options = { ...DEFAULT_EVENT_MANAGER_OPTIONS, ...options };
    this.registry = new ModuleRegistry((transition) => {
      logger.debug(`Module '${transition.identity}' ${transition.from} -> ${transition.to}`);
      this.emitter.emit("transition", transition);
    });
    this.emitter.setMaxListeners(0);
  }

  get isRunning(): boolean {
    return this.running;
  }

  get isShuttingDown(): boolean {
    return this.shutdownPromise !== null;
  }

  onTransition(handler: (transition: StateTransition) => void): () => void {
    this.emitter.on("transition", handler);
    return () => this.emitter.off("transition", handler);
  }

  stateOf(identity: string): ModuleState {
    return this.registry.stateOf(identity);
  }

  snapshot(): ModuleSnapshot[] {
    return this.registry.list();
  }

  describe(identity: string): ModuleSnapshot | undefined {
    return this.registry.get(identity);
  }

  /**
   * Connects a module's link. Every frame read from it is validated and
   * re-stamped with `identity` before it reaches the transport queue.
   */
  attach(identity: string, link: Link, unit?: IsolationUnit): string {
    const id = uuidv4();
    const endpoint: Endpoint = {
      connectionId: id,
      get closed() {
        return link.closed;
      },
      deliver: (message) => link.send(message),
    };
    const connection: Connection = { id, identity, link, unit: unit ?? null, endpoint, unsubscribe: [] };

    connection.unsubscribe.push(
      link.onMessage((frame) => {
        const message = parseMessage(frame);
        if (!message) {
          logger.warn(`Dropping malformed frame from '${identity}'`);
          return;
        }
        this.transport.push({ connectionId: id, message: restamp(message, identity) });
      }),
      link.onClose((reason) => {
        this.transport.push({
          connectionId: id,
          disconnect: true,
          message: createMessage({
            sender: identity,
            destination: ROUTER_ID,
            type: "Deregister",
            payload: { reason: `connection ${reason}` },
          }),
        });
      }),
    );

    this.connections.set(id, connection);
    logger.debug(`Connection ${id} attached for '${identity}'`);
    return id;
  }

  /**
   * Dispatch loop. Returns once shutdown completes or `signal` aborts.
   */
  async run(signal?: AbortSignal): Promise<void> {
    if (this.running) {
      throw new Error("EventManager is already running");
    }
    this.running = true;
    const onAbort = (): void => this.loopAbort.abort();
    signal?.addEventListener("abort", onAbort, { once: true });
    logger.info("EventManager started");

    try {
      while (!this.loopAbort.signal.aborted) {
        const item = await this.transport.receive(this.options.queueTimeoutMs, this.loopAbort.signal);
        if (!item) continue;
        this.dispatch(item);
      }
    } finally {
      signal?.removeEventListener("abort", onAbort);
      this.closeConnections();
      this.transport.close();
      this.running = false;
      logger.info("EventManager terminated.");
    }
  }

  /**
   * Routes one message. `connectionId` names the connection it arrived on;
   * omit it for messages the router originates itself.
   */
  route(message: Message, connectionId?: string): RouteOutcome {
    const connection = connectionId ? this.connections.get(connectionId) : undefined;

    if (message.destination === ROUTER_ID) {
      this.handleControl(message, connection);
      return "control";
    }

    if (connection && !this.isCurrent(connection)) {
      logger.warn(`Dropping '${message.type}' from unregistered sender '${message.sender}'`);
      this.notifyFailure(message, "sender-not-registered", connection.endpoint);
      return "rejected";
    }

    if (message.destination === BROADCAST_ID) {
      this.broadcast(message);
      return "broadcast";
    }

    const state = this.registry.stateOf(message.destination);
    const endpoint = this.registry.endpointOf(message.destination);
    if (state === "active" && endpoint) {
      logger.debug(`Routing message from ${message.sender} to ${message.destination}`, { type: message.type });
      if (endpoint.deliver(message)) return "delivered";
    }

    logger.warn(`Destination '${message.destination}' not reachable for '${message.type}' from '${message.sender}'`, {
      state,
    });
    this.notifyFailure(message, UNDELIVERABLE_REASONS[state]);
    return "undeliverable";
  }

  registerModule(identity: string, endpoint: Endpoint): RegistrationResult {
    if (RESERVED_IDENTITIES.includes(identity)) {
      return this.rejectRegistration(identity, endpoint, "reserved");
    }
    if (this.shutdownPromise) {
      return this.rejectRegistration(identity, endpoint, "shutting-down");
    }

    const state = this.registry.stateOf(identity);
    if (state === "terminated") {
      return this.rejectRegistration(identity, endpoint, "terminated");
    }
    if (state !== "unregistered") {
      return this.rejectRegistration(identity, endpoint, "duplicate");
    }

    if (endpoint.closed) {
      logger.warn(`Registration of '${identity}' failed: endpoint already closed`);
      this.registry.transition(identity, "terminated");
      return { accepted: false, reason: "endpoint-closed" };
    }

    logger.info(`Registering new module: ${identity}`);
    this.registry.transition(identity, "registering", endpoint);
    this.registry.transition(identity, "active");
    endpoint.deliver(
      createMessage({ sender: ROUTER_ID, destination: identity, type: "Registered", payload: { identity } }),
    );
    return { accepted: true };
  }

  /**
   * Moves an Active or Stopping module to Terminated and drops its endpoint.
   * Returns false when there was nothing to deregister.
   */
  deregisterModule(identity: string, reason = "deregistered"): boolean {
    const state = this.registry.stateOf(identity);
    if (state !== "active" && state !== "stopping") {
      logger.warn(`Module '${identity}' not found for unregistration`, { state, reason });
      return false;
    }

    logger.info(`Unregistering module: ${identity}`, { reason });
    if (state === "active") {
      this.registry.transition(identity, "stopping");
    }
    this.registry.transition(identity, "terminated");
    return true;
  }

  /**
   * Asks every live module to stop, waits up to the grace period for
   * acknowledgements, force-terminates the rest and ends the dispatch loop.
   * Repeated calls share one shutdown.
   */
  broadcastShutdown(): Promise<ShutdownReport> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.performShutdown();
    }
    return this.shutdownPromise;
  }

  private async performShutdown(): Promise<ShutdownReport> {
    const startedAt = Date.now();
    // Forced terminations run inside the grace period, not after it.
    const waitBudget = Math.max(0, this.options.shutdownGraceMs - this.options.killWaitMs);
    const deadline = startedAt + waitBudget;
    logger.info("Shutdown signal received. Initiating termination...");

    for (const identity of this.registry.identitiesIn("active")) {
      this.registry.transition(identity, "stopping");
    }
    const targets = this.registry.identitiesIn("stopping");
    for (const identity of targets) {
      this.sendShutdown(identity);
    }

    const attempts = this.options.shutdownRetries + 1;
    const slice = Math.max(1, Math.floor(waitBudget / attempts));
    for (let attempt = 0; attempt < attempts; attempt++) {
      const pending = targets.filter((identity) => this.registry.stateOf(identity) !== "terminated");
      if (pending.length === 0) break;
      if (attempt > 0) {
        logger.warn("Re-sending shutdown to modules that have not acknowledged", { pending, attempt });
        for (const identity of pending) {
          this.sendShutdown(identity);
        }
      }
      const remaining = deadline - Date.now();
      if (remaining <= 0) break;
      await this.waitForTermination(pending, attempt === attempts - 1 ? remaining : Math.min(slice, remaining));
    }

    const forced = targets.filter((identity) => this.registry.stateOf(identity) !== "terminated");
    const killWaitMs = Math.min(this.options.killWaitMs, Math.max(0, startedAt + this.options.shutdownGraceMs - Date.now()));
    await Promise.all(forced.map((identity) => this.forceTerminate(identity, killWaitMs)));

    const report: ShutdownReport = {
      acknowledged: targets.filter((identity) => this.acknowledged.has(identity)),
      forced,
      durationMs: Date.now() - startedAt,
    };
    logger.info("Shutdown complete", { ...report });
    this.loopAbort.abort();
    return report;
  }

  private dispatch(item: TransportItem): void {
    try {
      this.route(item.message, item.connectionId ?? undefined);
    } catch (err) {
      logger.error("Error while routing message", {
        error: errorMessage(err),
        sender: item.message.sender,
        destination: item.message.destination,
        type: item.message.type,
      });
    }
    if (item.disconnect && item.connectionId) {
      this.releaseConnection(item.connectionId);
    }
  }

  private handleControl(message: Message, connection: Connection | undefined): void {
    switch (message.type) {
      case "Register": {
        if (!connection) {
          logger.warn(`Register for '${message.sender}' has no connection to deliver to`);
          return;
        }
        this.registerModule(message.sender, connection.endpoint);
        return;
      }
      case "Deregister": {
        if (connection && !this.isCurrent(connection)) {
          logger.debug(`Ignoring Deregister from stale connection of '${message.sender}'`);
          return;
        }
        const reason = typeof message.payload.reason === "string" ? message.payload.reason : "deregistered";
        this.deregisterModule(message.sender, reason);
        return;
      }
      case "ShutdownAck": {
        if (connection && !this.isCurrent(connection)) {
          logger.debug(`Ignoring ShutdownAck from stale connection of '${message.sender}'`);
          return;
        }
        logger.info(`Shutdown acknowledged by '${message.sender}'`);
        this.acknowledged.add(message.sender);
        this.deregisterModule(message.sender, "shutdown acknowledged");
        return;
      }
      case "Stop": {
        if (connection && !this.isCurrent(connection)) {
          logger.warn(`Ignoring Stop from unregistered sender '${message.sender}'`);
          this.notifyFailure(message, "sender-not-registered", connection.endpoint);
          return;
        }
        logger.info(`Stop command received from ${message.sender}. Initiating shutdown...`);
        this.broadcastShutdown().catch((err) => {
          logger.error("Shutdown failed", { error: errorMessage(err) });
        });
        return;
      }
      default:
        if (isControlType(message.type)) {
          logger.warn(`'${message.type}' is not accepted from modules; ignoring message from ${message.sender}`);
          return;
        }
        logger.info(`Command '${message.type}' received for EventManager from ${message.sender}`);
    }
  }

  private broadcast(message: Message): void {
    for (const identity of this.registry.identitiesIn("active")) {
      if (identity === message.sender) continue;
      const endpoint = this.registry.endpointOf(identity);
      if (!endpoint?.deliver(message)) {
        logger.warn(`Failed to broadcast '${message.type}' to '${identity}'`);
      }
    }
  }

  private rejectRegistration(identity: string, endpoint: Endpoint, reason: RegisterRejectedReason): RegistrationResult {
    logger.warn(`Module '${identity}' registration rejected`, { reason });
    const payload: RegisterRejectedPayload = { identity, reason };
    endpoint.deliver(createMessage({ sender: ROUTER_ID, destination: identity, type: "RegisterRejected", payload }));
    return { accepted: false, reason };
  }

  private notifyFailure(message: Message, reason: DeliveryFailureReason, via?: Endpoint): void {
    // Never answer a notice with a notice, and never notify ourselves.
    if (message.type === "DeliveryFailed" || message.sender === ROUTER_ID) return;
    const endpoint = via ?? this.registry.endpointOf(message.sender);
    if (!endpoint) return;
    const payload: DeliveryFailedPayload = {
      reason,
      messageId: message.id,
      type: message.type,
      destination: message.destination,
    };
    endpoint.deliver(createMessage({ sender: ROUTER_ID, destination: message.sender, type: "DeliveryFailed", payload }));
  }

  private sendShutdown(identity: string): void {
    const endpoint = this.registry.endpointOf(identity);
    const delivered = endpoint?.deliver(
      createMessage({ sender: ROUTER_ID, destination: identity, type: "Shutdown", payload: {} }),
    );
    if (!delivered) {
      logger.warn(`Could not deliver shutdown to '${identity}'`);
    }
  }

  private waitForTermination(identities: string[], timeoutMs: number): Promise<void> {
    const remaining = new Set(identities.filter((identity) => this.registry.stateOf(identity) !== "terminated"));
    if (remaining.size === 0) return Promise.resolve();

    return new Promise<void>((resolve) => {
      const finish = (): void => {
        clearTimeout(timer);
        unsubscribe();
        resolve();
      };
      const unsubscribe = this.onTransition((transition) => {
        if (transition.to !== "terminated") return;
        remaining.delete(transition.identity);
        if (remaining.size === 0) finish();
      });
      const timer = setTimeout(finish, timeoutMs);
    });
  }

  private async forceTerminate(identity: string, killWaitMs: number): Promise<void> {
    const connectionId = this.registry.endpointOf(identity)?.connectionId;
    const connection = connectionId ? this.connections.get(connectionId) : undefined;
    logger.warn(`Module '${identity}' did not acknowledge shutdown; forcing termination`);

    if (connection?.unit) {
      try {
        await withTimeout(connection.unit.terminate("shutdown grace period expired"), killWaitMs, undefined);
      } catch (err) {
        logger.error(`Failed to terminate '${identity}'`, { error: errorMessage(err) });
      }
    }
    connection?.link.close("terminated");
    if (this.registry.stateOf(identity) === "stopping") {
      this.deregisterModule(identity, "forced");
    }
  }

  private isCurrent(connection: Connection): boolean {
    return this.registry.endpointOf(connection.identity)?.connectionId === connection.id;
  }

  private releaseConnection(connectionId: string): void {
    const connection = this.connections.get(connectionId);
    if (!connection) return;
    for (const unsubscribe of connection.unsubscribe) unsubscribe();
    this.connections.delete(connectionId);
  }

  private closeConnections(): void {
    for (const connection of Array.from(this.connections.values())) {
      connection.link.close("router stopped");
      this.releaseConnection(connection.id);
    }
  }
}
