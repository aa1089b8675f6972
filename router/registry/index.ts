import type { Message } from "../../shared/types/message.js";
import type { ModuleSnapshot, ModuleState, StateTransition } from "../../shared/types/module.js";

/**
 * Router-side handle on a module's inbound channel.
 */
export interface Endpoint {
  readonly connectionId: string;
  readonly closed: boolean;
  deliver(message: Message): boolean;
}

interface RegistryEntry {
  identity: string;
  state: ModuleState;
  endpoint: Endpoint | null;
  registeredAt: string | null;
  updatedAt: string;
}

const ALLOWED_TRANSITIONS: Record<ModuleState, readonly ModuleState[]> = {
  unregistered: ["registering", "terminated"],
  registering: ["active"],
  active: ["stopping"],
  stopping: ["terminated"],
  terminated: [],
};

export class InvalidTransitionError extends Error {
  constructor(identity: string, from: ModuleState, to: ModuleState) {
    super(`Module '${identity}' cannot move from ${from} to ${to}`);
    this.name = "InvalidTransitionError";
  }
}

/**
 * Identity → state → endpoint table. Owned by the EventManager; every method
 * completes synchronously, so each call is one critical section on the
 * router's event loop.
 */
export class ModuleRegistry {
  private entries = new Map<string, RegistryEntry>();

  constructor(private onTransition?: (transition: StateTransition) => void) {}

  stateOf(identity: string): ModuleState {
    return this.entries.get(identity)?.state ?? "unregistered";
  }

  has(identity: string): boolean {
    return this.entries.has(identity);
  }

  /** Endpoint of a registering, active or stopping module; null otherwise. */
  endpointOf(identity: string): Endpoint | null {
    return this.entries.get(identity)?.endpoint ?? null;
  }

  transition(identity: string, to: ModuleState, endpoint?: Endpoint): StateTransition {
    const now = new Date().toISOString();
    const entry: RegistryEntry = this.entries.get(identity) ?? {
      identity,
      state: "unregistered",
      endpoint: null,
      registeredAt: null,
      updatedAt: now,
    };
    const from = entry.state;

    if (!ALLOWED_TRANSITIONS[from].includes(to)) {
      throw new InvalidTransitionError(identity, from, to);
    }

    entry.state = to;
    entry.updatedAt = now;
    if (to === "registering" && endpoint) {
      entry.endpoint = endpoint;
    }
    if (to === "active") {
      entry.registeredAt = now;
    }
    if (to === "terminated") {
      entry.endpoint = null;
    }
    this.entries.set(identity, entry);

    const transition: StateTransition = { identity, from, to, at: now };
    this.onTransition?.(transition);
    return transition;
  }

  identitiesIn(...states: ModuleState[]): string[] {
    return Array.from(this.entries.values())
      .filter((entry) => states.includes(entry.state))
      .map((entry) => entry.identity);
  }

  list(): ModuleSnapshot[] {
    return Array.from(this.entries.values()).map((entry) => ({
      identity: entry.identity,
      state: entry.state,
      connectionId: entry.endpoint?.connectionId ?? null,
      registeredAt: entry.registeredAt,
      updatedAt: entry.updatedAt,
    }));
  }

  get(identity: string): ModuleSnapshot | undefined {
    return this.list().find((entry) => entry.identity === identity);
  }
}
