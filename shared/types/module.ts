/**
 * Lifecycle states tracked by the router for every module identity.
 * Transitions only move forward; "terminated" is absorbing.
 */

export type ModuleState = "unregistered" | "registering" | "active" | "stopping" | "terminated";

export interface StateTransition {
  identity: string;
  from: ModuleState;
  to: ModuleState;
  at: string;
}

export interface ModuleSnapshot {
  identity: string;
  state: ModuleState;
  connectionId: string | null;
  registeredAt: string | null;
  updatedAt: string;
}

export type IsolationMode = "process" | "in-process";

export interface ModuleDefinition {
  key: string;
  identity: string;
  kind: string;
  params: Record<string, unknown>;
}

export interface ModuleRuntimeOptions {
  queueTimeoutMs: number;
  registrationTimeoutMs: number;
  drainTimeoutMs: number;
  loggerIdentity: string;
}

export type PumpOutcome =
  | { status: "idle" }
  | { status: "running" }
  | { status: "stopped" }
  | { status: "failed"; error: string };

export type ModuleExit =
  | { status: "stopped"; reason: "shutdown" | "local" | "aborted" }
  | { status: "failed"; error: string };
