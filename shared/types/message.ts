/**
 * Message envelope exchanged between modules and the router.
 * The router reads the envelope only; payloads stay opaque.
 */

export const ROUTER_ID = "EventManager";
export const BROADCAST_ID = "All";

export const RESERVED_IDENTITIES: readonly string[] = [ROUTER_ID, BROADCAST_ID];

export type ControlMessageType =
  | "Register"
  | "Registered"
  | "RegisterRejected"
  | "Deregister"
  | "Shutdown"
  | "ShutdownAck"
  | "Stop"
  | "DeliveryFailed";

export const CONTROL_MESSAGE_TYPES: readonly ControlMessageType[] = [
  "Register",
  "Registered",
  "RegisterRejected",
  "Deregister",
  "Shutdown",
  "ShutdownAck",
  "Stop",
  "DeliveryFailed",
];

export const LOG_MESSAGE_TYPE = "LogMessage";

export type Payload = Record<string, unknown>;

export interface Message<P extends Payload = Payload> {
  readonly id: string;
  readonly sender: string;
  readonly destination: string;
  readonly type: string;
  readonly payload: Readonly<P>;
  readonly timestamp: string;
}

export type DeliveryFailureReason =
  | "unknown-destination"
  | "destination-terminated"
  | "destination-stopping"
  | "endpoint-closed"
  | "sender-not-registered";

export interface DeliveryFailedPayload extends Payload {
  reason: DeliveryFailureReason;
  messageId: string;
  type: string;
  destination: string;
}

export type RegisterRejectedReason = "duplicate" | "terminated" | "reserved" | "shutting-down";

export interface RegisterRejectedPayload extends Payload {
  identity: string;
  reason: RegisterRejectedReason;
}

export type LogMessageLevel = "DEBUG" | "INFO" | "WARNING" | "ERROR";

export interface LogMessagePayload extends Payload {
  level: LogMessageLevel;
  message: string;
}

export function isControlType(type: string): type is ControlMessageType {
  return CONTROL_MESSAGE_TYPES.some((candidate) => candidate === type);
}
