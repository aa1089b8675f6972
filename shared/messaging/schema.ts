import { z } from "zod";
import { v4 as uuidv4 } from "uuid";
import type { Message, Payload } from "../types/message.js";

export const messageSchema = z.object({
  id: z.string().min(1).optional(),
  sender: z.string().min(1),
  destination: z.string().min(1),
  type: z.string().min(1),
  payload: z.record(z.unknown()).optional(),
  timestamp: z.string().optional(),
});

function freeze<P extends Payload>(message: Message<P>): Message<P> {
  Object.freeze(message.payload);
  return Object.freeze(message);
}

export function createMessage(params: {
  sender: string;
  destination: string;
  type: string;
  payload?: Payload;
}): Message {
  const payload: Payload = { ...(params.payload ?? {}) };
  return freeze({
    id: uuidv4(),
    sender: params.sender,
    destination: params.destination,
    type: params.type,
    payload,
    timestamp: new Date().toISOString(),
  });
}

/**
 * Validates a frame read from a link. Missing id/timestamp are filled in.
 * Returns null for anything that is not an envelope.
 */
export function parseMessage(frame: unknown): Message | null {
  const result = messageSchema.safeParse(frame);
  if (!result.success) return null;
  const wire = result.data;
  return freeze({
    id: wire.id ?? uuidv4(),
    sender: wire.sender,
    destination: wire.destination,
    type: wire.type,
    payload: { ...(wire.payload ?? {}) },
    timestamp: wire.timestamp ?? new Date().toISOString(),
  });
}

/**
 * Copy of `message` with the sender replaced. Returns the same instance when
 * the sender already matches.
 */
export function restamp(message: Message, sender: string): Message {
  if (message.sender === sender) return message;
  return freeze({ ...message, sender, payload: { ...message.payload } });
}
