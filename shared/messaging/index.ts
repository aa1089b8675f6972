/**
 * Transport primitives shared by the router and the modules.
 * Queues are single-producer/single-consumer per direction; links carry
 * envelopes between an isolation unit and the router.
 */

import { EventEmitter } from "events";
import type { Message } from "../types/message.js";

export { createMessage, parseMessage, restamp } from "./schema.js";
export { IpcLink } from "./ipc-link.js";
export type { IpcPort } from "./ipc-link.js";

export class MessageQueue<T> {
  private items: T[] = [];
  private waiters: Array<(item: T | null) => void> = [];
  private _closed = false;

  get size(): number {
    return this.items.length;
  }

  get closed(): boolean {
    return this._closed;
  }

  push(item: T): boolean {
    if (this._closed) return false;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
    } else {
      this.items.push(item);
    }
    return true;
  }

  /**
   * Next item, or null once `timeoutMs` elapses, the signal aborts, or the
   * queue is closed and empty.
   */
  receive(timeoutMs: number, signal?: AbortSignal): Promise<T | null> {
    if (this.items.length > 0) {
      return Promise.resolve(this.items.shift() ?? null);
    }
    if (this._closed || timeoutMs <= 0 || signal?.aborted) {
      return Promise.resolve(null);
    }

    return new Promise<T | null>((resolve) => {
      const settle = (item: T | null): void => {
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        const idx = this.waiters.indexOf(settle);
        if (idx !== -1) this.waiters.splice(idx, 1);
        resolve(item);
      };
      const onAbort = (): void => settle(null);
      const timer = setTimeout(() => settle(null), timeoutMs);
      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiters.push(settle);
    });
  }

  drain(): T[] {
    const drained = this.items;
    this.items = [];
    return drained;
  }

  close(): void {
    if (this._closed) return;
    this._closed = true;
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter(null);
    }
  }
}

export type FrameHandler = (frame: unknown) => void;
export type CloseHandler = (reason: string) => void;

/**
 * One side of a bidirectional channel between a module and the router.
 */
export interface Link {
  readonly closed: boolean;
  send(message: Message): boolean;
  onMessage(handler: FrameHandler): () => void;
  onClose(handler: CloseHandler): () => void;
  close(reason?: string): void;
}

/**
 * In-memory link used when a module shares the router's process.
 * Frames are cloned and delivered on a later turn of the event loop,
 * in send order.
 */
export class EventEmitterLink implements Link {
  private emitter = new EventEmitter();
  private peer: EventEmitterLink | null = null;
  private _closed = false;

  static pair(): [EventEmitterLink, EventEmitterLink] {
    const a = new EventEmitterLink();
    const b = new EventEmitterLink();
    a.peer = b;
    b.peer = a;
    return [a, b];
  }

  get closed(): boolean {
    return this._closed;
  }

  send(message: Message): boolean {
    const peer = this.peer;
    if (this._closed || !peer || peer._closed) return false;
    const frame: unknown = structuredClone(message);
    setImmediate(() => peer.emitter.emit("message", frame));
    return true;
  }

  onMessage(handler: FrameHandler): () => void {
    this.emitter.on("message", handler);
    return () => this.emitter.off("message", handler);
  }

  onClose(handler: CloseHandler): () => void {
    this.emitter.on("close", handler);
    return () => this.emitter.off("close", handler);
  }

  close(reason = "closed"): void {
    if (this._closed) return;
    this._closed = true;
    // Frames sent before the close are still delivered ahead of the close
    // notification; setImmediate callbacks run in scheduling order.
    setImmediate(() => this.emitter.emit("close", reason));
    this.peer?.close(reason);
  }
}
