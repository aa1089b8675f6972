import { EventEmitter } from "events";
import type { Message } from "../types/message.js";
import type { CloseHandler, FrameHandler, Link } from "./index.js";

/**
 * Link double for unit tests: records what is sent and lets the test push
 * arbitrary frames at the other end.
 */
export class FakeLink implements Link {
  readonly sent: Message[] = [];
  closeReason: string | null = null;
  refuseSends = false;
  private emitter = new EventEmitter();
  private _closed = false;

  get closed(): boolean {
    return this._closed;
  }

  send(message: Message): boolean {
    if (this._closed || this.refuseSends) return false;
    this.sent.push(message);
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
    this.closeReason = reason;
    this.emitter.emit("close", reason);
  }

  inject(frame: unknown): void {
    this.emitter.emit("message", frame);
  }
}
