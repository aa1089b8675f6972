import type { Serializable } from "child_process";
import { EventEmitter } from "events";
import type { Message } from "../types/message.js";
import type { CloseHandler, FrameHandler, Link } from "./index.js";
import { createLogger } from "../logger/index.js";
import { errorMessage } from "../utils/index.js";

const logger = createLogger("ipc-link");

/**
 * The parts of `ChildProcess` (router side) and `process` (module side)
 * that carry Node's IPC channel.
 */
export interface IpcPort {
  readonly connected: boolean;
  send?(message: Serializable, callback?: (error: Error | null) => void): boolean;
  disconnect?(): void;
  on(event: string, listener: (...args: never[]) => void): unknown;
  off(event: string, listener: (...args: never[]) => void): unknown;
}

export class IpcLink implements Link {
  private emitter = new EventEmitter();
  private _closed = false;
  private readonly onPortMessage = (frame: unknown): void => {
    this.emitter.emit("message", frame);
  };
  private readonly onPortDisconnect = (): void => {
    this.shutdown("disconnected");
  };
  private readonly onPortExit = (code: number | null, signal: string | null): void => {
    this.shutdown(signal ? `exited (${signal})` : `exited (${code ?? "unknown"})`);
  };

  constructor(
    private port: IpcPort,
    private label: string,
  ) {
    port.on("message", this.onPortMessage);
    port.on("disconnect", this.onPortDisconnect);
    port.on("exit", this.onPortExit);
  }

  get closed(): boolean {
    return this._closed;
  }

  send(message: Message): boolean {
    if (this._closed || !this.port.connected || !this.port.send) return false;
    try {
      // false only signals a backlog; the frame is still queued by Node.
      this.port.send(message, (error) => {
        if (error) {
          logger.warn(`IPC send failed on ${this.label}`, { error: error.message, type: message.type });
        }
      });
      return true;
    } catch (err) {
      logger.warn(`IPC channel unusable on ${this.label}`, { error: errorMessage(err) });
      this.shutdown("send failed");
      return false;
    }
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
    if (this.port.connected && this.port.disconnect) {
      this.port.disconnect();
    }
    this.shutdown(reason);
  }

  private shutdown(reason: string): void {
    if (this._closed) return;
    this._closed = true;
    this.port.off("message", this.onPortMessage);
    this.port.off("disconnect", this.onPortDisconnect);
    this.port.off("exit", this.onPortExit);
    this.emitter.emit("close", reason);
  }
}
