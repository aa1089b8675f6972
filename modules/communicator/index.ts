import { BROADCAST_ID, type Message } from "../../shared/types/message.js";
import type { PumpOutcome } from "../../shared/types/module.js";
import { MessageQueue, parseMessage, restamp, type Link } from "../../shared/messaging/index.js";
import { createLogger, type Logger } from "../../shared/logger/index.js";
import { errorMessage, withTimeout } from "../../shared/utils/index.js";

export interface CommunicatorOptions {
  /** Bound on flushing queued outbound messages during close(). */
  drainTimeoutMs: number;
  /** How long the pump waits on the outbound queue between abort checks. */
  pollMs: number;
}

const DEFAULT_OPTIONS: CommunicatorOptions = {
  drainTimeoutMs: 500,
  pollMs: 100,
};

/**
 * A module's endpoint: an inbound queue read by the module's main loop and
 * an outbound queue drained onto the link by a separate pump task. The two
 * sides share nothing but these queues.
 */
export class Communicator {
  private readonly inbound = new MessageQueue<Message>();
  private readonly outbound = new MessageQueue<Message>();
  private readonly options: CommunicatorOptions;
  private readonly logger: Logger;
  private readonly pumpAbort = new AbortController();
  private unsubscribe: Array<() => void> = [];
  private pumpTask: Promise<void> | null = null;
  private outcome: PumpOutcome = { status: "idle" };
  private closing: Promise<void> | null = null;

  constructor(
    readonly identity: string,
    private link: Link,
    options: Partial<CommunicatorOptions> = {},
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.logger = createLogger(`communicator:${identity}`);
  }

  get pumpOutcome(): PumpOutcome {
    return this.outcome;
  }

  get closed(): boolean {
    return this.closing !== null;
  }

  /**
   * Starts the pump. Aborting `signal` stops it the same way close() does,
   * minus the drain.
   */
  start(signal?: AbortSignal): void {
    if (this.pumpTask) return;

    this.unsubscribe.push(
      this.link.onMessage((frame) => this.accept(frame)),
      this.link.onClose((reason) => {
        if (this.closing) return;
        this.fail(`link closed (${reason})`);
      }),
    );
    if (signal) {
      const onAbort = (): void => this.pumpAbort.abort();
      signal.addEventListener("abort", onAbort, { once: true });
      this.unsubscribe.push(() => signal.removeEventListener("abort", onAbort));
    }

    this.outcome = { status: "running" };
    this.pumpTask = this.pump().catch((err) => {
      this.fail(errorMessage(err));
    });
  }

  /**
   * Queues `message` for the router with the sender stamped to this
   * communicator's identity. Never blocks; returns false once closed.
   */
  send(message: Message): boolean {
    if (this.closing || this.outbound.closed) {
      this.logger.warn(`Dropping '${message.type}' to '${message.destination}': communicator closed`);
      return false;
    }
    return this.outbound.push(restamp(message, this.identity));
  }

  /** Next inbound message, or null after `timeoutMs` or once closed. */
  receive(timeoutMs: number, signal?: AbortSignal): Promise<Message | null> {
    return this.inbound.receive(timeoutMs, signal);
  }

  /**
   * Flushes pending outbound messages (bounded by drainTimeoutMs), then
   * releases both queues and the link. Safe to call more than once.
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.teardown();
    }
    return this.closing;
  }

  private async teardown(): Promise<void> {
    this.outbound.close();
    if (this.pumpTask) {
      await withTimeout(this.pumpTask, this.options.drainTimeoutMs, undefined);
    }
    this.pumpAbort.abort();

    // Anything the pump did not reach (aborted or timed out) gets one direct attempt.
    let discarded = 0;
    for (const message of this.outbound.drain()) {
      if (this.link.closed || !this.link.send(message)) discarded++;
    }
    if (discarded > 0) {
      this.logger.warn(`Discarded ${discarded} outbound message(s) on close`);
    }

    this.inbound.close();
    for (const unsubscribe of this.unsubscribe) unsubscribe();
    this.unsubscribe = [];
    this.link.close("module stopped");
    if (this.outcome.status !== "failed") {
      this.outcome = { status: "stopped" };
    }
  }

  private async pump(): Promise<void> {
    while (!this.pumpAbort.signal.aborted) {
      const message = await this.outbound.receive(this.options.pollMs, this.pumpAbort.signal);
      if (!message) {
        if (this.outbound.closed) return;
        continue;
      }
      if (!this.link.send(message)) {
        this.fail(`link refused '${message.type}'`);
        return;
      }
    }
  }

  private accept(frame: unknown): void {
    const message = parseMessage(frame);
    if (!message) {
      this.logger.warn("Dropping malformed inbound frame");
      return;
    }
    if (message.destination !== this.identity && message.destination !== BROADCAST_ID) {
      this.logger.warn(`Dropping '${message.type}' addressed to '${message.destination}'`);
      return;
    }
    this.inbound.push(message);
  }

  private fail(error: string): void {
    if (this.outcome.status === "failed") return;
    this.logger.error("Communication pump failed", { error });
    this.outcome = { status: "failed", error };
    this.pumpAbort.abort();
    this.inbound.close();
  }
}
