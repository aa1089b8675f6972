import { z } from "zod";
import type { Message } from "../../shared/types/message.js";
import type { ModuleRuntimeOptions } from "../../shared/types/module.js";
import { BaseModule } from "../base-module.js";
import type { Communicator } from "../communicator/index.js";

const paramsSchema = z.object({
  /** 0 disables the heartbeat. */
  heartbeatMs: z.number().int().min(0).default(0),
});

/**
 * Liveness probe: answers Ping with Pong and optionally logs a heartbeat.
 */
export class PingModule extends BaseModule {
  private readonly heartbeatMs: number;
  private lastHeartbeat = 0;
  private beats = 0;

  constructor(
    identity: string,
    communicator: Communicator,
    params: Record<string, unknown>,
    options: Partial<ModuleRuntimeOptions> = {},
  ) {
    super(identity, communicator, options);
    this.heartbeatMs = paramsSchema.parse(params).heartbeatMs;
  }

  async onStart(): Promise<void> {
    await super.onStart();
    this.lastHeartbeat = Date.now();
  }

  async handleMessage(message: Message): Promise<void> {
    if (message.type !== "Ping") {
      await super.handleMessage(message);
      return;
    }
    this.sendMessage(message.sender, "Pong", { ...message.payload });
  }

  protected async tick(): Promise<void> {
    if (this.heartbeatMs === 0) return;
    const now = Date.now();
    if (now - this.lastHeartbeat < this.heartbeatMs) return;
    this.lastHeartbeat = now;
    this.beats++;
    this.log("DEBUG", `heartbeat #${this.beats}`);
  }
}
