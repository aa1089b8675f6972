import { mkdir, open, type FileHandle } from "fs/promises";
import { dirname, resolve } from "path";
import { z } from "zod";
import { LOG_MESSAGE_TYPE, type Message } from "../../shared/types/message.js";
import type { ModuleRuntimeOptions } from "../../shared/types/module.js";
import { errorMessage } from "../../shared/utils/index.js";
import { BaseModule } from "../base-module.js";
import type { Communicator } from "../communicator/index.js";

const paramsSchema = z.object({
  destination: z
    .union([z.enum(["stdout", "file"]), z.array(z.enum(["stdout", "file"]))])
    .default("stdout")
    .transform((value) => (Array.isArray(value) ? value : [value])),
  path: z.string().min(1).default("logs/modules.jsonl"),
});

export type LoggerDestination = "stdout" | "file";

export interface LogRecord {
  timestamp: string;
  sender: string;
  level: string;
  message: string;
}

/**
 * Collects LogMessage traffic from every module and writes it to stdout
 * and/or a JSONL file. Never acknowledges.
 */
export class LoggerModule extends BaseModule {
  private destinations: LoggerDestination[];
  private readonly filePath: string;
  private file: FileHandle | null = null;

  constructor(
    identity: string,
    communicator: Communicator,
    params: Record<string, unknown>,
    options: Partial<ModuleRuntimeOptions> = {},
  ) {
    super(identity, communicator, options);
    const parsed = paramsSchema.parse(params);
    this.destinations = parsed.destination;
    this.filePath = resolve(process.cwd(), parsed.path);
  }

  get activeDestinations(): readonly LoggerDestination[] {
    return this.destinations;
  }

  async onStart(): Promise<void> {
    await super.onStart();
    if (!this.destinations.includes("file")) return;

    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      this.file = await open(this.filePath, "a");
    } catch (err) {
      this.logger.error("Could not open log file. Reverting to stdout.", { error: errorMessage(err) });
      this.destinations = this.destinations.filter((d) => d !== "file");
      if (!this.destinations.includes("stdout")) this.destinations.push("stdout");
    }
  }

  async handleMessage(message: Message): Promise<void> {
    if (message.type !== LOG_MESSAGE_TYPE) {
      this.logger.debug(`Received event '${message.type}' from '${message.sender}'`);
      return;
    }

    const record: LogRecord = {
      timestamp: message.timestamp,
      sender: message.sender,
      level: typeof message.payload.level === "string" ? message.payload.level : "INFO",
      message: typeof message.payload.message === "string" ? message.payload.message : "No message provided.",
    };

    if (this.destinations.includes("stdout")) {
      process.stdout.write(formatRecord(record) + "\n");
    }
    if (this.file) {
      await this.file.appendFile(JSON.stringify(record) + "\n");
    }
  }

  async onStop(): Promise<void> {
    if (this.file) {
      this.logger.info("Closing log file.");
      await this.file.close();
      this.file = null;
    }
  }
}

export function formatRecord(record: LogRecord): string {
  return `[${record.timestamp}] [${record.sender}] (${record.level}): ${record.message}`;
}
