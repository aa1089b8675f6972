import { appendFileSync, mkdirSync, existsSync } from "fs";
import { resolve } from "path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

export interface LoggingSettings {
  level: LogLevel;
  /** JSONL sink directory; no file output when null. */
  dir: string | null;
}

interface LogEntry {
  level: LogLevel;
  scope: string;
  message: string;
  meta?: Record<string, unknown>;
  timestamp: string;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let overrides: Partial<LoggingSettings> = {};
const preparedDirs = new Set<string>();

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && value in LEVEL_RANK;
}

export function configureLogging(settings: Partial<LoggingSettings>): void {
  overrides = { ...overrides, ...settings };
}

export function resetLogging(): void {
  overrides = {};
}

export function currentLoggingSettings(): LoggingSettings {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  const envDir = process.env.LOG_DIR;
  return {
    level: overrides.level ?? (isLogLevel(envLevel) ? envLevel : "info"),
    dir: overrides.dir !== undefined ? overrides.dir : envDir ? resolve(process.cwd(), envDir) : null,
  };
}

function ensureLogDir(dir: string): void {
  if (preparedDirs.has(dir)) return;
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  preparedDirs.add(dir);
}

function writeLine(filePath: string, data: unknown): void {
  appendFileSync(filePath, JSON.stringify(data) + "\n");
}

function formatMeta(meta?: Record<string, unknown>): string {
  if (!meta || Object.keys(meta).length === 0) return "";
  return ` ${JSON.stringify(meta)}`;
}

export function createLogger(scope: string): Logger {
  function log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    const settings = currentLoggingSettings();
    if (LEVEL_RANK[level] < LEVEL_RANK[settings.level]) return;

    const line = `[${level.toUpperCase()}] [${scope}] ${message}${formatMeta(meta)}\n`;
    if (level === "error" || level === "warn") {
      process.stderr.write(line);
    } else {
      process.stdout.write(line);
    }

    if (settings.dir) {
      const entry: LogEntry = {
        level,
        scope,
        message,
        meta,
        timestamp: new Date().toISOString(),
      };
      ensureLogDir(settings.dir);
      writeLine(resolve(settings.dir, `${scope}.jsonl`), entry);
    }
  }

  return {
    debug: (message, meta) => log("debug", message, meta),
    info: (message, meta) => log("info", message, meta),
    warn: (message, meta) => log("warn", message, meta),
    error: (message, meta) => log("error", message, meta),
  };
}
