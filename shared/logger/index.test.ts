import { mkdtemp, readFile, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, describe, it, expect, vi } from "vitest";
import { configureLogging, createLogger, currentLoggingSettings, isLogLevel, resetLogging } from "./index.js";

describe("createLogger", () => {
  afterEach(() => {
    resetLogging();
    vi.restoreAllMocks();
  });

  it("filters below the configured level", () => {
    configureLogging({ level: "warn", dir: null });
    const stdout = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    const stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    const logger = createLogger("router");

    logger.info("hidden");
    logger.warn("careful", { n: 1 });

    expect(stdout).not.toHaveBeenCalled();
    expect(stderr).toHaveBeenCalledWith('[WARN] [router] careful {"n":1}\n');
  });

  it("writes info and debug to stdout", () => {
    configureLogging({ level: "debug", dir: null });
    const stdout = vi.spyOn(process.stdout, "write").mockImplementation(() => true);

    createLogger("ping").debug("beat");

    expect(stdout).toHaveBeenCalledWith("[DEBUG] [ping] beat\n");
  });

  it("appends JSON lines per scope when a directory is set", async () => {
    const dir = await mkdtemp(join(tmpdir(), "logger-"));
    configureLogging({ level: "info", dir });
    vi.spyOn(process.stdout, "write").mockImplementation(() => true);

    createLogger("supervisor").info("Starting module: Ping", { kind: "ping" });

    const lines = (await readFile(join(dir, "supervisor.jsonl"), "utf-8")).trim().split("\n");
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({
      level: "info",
      scope: "supervisor",
      message: "Starting module: Ping",
      meta: { kind: "ping" },
    });
    await rm(dir, { recursive: true, force: true });
  });
});

describe("logging settings", () => {
  afterEach(() => resetLogging());

  it("recognises level names", () => {
    expect(isLogLevel("warn")).toBe(true);
    expect(isLogLevel("WARNING")).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });

  it("lets overrides win over the environment", () => {
    configureLogging({ level: "debug" });
    expect(currentLoggingSettings().level).toBe("debug");

    resetLogging();
    expect(currentLoggingSettings().level).toBe("error");
  });
});
