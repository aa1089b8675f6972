import { describe, it, expect } from "vitest";
import { ConfigError, enabledModules, loadConfig, parseManifest, readWorkerEnv, runtimeOptionsFrom, workerEnv } from "./index.js";

describe("parseManifest", () => {
  it("fills system defaults", () => {
    const manifest = parseManifest({ modules: {} });

    expect(manifest.system).toEqual({
      queueTimeoutMs: 100,
      shutdownGraceMs: 5000,
      shutdownRetries: 1,
      registrationTimeoutMs: 3000,
      drainTimeoutMs: 500,
      loggerIdentity: "Logger",
      isolation: "process",
    });
  });

  it("lists only enabled modules and uses the key when no identity is given", () => {
    const manifest = parseManifest({
      modules: {
        logger: { enabled: true, identity: "Logger", kind: "logger" },
        ping: { enabled: true, kind: "ping", params: { heartbeatMs: 50 } },
        camera: { enabled: false, identity: "Camera", kind: "camera" },
      },
    });

    expect(enabledModules(manifest)).toEqual([
      { key: "logger", identity: "Logger", kind: "logger", params: {} },
      { key: "ping", identity: "ping", kind: "ping", params: { heartbeatMs: 50 } },
    ]);
  });

  it("rejects duplicate identities among enabled modules", () => {
    expect(() =>
      parseManifest({
        modules: {
          a: { enabled: true, identity: "Camera", kind: "ping" },
          b: { enabled: true, identity: "Camera", kind: "ping" },
        },
      }),
    ).toThrow("Modules 'a' and 'b' share identity 'Camera'");
  });

  it("rejects reserved identities", () => {
    expect(() => parseManifest({ modules: { router: { enabled: true, identity: "EventManager", kind: "ping" } } })).toThrow(
      ConfigError,
    );
  });

  it("reports schema problems with their path", () => {
    expect(() => parseManifest({ system: { shutdownGraceMs: -1 } })).toThrow(/system\.shutdownGraceMs/);
  });
});

describe("loadConfig", () => {
  it("reads the environment with defaults", () => {
    const config = loadConfig({ LOG_LEVEL: "DEBUG", ROUTER_API_PORT: "4200", ROUTER_API_ENABLED: "false" });

    expect(config.logLevel).toBe("debug");
    expect(config.logDir).toBeNull();
    expect(config.api).toEqual({ enabled: false, port: 4200, host: "localhost" });
    expect(config.modulesConfigPath.endsWith("config/modules.json")).toBe(true);
  });

  it("falls back to info for unknown levels", () => {
    expect(loadConfig({ LOG_LEVEL: "verbose" }).logLevel).toBe("info");
  });
});

describe("worker environment", () => {
  it("round-trips a module definition", () => {
    const runtime = runtimeOptionsFrom(parseManifest({}).system);
    const definition = { key: "ping", identity: "Ping", kind: "ping", params: { heartbeatMs: 10 } };

    expect(readWorkerEnv(workerEnv(definition, runtime))).toEqual({ definition, runtime });
  });

  it("fails when the definition is missing", () => {
    expect(() => readWorkerEnv({})).toThrow("MODULE_DEFINITION is not set");
  });
});
