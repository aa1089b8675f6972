import { readFile } from "fs/promises";
import { resolve } from "path";
import { z } from "zod";
import { RESERVED_IDENTITIES } from "../types/message.js";
import type { ModuleDefinition, ModuleRuntimeOptions } from "../types/module.js";
import { isLogLevel, type LogLevel } from "../logger/index.js";
import { errorMessage } from "../utils/index.js";

export interface AppConfig {
  logLevel: LogLevel;
  logDir: string | null;
  modulesConfigPath: string;
  api: {
    enabled: boolean;
    port: number;
    host: string;
  };
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const level = env.LOG_LEVEL?.toLowerCase();
  return {
    logLevel: isLogLevel(level) ? level : "info",
    logDir: env.LOG_DIR ? resolve(process.cwd(), env.LOG_DIR) : null,
    modulesConfigPath: resolve(process.cwd(), env.MODULES_CONFIG ?? "config/modules.json"),
    api: {
      enabled: (env.ROUTER_API_ENABLED ?? "true").toLowerCase() !== "false",
      port: parseInt(env.ROUTER_API_PORT ?? "4100", 10),
      host: env.ROUTER_API_HOST ?? "localhost",
    },
  };
}

const systemSchema = z.object({
  queueTimeoutMs: z.number().int().positive().default(100),
  shutdownGraceMs: z.number().int().positive().default(5000),
  shutdownRetries: z.number().int().min(0).default(1),
  registrationTimeoutMs: z.number().int().positive().default(3000),
  drainTimeoutMs: z.number().int().min(0).default(500),
  loggerIdentity: z.string().min(1).default("Logger"),
  isolation: z.enum(["process", "in-process"]).default("process"),
});

const moduleEntrySchema = z.object({
  enabled: z.boolean().default(false),
  identity: z.string().min(1).optional(),
  kind: z.string().min(1),
  params: z.record(z.unknown()).default({}),
});

export const manifestSchema = z.object({
  system: systemSchema.default({}),
  modules: z.record(moduleEntrySchema).default({}),
});

export type SystemConfig = z.infer<typeof systemSchema>;
export type ModuleManifest = z.infer<typeof manifestSchema>;

/**
 * Validates a parsed manifest. Throws ConfigError with every issue listed.
 */
export function parseManifest(raw: unknown): ModuleManifest {
  const result = manifestSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
    throw new ConfigError(`Invalid module manifest: ${issues.join("; ")}`);
  }

  const seen = new Map<string, string>();
  for (const definition of enabledModules(result.data)) {
    if (RESERVED_IDENTITIES.includes(definition.identity)) {
      throw new ConfigError(`Module '${definition.key}' uses reserved identity '${definition.identity}'`);
    }
    const other = seen.get(definition.identity);
    if (other) {
      throw new ConfigError(`Modules '${other}' and '${definition.key}' share identity '${definition.identity}'`);
    }
    seen.set(definition.identity, definition.key);
  }

  return result.data;
}

export async function loadManifest(filePath: string): Promise<ModuleManifest> {
  let text: string;
  try {
    text = await readFile(filePath, "utf-8");
  } catch (err) {
    throw new ConfigError(`Cannot read module manifest '${filePath}': ${errorMessage(err)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Module manifest '${filePath}' is not valid JSON: ${errorMessage(err)}`);
  }

  return parseManifest(raw);
}

/**
 * Enabled modules with their resolved identities. The manifest key doubles
 * as the identity when none is given.
 */
export function enabledModules(manifest: ModuleManifest): ModuleDefinition[] {
  return Object.entries(manifest.modules)
    .filter(([, entry]) => entry.enabled)
    .map(([key, entry]) => ({
      key,
      identity: entry.identity ?? key,
      kind: entry.kind,
      params: entry.params,
    }));
}

export function runtimeOptionsFrom(system: SystemConfig): ModuleRuntimeOptions {
  return {
    queueTimeoutMs: system.queueTimeoutMs,
    registrationTimeoutMs: system.registrationTimeoutMs,
    drainTimeoutMs: system.drainTimeoutMs,
    loggerIdentity: system.loggerIdentity,
  };
}

const moduleDefinitionSchema = z.object({
  key: z.string().min(1),
  identity: z.string().min(1),
  kind: z.string().min(1),
  params: z.record(z.unknown()).default({}),
});

const runtimeOptionsSchema = z.object({
  queueTimeoutMs: z.number().int().positive(),
  registrationTimeoutMs: z.number().int().positive(),
  drainTimeoutMs: z.number().int().min(0),
  loggerIdentity: z.string().min(1),
});

export const MODULE_DEFINITION_ENV = "MODULE_DEFINITION";
export const MODULE_RUNTIME_ENV = "MODULE_RUNTIME";

/**
 * Environment handed to a module worker process.
 */
export function workerEnv(definition: ModuleDefinition, runtime: ModuleRuntimeOptions): Record<string, string> {
  return {
    [MODULE_DEFINITION_ENV]: JSON.stringify(definition),
    [MODULE_RUNTIME_ENV]: JSON.stringify(runtime),
  };
}

/**
 * Reads the module definition and runtime options a worker was started with.
 */
export function readWorkerEnv(env: NodeJS.ProcessEnv = process.env): {
  definition: ModuleDefinition;
  runtime: ModuleRuntimeOptions;
} {
  const parse = <T>(name: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T => {
    const text = env[name];
    if (!text) throw new ConfigError(`${name} is not set`);
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new ConfigError(`${name} is not valid JSON: ${errorMessage(err)}`);
    }
    const result = schema.safeParse(raw);
    if (!result.success) {
      throw new ConfigError(`${name} is invalid: ${result.error.issues.map((issue) => issue.message).join("; ")}`);
    }
    return result.data;
  };

  return {
    definition: parse(MODULE_DEFINITION_ENV, moduleDefinitionSchema),
    runtime: parse(MODULE_RUNTIME_ENV, runtimeOptionsSchema),
  };
}
