import type { ModuleDefinition, ModuleRuntimeOptions } from "../shared/types/module.js";
import { ConfigError } from "../shared/config/index.js";
import type { BaseModule } from "./base-module.js";
import type { Communicator } from "./communicator/index.js";
import { LoggerModule } from "./logger/index.js";
import { PingModule } from "./ping/index.js";

export type ModuleFactory = (
  definition: ModuleDefinition,
  communicator: Communicator,
  options: ModuleRuntimeOptions,
) => BaseModule;

/**
 * Module kinds this build knows how to construct. Hardware drivers register
 * their own kinds on a catalog before handing it to the supervisor.
 */
export class ModuleCatalog {
  private factories = new Map<string, ModuleFactory>();

  register(kind: string, factory: ModuleFactory): this {
    if (this.factories.has(kind)) {
      throw new ConfigError(`Module kind '${kind}' is already registered`);
    }
    this.factories.set(kind, factory);
    return this;
  }

  has(kind: string): boolean {
    return this.factories.has(kind);
  }

  kinds(): string[] {
    return Array.from(this.factories.keys());
  }

  create(definition: ModuleDefinition, communicator: Communicator, options: ModuleRuntimeOptions): BaseModule {
    const factory = this.factories.get(definition.kind);
    if (!factory) {
      throw new ConfigError(`Unknown module kind '${definition.kind}' for '${definition.key}'`);
    }
    return factory(definition, communicator, options);
  }
}

export function createDefaultCatalog(): ModuleCatalog {
  return new ModuleCatalog()
    .register("logger", (d, communicator, options) => new LoggerModule(d.identity, communicator, d.params, options))
    .register("ping", (d, communicator, options) => new PingModule(d.identity, communicator, d.params, options));
}
