import type { Config } from "../config.js";
import { ParseConfigError } from "../core/errors.js";
import type { Observer } from "../core/observer.js";
import { databaseStoreFactory } from "./database.js";
import type { Store, StoreFactory } from "./types.js";

/**
 * Maps the configured store type to the factory that builds it.
 */
export class StoreRegistry {
  private readonly factories = new Map<string, StoreFactory>();

  register(type: string, factory: StoreFactory): this {
    this.factories.set(type, factory);
    return this;
  }

  has(type: string): boolean {
    return this.factories.has(type);
  }

  types(): string[] {
    return [...this.factories.keys()].sort();
  }

  createStore(config: Config, observer: Observer): Store {
    const type = config.store?.trim();
    if (!type) {
      throw new ParseConfigError("Store is not configured");
    }
    const factory = this.factories.get(type);
    if (!factory) {
      const known = this.types();
      const hint = known.length > 0 ? ` (known: ${known.join(", ")})` : "";
      throw new ParseConfigError(`Unknown store type: ${type}${hint}`);
    }
    return factory(config, observer);
  }
}

export function defaultRegistry(): StoreRegistry {
  return new StoreRegistry().register("database", databaseStoreFactory);
}
