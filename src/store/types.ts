import type { Config } from "../config.js";
import type { Migration, MigrationId } from "../core/migration.js";
import type { Observer } from "../core/observer.js";

/**
 * Persistence and execution primitives the engine drives. `connect` and
 * `disconnect` bracket one command invocation; `disconnect` must tolerate a
 * store that never connected.
 */
export interface Store<A = unknown> {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  migrations(): Promise<Migration<A>[]>;
  completedIds(): Promise<MigrationId[]>;
  /**
   * Run the up action and record the id as completed. Resolves `false` when
   * the migration itself failed and nothing was recorded; throws when the
   * store can no longer be used.
   */
  applyUp(migration: Migration<A>): Promise<boolean>;
  /** Run the down action and remove the id from the completed record. */
  applyDown(migration: Migration<A>): Promise<void>;
  init(): Promise<void>;
  create(name?: string): Promise<string[]>;
  destroy(name?: string): Promise<string[]>;
}

export type StoreFactory = (config: Config, observer: Observer) => Store;
