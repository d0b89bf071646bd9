import type { Config } from "../config.js";
import type { Logger } from "../utils/logger.js";
import type { EventSink } from "../utils/events.js";
import { compareIds, type MigrationId } from "./migration.js";
import { createObserver, type Observer } from "./observer.js";
import { run } from "./run.js";
import { migrateDown, migrateUp, type DownOutcome, type UpOutcome } from "./executor.js";
import { selectDown, selectReset, selectRollback, selectUp, uncompleted } from "./sequencer.js";
import { defaultRegistry, type StoreRegistry } from "../store/registry.js";
import type { Store } from "../store/types.js";

export interface CommandOptions {
  registry?: StoreRegistry;
  logger?: Logger;
  events?: EventSink;
  verbose?: boolean;
}

export interface ResetOutcome {
  down: DownOutcome;
  up: UpOutcome;
}

function prepare(config: Config, options: CommandOptions): { store: Store; observer: Observer } {
  const observer = createObserver(options);
  const registry = options.registry ?? defaultRegistry();
  return { store: registry.createStore(config, observer), observer };
}

/**
 * Bring up every migration that is not completed.
 */
export async function migrate(config: Config, options: CommandOptions = {}): Promise<UpOutcome> {
  const { store, observer } = prepare(config, options);
  return run(store, async s => migrateUp(s, await uncompleted(s), observer), observer);
}

/**
 * Bring up the migrations identified by `ids`. Completed ones are skipped.
 */
export async function up(config: Config, ids: MigrationId[], options: CommandOptions = {}): Promise<UpOutcome> {
  const { store, observer } = prepare(config, options);
  return run(store, async s => migrateUp(s, await selectUp(s, ids), observer), observer);
}

/**
 * Bring down the migrations identified by `ids`. Ones that are not completed
 * are skipped.
 */
export async function down(config: Config, ids: MigrationId[], options: CommandOptions = {}): Promise<DownOutcome> {
  const { store, observer } = prepare(config, options);
  return run(store, async s => migrateDown(s, await selectDown(s, ids), observer), observer);
}

/**
 * Revert the most recently completed migration.
 */
export async function rollback(config: Config, options: CommandOptions = {}): Promise<DownOutcome> {
  const { store, observer } = prepare(config, options);
  return run(store, async s => migrateDown(s, await selectRollback(s), observer), observer);
}

/**
 * Revert every completed migration, then bring everything up again.
 */
export async function reset(config: Config, options: CommandOptions = {}): Promise<ResetOutcome> {
  const { store, observer } = prepare(config, options);
  const downOutcome = await run(store, async s => migrateDown(s, await selectReset(s), observer), observer);
  const upOutcome = await migrate(config, options);
  return { down: downOutcome, up: upOutcome };
}

/**
 * Bring up every uncompleted migration whose id is below `targetId`. Useful
 * for loading fixture data right before the migration under test. Never
 * migrates down.
 */
export async function migrateUntilJustBefore(
  config: Config,
  targetId: MigrationId,
  options: CommandOptions = {}
): Promise<UpOutcome> {
  const { store, observer } = prepare(config, options);
  const ids = await run(
    store,
    async s => {
      const ordered = [...new Set((await uncompleted(s)).map(m => m.id))].sort(compareIds);
      const cut = ordered.findIndex(id => id >= targetId);
      return cut === -1 ? ordered : ordered.slice(0, cut);
    },
    observer
  );
  return up(config, ids, options);
}

/**
 * Human-readable list of the names of pending migrations.
 */
export async function pendingList(config: Config, options: CommandOptions = {}): Promise<string> {
  const { store, observer } = prepare(config, options);
  const names = await run(store, async s => (await uncompleted(s)).map(m => m.name), observer);
  return `You have ${names.length} pending migrations:\n${names.join("\n")}`;
}

/**
 * Bootstrap the data store.
 */
export async function init(config: Config, _name?: string, options: CommandOptions = {}): Promise<void> {
  const { store } = prepare(config, options);
  await store.init();
}

/**
 * Scaffold a new migration.
 */
export async function create(config: Config, name?: string, options: CommandOptions = {}): Promise<string[]> {
  const { store } = prepare(config, options);
  return store.create(name);
}

/**
 * Remove the migration called `name`.
 */
export async function destroy(config: Config, name?: string, options: CommandOptions = {}): Promise<string[]> {
  const { store } = prepare(config, options);
  return store.destroy(name);
}
