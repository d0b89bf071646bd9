export {
  migrate,
  up,
  down,
  rollback,
  reset,
  migrateUntilJustBefore,
  pendingList,
  init,
  create,
  destroy
} from "./core/commands.js";
export type { CommandOptions, ResetOutcome } from "./core/commands.js";
export { migrateUp, migrateDown } from "./core/executor.js";
export type { UpOutcome, DownOutcome } from "./core/executor.js";
export { run } from "./core/run.js";
export { uncompleted, selectUp, selectDown, selectRollback, selectReset } from "./core/sequencer.js";
export { migrationName } from "./core/migration.js";
export type { Migration, MigrationId } from "./core/migration.js";
export { createObserver } from "./core/observer.js";
export type { Observer } from "./core/observer.js";
export {
  ExitCode,
  TidemarkError,
  SqlError,
  BatchStatementError,
  ParseConfigError,
  MissingFileError,
  ConnectionError
} from "./core/errors.js";
export { resolveConfig } from "./config.js";
export type { Config, DriverName } from "./config.js";
export { StoreRegistry, defaultRegistry } from "./store/registry.js";
export type { Store, StoreFactory } from "./store/types.js";
export { DatabaseStore, databaseStoreFactory } from "./store/database.js";
export type { SqlAction } from "./store/database.js";
export { MemoryStore, memoryStoreFactory } from "./store/memory.js";
export type { CodeAction, CodeMigration } from "./store/memory.js";
export { logger, silentLogger } from "./utils/logger.js";
export type { Logger } from "./utils/logger.js";
export { jsonEventSink } from "./utils/events.js";
export type { EventRecord, EventSink } from "./utils/events.js";
