import { MissingFileError, ParseConfigError, errorMessage } from "../core/errors.js";
import { nextMigrationId } from "../core/files.js";
import { migrationName, type Migration, type MigrationId } from "../core/migration.js";
import type { Observer } from "../core/observer.js";
import type { StoreFactory, Store } from "./types.js";

export type CodeAction = () => void | Promise<void>;

export type CodeMigration = Migration<CodeAction>;

const noop: CodeAction = () => undefined;

/**
 * Migrations defined in code, with the completed ids kept in `ledger`.
 * Handy for tests and for embedding the engine in another program.
 */
export class MemoryStore implements Store<CodeAction> {
  constructor(
    private readonly definitions: CodeMigration[],
    private readonly ledger: Set<MigrationId>,
    private readonly observer: Observer
  ) {}

  async connect(): Promise<void> {}

  async disconnect(): Promise<void> {}

  async migrations(): Promise<CodeMigration[]> {
    return [...this.definitions];
  }

  async completedIds(): Promise<MigrationId[]> {
    return [...this.ledger];
  }

  async applyUp(migration: CodeMigration): Promise<boolean> {
    try {
      await migration.up();
    } catch (error) {
      this.observer.logger.error(`Failed UP ${migrationName(migration)}: ${errorMessage(error)}`);
      return false;
    }
    this.ledger.add(migration.id);
    return true;
  }

  async applyDown(migration: CodeMigration): Promise<void> {
    await migration.down();
    this.ledger.delete(migration.id);
  }

  async init(): Promise<void> {
    this.observer.logger.note("Memory store needs no initialisation");
  }

  async create(name?: string): Promise<string[]> {
    if (!name) {
      throw new ParseConfigError("A migration name is required");
    }
    const id = nextMigrationId(this.definitions.map(definition => definition.id));
    const migration: CodeMigration = { id, name, up: noop, down: noop };
    this.definitions.push(migration);
    return [migrationName(migration)];
  }

  async destroy(name?: string): Promise<string[]> {
    if (!name) {
      throw new ParseConfigError("A migration name is required");
    }
    const removed: string[] = [];
    for (let i = this.definitions.length - 1; i >= 0; i--) {
      const migration = this.definitions[i];
      if (migration && migration.name === name) {
        this.definitions.splice(i, 1);
        removed.unshift(migrationName(migration));
      }
    }
    if (removed.length === 0) {
      throw new MissingFileError([name]);
    }
    return removed;
  }
}

export function memoryStoreFactory(definitions: CodeMigration[], ledger: Set<MigrationId> = new Set()): StoreFactory {
  return (_config, observer) => new MemoryStore(definitions, ledger, observer);
}
