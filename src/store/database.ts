import { existsSync, mkdirSync, readFileSync, unlinkSync } from "node:fs";
import { resolve } from "node:path";
import { DEFAULT_DIR, type Config } from "../config.js";
import {
  BatchStatementError,
  ConnectionError,
  MissingFileError,
  ParseConfigError,
  SqlError,
  errorMessage
} from "../core/errors.js";
import {
  listMigrationFiles,
  migrationFilename,
  nextMigrationId,
  writeSqlTemplate,
  type MigrationFileRef
} from "../core/files.js";
import { migrationName, type Migration, type MigrationId } from "../core/migration.js";
import type { Observer } from "../core/observer.js";
import { createDriver } from "../driver/factory.js";
import type { Driver, DriverConnection } from "../driver/types.js";
import { parseMigrationSql, parseSqlScript, type SqlStatement } from "../parser/migration-sql.js";
import { previewSql } from "../utils/events.js";
import type { Store, StoreFactory } from "./types.js";

export interface SqlAction {
  statements: SqlStatement[];
  noTransaction: boolean;
  file: string;
}

export type DriverFactory = (config: Config) => Driver;

const DEFAULT_INIT_SCRIPT = "init.sql";

function isMissingPath(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Migrations are `<id>-<name>.sql` files in a directory; completed ids live
 * in a table reached through a {@link Driver}.
 */
export class DatabaseStore implements Store<SqlAction> {
  private driver: Driver | undefined;
  private connection: DriverConnection | undefined;
  private readonly dir: string;

  constructor(
    private readonly config: Config,
    private readonly observer: Observer,
    private readonly driverFactory: DriverFactory = createDriver
  ) {
    this.dir = config.dir || DEFAULT_DIR;
  }

  async connect(): Promise<void> {
    if (this.connection) return;
    const driver = this.driverFactory(this.config);
    this.driver = driver;
    try {
      this.connection = await driver.connect();
      await this.connection.ensureMigrationsTable();
    } catch (error) {
      throw driver.mapError(error);
    }
  }

  async disconnect(): Promise<void> {
    const { driver, connection } = this;
    this.connection = undefined;
    this.driver = undefined;
    if (!driver) return;
    try {
      if (connection) {
        await connection.dispose();
      }
    } catch (error) {
      throw driver.mapError(error);
    } finally {
      await driver.close();
    }
  }

  async migrations(): Promise<Migration<SqlAction>[]> {
    let refs: MigrationFileRef[];
    try {
      refs = listMigrationFiles(this.dir);
    } catch (error) {
      if (isMissingPath(error)) {
        return [];
      }
      throw error;
    }

    const initScript = this.initScriptPath();
    const seen = new Map<MigrationId, string>();
    const migrations: Migration<SqlAction>[] = [];

    for (const ref of refs) {
      if (initScript && resolve(ref.filepath) === initScript) continue;
      const previous = seen.get(ref.id);
      if (previous) {
        throw new ParseConfigError(`Duplicate migration id ${ref.id}: ${previous} and ${ref.filepath}`);
      }
      seen.set(ref.id, ref.filepath);

      const parsed = parseMigrationSql(readFileSync(ref.filepath, "utf8"));
      migrations.push({
        id: ref.id,
        name: ref.name,
        up: { statements: parsed.up, noTransaction: parsed.noTransaction, file: ref.filepath },
        down: { statements: parsed.down, noTransaction: parsed.noTransaction, file: ref.filepath }
      });
    }

    return migrations;
  }

  async completedIds(): Promise<MigrationId[]> {
    const { connection, driver } = this.requireConnection();
    try {
      return await connection.fetchCompletedIds();
    } catch (error) {
      throw driver.mapError(error);
    }
  }

  /**
   * A failing statement rolls the migration back and resolves `false`,
   * except for connection failures, which are thrown.
   */
  async applyUp(migration: Migration<SqlAction>): Promise<boolean> {
    const { connection, driver } = this.requireConnection();
    const label = migrationName(migration);
    const useTransaction = driver.supportsTransactionalDDL && !migration.up.noTransaction;

    if (useTransaction) await connection.beginTransaction();

    const failure = await this.runStatements(connection, migration.up);
    if (failure) {
      await this.rollbackQuietly(connection, useTransaction, label);
      const mapped = driver.mapError(failure.error);
      if (mapped instanceof ConnectionError) {
        throw mapped;
      }
      this.observer.logger.error(
        `Failed UP ${label}: ${mapped.message} (${migration.up.file}:${failure.statement.line})`
      );
      return false;
    }

    try {
      await connection.markCompleted({ id: migration.id, name: migration.name });
      if (useTransaction) await connection.commitTransaction();
    } catch (error) {
      await this.rollbackQuietly(connection, useTransaction, label);
      throw new BatchStatementError(`Failed to record ${label} as completed`, driver.mapError(error));
    }

    return true;
  }

  async applyDown(migration: Migration<SqlAction>): Promise<void> {
    const { connection, driver } = this.requireConnection();
    const label = migrationName(migration);
    const useTransaction = driver.supportsTransactionalDDL && !migration.down.noTransaction;

    if (useTransaction) await connection.beginTransaction();

    const failure = await this.runStatements(connection, migration.down);
    if (failure) {
      await this.rollbackQuietly(connection, useTransaction, label);
      const mapped = driver.mapError(failure.error);
      if (mapped instanceof ConnectionError) {
        throw mapped;
      }
      const total = migration.down.statements.length;
      const cause = new SqlError(
        `Failed DOWN ${label}: ${mapped.message}`,
        { sql: failure.statement.sql, file: migration.down.file, line: failure.statement.line },
        { cause: failure.error }
      );
      throw new BatchStatementError(`Failed DOWN ${label}: statement ${failure.index + 1} of ${total}`, cause);
    }

    try {
      await connection.markReverted(migration.id);
      if (useTransaction) await connection.commitTransaction();
    } catch (error) {
      await this.rollbackQuietly(connection, useTransaction, label);
      throw driver.mapError(error);
    }
  }

  /**
   * Create the completed-ids table and run the init script, if there is one,
   * on a connection of its own.
   */
  async init(): Promise<void> {
    const script = this.initScriptPath();
    if (this.config.initScript && (!script || !existsSync(script))) {
      throw new MissingFileError([this.config.initScript]);
    }

    const driver = this.driverFactory(this.config);
    let connection: DriverConnection | undefined;
    try {
      connection = await driver.connect();
      await connection.ensureMigrationsTable();

      if (script && existsSync(script)) {
        const action: SqlAction = {
          statements: parseSqlScript(readFileSync(script, "utf8")),
          noTransaction: false,
          file: script
        };
        const useTransaction = driver.supportsTransactionalDDL;
        if (useTransaction) await connection.beginTransaction();
        const failure = await this.runStatements(connection, action);
        if (failure) {
          await this.rollbackQuietly(connection, useTransaction, script);
          throw new SqlError(
            `Failed init script: ${driver.mapError(failure.error).message}`,
            { sql: failure.statement.sql, file: script, line: failure.statement.line },
            { cause: failure.error }
          );
        }
        if (useTransaction) await connection.commitTransaction();
        this.observer.logger.success(`Ran init script ${script}`);
      }
    } catch (error) {
      throw driver.mapError(error);
    } finally {
      if (connection) {
        await connection.dispose();
      }
      await driver.close();
    }
  }

  async create(name?: string): Promise<string[]> {
    const migrationName = this.requireName(name);
    mkdirSync(this.dir, { recursive: true });
    const existing = listMigrationFiles(this.dir).map(ref => ref.id);
    const file = migrationFilename(this.dir, migrationName, nextMigrationId(existing));
    writeSqlTemplate(file);
    this.observer.logger.success(`Created ${file}`);
    return [file];
  }

  async destroy(name?: string): Promise<string[]> {
    const migrationName = this.requireName(name);
    let refs: MigrationFileRef[] = [];
    try {
      refs = listMigrationFiles(this.dir).filter(ref => ref.name === migrationName);
    } catch (error) {
      if (!isMissingPath(error)) throw error;
    }
    if (refs.length === 0) {
      throw new MissingFileError([migrationName]);
    }
    for (const ref of refs) {
      unlinkSync(ref.filepath);
      this.observer.logger.info(`Deleted ${ref.filepath}`);
    }
    return refs.map(ref => ref.filepath);
  }

  private requireConnection(): { connection: DriverConnection; driver: Driver } {
    if (!this.connection || !this.driver) {
      throw new ConnectionError("Store is not connected");
    }
    return { connection: this.connection, driver: this.driver };
  }

  private requireName(name: string | undefined): string {
    const trimmed = name?.trim();
    if (!trimmed) {
      throw new ParseConfigError("A migration name is required");
    }
    if (/[\\/]/.test(trimmed)) {
      throw new ParseConfigError(`Invalid migration name: ${trimmed}`);
    }
    return trimmed;
  }

  private initScriptPath(): string | undefined {
    const configured = this.config.initScript;
    if (configured) {
      return resolve(this.dir, configured);
    }
    const fallback = resolve(this.dir, DEFAULT_INIT_SCRIPT);
    return existsSync(fallback) ? fallback : undefined;
  }

  private async runStatements(
    connection: DriverConnection,
    action: SqlAction
  ): Promise<{ statement: SqlStatement; index: number; error: unknown } | undefined> {
    const { logger } = this.observer;
    const total = action.statements.length;
    for (let index = 0; index < total; index++) {
      const statement = action.statements[index];
      if (!statement) continue;
      const start = Date.now();
      try {
        await connection.runStatement(statement.sql);
      } catch (error) {
        return { statement, index, error };
      }
      if (this.observer.verbose) {
        logger.info(`s${index + 1}/${total} (${Date.now() - start}ms): ${previewSql(statement.sql)}`);
      }
    }
    return undefined;
  }

  private async rollbackQuietly(connection: DriverConnection, inTransaction: boolean, label: string): Promise<void> {
    if (!inTransaction) return;
    try {
      await connection.rollbackTransaction();
    } catch (error) {
      this.observer.logger.warn(`Rollback failed for ${label}: ${errorMessage(error)}`);
    }
  }
}

export const databaseStoreFactory: StoreFactory = (config, observer) => new DatabaseStore(config, observer);
