import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname, resolve as resolvePath } from "node:path";
import { fileURLToPath } from "node:url";
import initSqlJs, { type Database as SqlJsDatabase } from "sql.js";
import { ConnectionError, SqlError, TidemarkError } from "../core/errors.js";
import type { MigrationId } from "../core/migration.js";
import { inspectDriverError } from "./error-codes.js";
import type { Driver, DriverConnection } from "./types.js";

interface SqliteDriverOptions {
  url: string;
  table: string;
}

const ISO_TIMESTAMP_EXPR = "strftime('%Y-%m-%dT%H:%M:%fZ','now')";

const CONNECTION_CODES = new Set(["EACCES", "EPERM", "EISDIR", "ENOTDIR", "EROFS"]);

const CONNECTION_MESSAGES = /file is not a database|unable to open database|database is locked|database disk image is malformed/i;

function quoteIdentifier(identifier: string): string {
  return `"${identifier.replace(/"/g, '""')}"`;
}

export function resolveSqliteFilename(url?: string): { filename: string; isMemory: boolean } {
  if (!url) {
    return { filename: ":memory:", isMemory: true };
  }

  const trimmed = url.trim();
  if (!trimmed || trimmed === ":memory:" || trimmed === "sqlite::memory:" || trimmed === "sqlite::memory") {
    return { filename: ":memory:", isMemory: true };
  }

  if (trimmed.startsWith("sqlite://")) {
    try {
      return { filename: fileURLToPath(trimmed.replace(/^sqlite:/, "file:")), isMemory: false };
    } catch {
      // not an absolute file URL; handled as a path below
    }
  }

  if (trimmed.startsWith("file:")) {
    try {
      return { filename: fileURLToPath(trimmed), isMemory: false };
    } catch {
      // not an absolute file URL; handled as a path below
    }
  }

  if (trimmed.startsWith("sqlite:")) {
    const rest = trimmed.slice("sqlite:".length).replace(/^\/\//, "");
    if (!rest || rest === ":memory:" || rest === "memory") {
      return { filename: ":memory:", isMemory: true };
    }
    return { filename: resolvePath(process.cwd(), rest), isMemory: false };
  }

  return { filename: resolvePath(process.cwd(), trimmed), isMemory: false };
}

/** Ids are selected as text so values beyond 2^53 survive the trip through sql.js. */
function readId(value: unknown): MigrationId | undefined {
  if (typeof value === "string" && /^\d+$/.test(value)) return BigInt(value);
  if (typeof value === "bigint") return value;
  if (typeof value === "number" && Number.isSafeInteger(value)) return BigInt(value);
  return undefined;
}

let sqlJsPromise: ReturnType<typeof initSqlJs> | undefined;

async function loadSqlJs(): ReturnType<typeof initSqlJs> {
  if (!sqlJsPromise) {
    sqlJsPromise = initSqlJs().catch((error: unknown) => {
      sqlJsPromise = undefined;
      throw new ConnectionError("Failed to load the sql.js SQLite engine", { cause: error });
    });
  }
  return sqlJsPromise;
}

/**
 * SQLite through sql.js. The database file is loaded into memory on connect
 * and written back after every change made outside a transaction, on commit
 * and on dispose. One connection per file at a time.
 */
export function createSqliteDriver(options: SqliteDriverOptions): Driver {
  const { filename, isMemory } = resolveSqliteFilename(options.url);
  const quotedTable = quoteIdentifier(options.table);
  const ensureMigrationsSql =
    `CREATE TABLE IF NOT EXISTS ${quotedTable} (` +
    "id INTEGER PRIMARY KEY, " +
    "name TEXT NOT NULL, " +
    "applied_at TEXT NOT NULL" +
    ")";
  const selectCompletedSql = `SELECT CAST(id AS TEXT) AS completed_id FROM ${quotedTable} ORDER BY id ASC`;
  const insertCompletedSql =
    `INSERT OR IGNORE INTO ${quotedTable} (id, name, applied_at) VALUES (CAST(? AS INTEGER), ?, ${ISO_TIMESTAMP_EXPR})`;
  const deleteCompletedSql = `DELETE FROM ${quotedTable} WHERE id = CAST(? AS INTEGER)`;

  const mapError = (error: unknown): Error => {
    if (error instanceof TidemarkError) return error;
    const { message, codes } = inspectDriverError(error);
    if ([...codes].some(code => CONNECTION_CODES.has(code)) || CONNECTION_MESSAGES.test(message)) {
      return new ConnectionError(message, { cause: error });
    }
    return new SqlError(message, {}, { cause: error });
  };

  const openDatabase = async (): Promise<SqlJsDatabase> => {
    const SQL = await loadSqlJs();
    if (isMemory) return new SQL.Database();
    mkdirSync(dirname(filename), { recursive: true });
    return existsSync(filename) ? new SQL.Database(readFileSync(filename)) : new SQL.Database();
  };

  const createConnection = async (): Promise<DriverConnection> => {
    try {
      const db = await openDatabase();
      db.exec("PRAGMA foreign_keys = ON");

      let inTransaction = false;
      let dirty = !isMemory && !existsSync(filename);

      const persist = (): void => {
        if (isMemory || !dirty) return;
        writeFileSync(filename, Buffer.from(db.export()));
        // export() reopens the database, which resets pragmas
        db.exec("PRAGMA foreign_keys = ON");
        dirty = false;
      };

      const write = (sql: string, params?: string[]): void => {
        db.run(sql, params);
        dirty = true;
        if (!inTransaction) persist();
      };

      const connection: DriverConnection = {
        async ensureMigrationsTable(): Promise<void> {
          write(ensureMigrationsSql);
        },

        async fetchCompletedIds(): Promise<MigrationId[]> {
          const ids: MigrationId[] = [];
          for (const result of db.exec(selectCompletedSql)) {
            for (const row of result.values) {
              const id = readId(row[0]);
              if (id !== undefined) ids.push(id);
            }
          }
          return ids;
        },

        async markCompleted(input: { id: MigrationId; name: string }): Promise<void> {
          write(insertCompletedSql, [input.id.toString(), input.name]);
        },

        async markReverted(id: MigrationId): Promise<void> {
          write(deleteCompletedSql, [id.toString()]);
        },

        async beginTransaction(): Promise<void> {
          if (inTransaction) return;
          db.exec("BEGIN IMMEDIATE");
          inTransaction = true;
        },

        async commitTransaction(): Promise<void> {
          if (!inTransaction) return;
          db.exec("COMMIT");
          inTransaction = false;
          persist();
        },

        async rollbackTransaction(): Promise<void> {
          if (!inTransaction) return;
          db.exec("ROLLBACK");
          inTransaction = false;
        },

        async runStatement(sql: string): Promise<void> {
          db.exec(sql);
          dirty = true;
          if (!inTransaction) persist();
        },

        async dispose(): Promise<void> {
          try {
            if (inTransaction) {
              db.exec("ROLLBACK");
              inTransaction = false;
            }
            persist();
          } finally {
            db.close();
          }
        }
      };

      return connection;
    } catch (error) {
      throw mapError(error);
    }
  };

  const driver: Driver = {
    supportsTransactionalDDL: true,

    async connect(): Promise<DriverConnection> {
      return createConnection();
    },

    async close(): Promise<void> {
      // Connections are closed via DriverConnection.dispose()
    },

    mapError
  };

  return driver;
}
