import { createPool, type Pool, type PoolConnection, type RowDataPacket } from "mysql2/promise";
import { ConnectionError, SqlError, TidemarkError } from "../core/errors.js";
import type { MigrationId } from "../core/migration.js";
import { inspectDriverError } from "./error-codes.js";
import type { Driver, DriverConnection, DriverOptions } from "./types.js";

function quoteIdent(identifier: string): string {
  return `\`${identifier.replace(/`/g, "``")}\``;
}

function qualifyTable(schema: string | undefined, table: string): string {
  const tableIdent = quoteIdent(table);
  if (!schema) {
    return tableIdent;
  }
  return `${quoteIdent(schema)}.${tableIdent}`;
}

const CONNECTION_CODES = new Set([
  "ECONNREFUSED",
  "ENOTFOUND",
  "ETIMEDOUT",
  "ECONNRESET",
  "PROTOCOL_CONNECTION_LOST",
  "ER_ACCESS_DENIED_ERROR",
  "ER_BAD_DB_ERROR"
]);

class MySqlConnection implements DriverConnection {
  constructor(
    private readonly connection: PoolConnection,
    private readonly table: string,
    private readonly schema?: string
  ) {}

  private qualifiedTable(): string {
    return qualifyTable(this.schema, this.table);
  }

  async ensureMigrationsTable(): Promise<void> {
    const sql = `CREATE TABLE IF NOT EXISTS ${this.qualifiedTable()} (
      id BIGINT PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at DATETIME(3) NOT NULL
    ) ENGINE=InnoDB`;
    await this.connection.execute(sql);
  }

  async fetchCompletedIds(): Promise<MigrationId[]> {
    const [rows] = await this.connection.execute<RowDataPacket[]>(
      `SELECT id FROM ${this.qualifiedTable()} ORDER BY id ASC`
    );
    const ids: MigrationId[] = [];
    for (const row of rows) {
      const id: unknown = row.id;
      if (typeof id === "string" || typeof id === "number" || typeof id === "bigint") {
        ids.push(BigInt(id));
      }
    }
    return ids;
  }

  async markCompleted(input: { id: MigrationId; name: string }): Promise<void> {
    const sql = `INSERT IGNORE INTO ${this.qualifiedTable()} (id, name, applied_at)
      VALUES (?, ?, CURRENT_TIMESTAMP(3))`;
    await this.connection.execute(sql, [input.id.toString(), input.name]);
  }

  async markReverted(id: MigrationId): Promise<void> {
    await this.connection.execute(`DELETE FROM ${this.qualifiedTable()} WHERE id = ?`, [id.toString()]);
  }

  async beginTransaction(): Promise<void> {
    await this.connection.beginTransaction();
  }

  async commitTransaction(): Promise<void> {
    await this.connection.commit();
  }

  async rollbackTransaction(): Promise<void> {
    await this.connection.rollback();
  }

  async runStatement(sql: string): Promise<void> {
    await this.connection.query(sql);
  }

  async dispose(): Promise<void> {
    this.connection.release();
  }
}

class MySqlDriver implements Driver {
  readonly supportsTransactionalDDL = false;
  private readonly pool: Pool;

  constructor(private readonly options: DriverOptions) {
    this.pool = createPool({
      uri: options.url,
      waitForConnections: true,
      multipleStatements: false,
      charset: "UTF8MB4",
      timezone: "Z",
      connectTimeout: options.connectTimeoutMs,
      supportBigNumbers: true,
      bigNumberStrings: true
    });
  }

  async connect(): Promise<DriverConnection> {
    try {
      const connection = await this.pool.getConnection();
      return new MySqlConnection(connection, this.options.table, this.options.schema);
    } catch (error) {
      throw this.mapError(error);
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  mapError(error: unknown): Error {
    if (error instanceof TidemarkError) {
      return error;
    }

    const { message, codes } = inspectDriverError(error);

    if ([...codes].some(code => CONNECTION_CODES.has(code))) {
      return new ConnectionError(message, { cause: error });
    }

    const lower = message.toLowerCase();
    if (lower.includes("access denied") || lower.includes("cannot connect")) {
      return new ConnectionError(message, { cause: error });
    }

    return new SqlError(message, {}, { cause: error });
  }
}

export function createMySqlDriver(options: DriverOptions): Driver {
  return new MySqlDriver(options);
}
