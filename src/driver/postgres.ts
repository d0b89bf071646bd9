import pg from "pg";
import type { Pool, PoolClient, PoolConfig } from "pg";
import { ConnectionError, ParseConfigError, SqlError, TidemarkError } from "../core/errors.js";
import type { MigrationId } from "../core/migration.js";
import { inspectDriverError } from "./error-codes.js";
import type { Driver, DriverOptions, DriverConnection } from "./types.js";

function quoteIdent(identifier: string): string {
  return `"${identifier.replace(/"/g, '""')}"`;
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
  "EAI_AGAIN",
  "ETIMEDOUT",
  "ENETUNREACH",
  "EHOSTUNREACH",
  "ECONNRESET",
  "ECONNABORTED",
  "EPIPE",
  "ERR_SOCKET_BAD_PORT",
  "57P01",
  "57P03",
  "08000",
  "08001",
  "08003",
  "08004",
  "08006"
]);

class PostgresConnection implements DriverConnection {
  constructor(
    private readonly client: PoolClient,
    private readonly table: string,
    private readonly schema?: string
  ) {}

  private qualifiedTable(): string {
    return qualifyTable(this.schema, this.table);
  }

  async ensureMigrationsTable(): Promise<void> {
    if (this.schema) {
      await this.client.query(`CREATE SCHEMA IF NOT EXISTS ${quoteIdent(this.schema)}`, []);
    }
    await this.client.query(
      `CREATE TABLE IF NOT EXISTS ${this.qualifiedTable()} (
        id          BIGINT PRIMARY KEY,
        name        TEXT NOT NULL,
        applied_at  TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )`,
      []
    );
  }

  async fetchCompletedIds(): Promise<MigrationId[]> {
    const result = await this.client.query<{ id: string | number }>(
      `SELECT id FROM ${this.qualifiedTable()} ORDER BY id ASC`,
      []
    );
    return result.rows.map(row => BigInt(row.id));
  }

  async markCompleted(input: { id: MigrationId; name: string }): Promise<void> {
    await this.client.query(
      `INSERT INTO ${this.qualifiedTable()} (id, name, applied_at)
       VALUES ($1, $2, NOW())
       ON CONFLICT (id) DO NOTHING`,
      [input.id.toString(), input.name]
    );
  }

  async markReverted(id: MigrationId): Promise<void> {
    await this.client.query(`DELETE FROM ${this.qualifiedTable()} WHERE id = $1`, [id.toString()]);
  }

  async beginTransaction(): Promise<void> {
    await this.client.query("BEGIN");
  }

  async commitTransaction(): Promise<void> {
    await this.client.query("COMMIT");
  }

  async rollbackTransaction(): Promise<void> {
    await this.client.query("ROLLBACK");
  }

  async runStatement(sql: string): Promise<void> {
    await this.client.query(sql);
  }

  async dispose(): Promise<void> {
    this.client.release();
  }
}

class PostgresDriver implements Driver {
  private readonly pool: Pool;
  readonly supportsTransactionalDDL = true;

  constructor(private readonly options: DriverOptions) {
    const poolConfig: PoolConfig = { connectionString: options.url };
    if (options.connectTimeoutMs) {
      poolConfig.connectionTimeoutMillis = options.connectTimeoutMs;
    }
    try {
      this.pool = new pg.Pool(poolConfig);
    } catch (error) {
      throw this.mapError(error);
    }
  }

  async connect(): Promise<DriverConnection> {
    try {
      const client = await this.pool.connect();
      return new PostgresConnection(client, this.options.table, this.options.schema);
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
    const lowerMessage = message.toLowerCase();

    const hasConnectionCode = [...codes].some(code => CONNECTION_CODES.has(code));

    const connectionByMessage =
      lowerMessage.includes("getaddrinfo") ||
      lowerMessage.includes("connection refused") ||
      lowerMessage.includes("could not connect to server") ||
      (lowerMessage.includes("timeout") && (lowerMessage.includes("connect") || lowerMessage.includes("connection"))) ||
      lowerMessage.includes("server closed the connection") ||
      lowerMessage.includes("connection terminated unexpectedly");

    if (hasConnectionCode || connectionByMessage) {
      return new ConnectionError(`Connection failed: ${message}`, { cause: error });
    }

    if (codes.has("28P01") || codes.has("28000")) {
      return new ConnectionError(`Authentication failed: ${message}`, { cause: error });
    }

    if (codes.has("3D000")) {
      return new ConnectionError(`Database error: ${message}`, { cause: error });
    }

    const parseConfigIndicators =
      error instanceof SyntaxError ||
      lowerMessage.includes("invalid url") ||
      lowerMessage.includes("invalid connection string");

    if (parseConfigIndicators) {
      return new ParseConfigError(`Invalid connection URL: ${message}`);
    }

    return new SqlError(message, {}, { cause: error });
  }
}

export function createPostgresDriver(options: DriverOptions): Driver {
  return new PostgresDriver(options);
}
