import type { MigrationId } from "../core/migration.js";

export interface DriverOptions {
  url: string;
  table: string;
  schema?: string;
  connectTimeoutMs?: number;
}

/**
 * One session against the target database. Owns the completed-ids table.
 */
export interface DriverConnection {
  ensureMigrationsTable(): Promise<void>;
  fetchCompletedIds(): Promise<MigrationId[]>;
  markCompleted(input: { id: MigrationId; name: string }): Promise<void>;
  markReverted(id: MigrationId): Promise<void>;
  beginTransaction(): Promise<void>;
  commitTransaction(): Promise<void>;
  rollbackTransaction(): Promise<void>;
  runStatement(sql: string): Promise<void>;
  dispose(): Promise<void>;
}

export interface Driver {
  connect(): Promise<DriverConnection>;
  close(): Promise<void>;
  supportsTransactionalDDL: boolean;
  mapError(error: unknown): Error;
}
