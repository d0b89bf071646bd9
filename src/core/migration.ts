export type MigrationId = bigint;

/**
 * One reversible schema step. `A` is whatever the owning store knows how to
 * execute: SQL statements, functions, ...
 */
export interface Migration<A = unknown> {
  readonly id: MigrationId;
  readonly name: string;
  readonly up: A;
  readonly down: A;
}

/**
 * Display form used in logs and reports: `<id>-<name>`.
 */
export function migrationName(migration: Pick<Migration, "id" | "name">): string {
  return `${migration.id}-${migration.name}`;
}

export function compareIds(a: MigrationId, b: MigrationId): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function formatIds(migrations: ReadonlyArray<Pick<Migration, "id">>): string {
  return `[${migrations.map(m => m.id.toString()).join(" ")}]`;
}
