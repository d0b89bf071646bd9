import { readdirSync, writeFileSync } from "node:fs";
import { join, basename } from "node:path";
import type { MigrationId } from "./migration.js";

const MIGRATION_FILE = /^(\d+)-(.+)\.sql$/;

export interface MigrationFileRef {
  id: MigrationId;
  name: string;
  filepath: string;
}

/**
 * `<id>-<name>.sql` → id and name; anything else is not a migration file.
 */
export function parseMigrationFilename(filePath: string): { id: MigrationId; name: string } | undefined {
  const match = basename(filePath).match(MIGRATION_FILE);
  if (!match || match[1] === undefined || match[2] === undefined) return undefined;
  return { id: BigInt(match[1]), name: match[2] };
}

/**
 * Migration files in `dir`, sorted by file name. Throws ENOENT when the
 * directory does not exist.
 */
export function listMigrationFiles(dir: string): MigrationFileRef[] {
  const refs: MigrationFileRef[] = [];
  const entries = readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && entry.name.endsWith(".sql"))
    .map((entry) => entry.name)
    .sort((a, b) => a.localeCompare(b));

  for (const file of entries) {
    const parsed = parseMigrationFilename(file);
    if (parsed) {
      refs.push({ ...parsed, filepath: join(dir, file) });
    }
  }
  return refs;
}

/**
 * UTC timestamp id, `YYYYMMDDHHMMSS`.
 */
export function timestampId(date: Date = new Date()): MigrationId {
  return BigInt(date.toISOString().replace(/[-:TZ.]/g, "").slice(0, 14));
}

/**
 * Timestamp id for a new migration, moved past every id in `existing` so two
 * migrations created in the same second still get distinct, ordered ids.
 */
export function nextMigrationId(existing: Iterable<MigrationId>, date: Date = new Date()): MigrationId {
  let id = timestampId(date);
  for (const taken of existing) {
    if (taken >= id) id = taken + 1n;
  }
  return id;
}

export function migrationFilename(dir: string, name: string, id: MigrationId): string {
  return join(dir, `${id}-${name}.sql`);
}

export const SQL_TEMPLATE = `-- +tidemark Up
-- write your up migration here

-- +tidemark Down
-- write your down migration here
`;

export function writeSqlTemplate(filePath: string): void {
  writeFileSync(filePath, SQL_TEMPLATE, { encoding: "utf8", flag: "wx" });
}
