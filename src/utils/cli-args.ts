import { ParseConfigError } from "../core/errors.js";
import type { MigrationId } from "../core/migration.js";

/**
 * Migration ids arrive as digit strings so that 14-digit timestamps survive
 * without passing through a float.
 */
export function parseMigrationId(raw: string | number): MigrationId {
  const value = String(raw).trim();
  if (!/^\d+$/.test(value)) {
    throw new ParseConfigError(`Invalid migration id: ${value}. Expected digits only.`);
  }
  return BigInt(value);
}

export function parseMigrationIds(raws: ReadonlyArray<string | number>): MigrationId[] {
  return raws.map(parseMigrationId);
}
