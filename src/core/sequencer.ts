import { compareIds, type Migration, type MigrationId } from "./migration.js";
import type { Store } from "../store/types.js";

export function sortAscending<A>(migrations: ReadonlyArray<Migration<A>>): Migration<A>[] {
  return [...migrations].sort((a, b) => compareIds(a.id, b.id));
}

export function sortDescending<A>(migrations: ReadonlyArray<Migration<A>>): Migration<A>[] {
  return [...migrations].sort((a, b) => compareIds(b.id, a.id));
}

/**
 * `migrations − completed`, ascending by id.
 */
export function pendingMigrations<A>(
  migrations: ReadonlyArray<Migration<A>>,
  completedIds: Iterable<MigrationId>
): Migration<A>[] {
  const completed = new Set(completedIds);
  return sortAscending(migrations.filter(m => !completed.has(m.id)));
}

/**
 * Units whose id is in `ids`, in inventory order. Requested ids without a
 * unit drop out silently.
 */
function pick<A>(migrations: ReadonlyArray<Migration<A>>, ids: ReadonlySet<MigrationId>): Migration<A>[] {
  return migrations.filter(m => ids.has(m.id));
}

export async function uncompleted<A>(store: Store<A>): Promise<Migration<A>[]> {
  const completed = await store.completedIds();
  const migrations = await store.migrations();
  return pendingMigrations(migrations, completed);
}

/**
 * Requested ids that are not completed yet, ascending.
 */
export async function selectUp<A>(store: Store<A>, requestedIds: Iterable<MigrationId>): Promise<Migration<A>[]> {
  const completed = new Set(await store.completedIds());
  const wanted = new Set<MigrationId>();
  for (const id of requestedIds) {
    if (!completed.has(id)) wanted.add(id);
  }
  if (wanted.size === 0) return [];
  return sortAscending(pick(await store.migrations(), wanted));
}

/**
 * Requested ids that are completed, descending.
 */
export async function selectDown<A>(store: Store<A>, requestedIds: Iterable<MigrationId>): Promise<Migration<A>[]> {
  const completed = new Set(await store.completedIds());
  const wanted = new Set<MigrationId>();
  for (const id of requestedIds) {
    if (completed.has(id)) wanted.add(id);
  }
  if (wanted.size === 0) return [];
  return sortDescending(pick(await store.migrations(), wanted));
}

/**
 * The most recently completed migration (highest id) as a singleton, or
 * nothing when no migration is completed.
 */
export async function selectRollback<A>(store: Store<A>): Promise<Migration<A>[]> {
  const completed = [...(await store.completedIds())].sort(compareIds);
  const latest = completed.at(-1);
  if (latest === undefined) return [];
  return selectDown(store, [latest]);
}

/**
 * Every completed migration, ready for the down executor (descending).
 */
export async function selectReset<A>(store: Store<A>): Promise<Migration<A>[]> {
  const completed = [...(await store.completedIds())].sort(compareIds);
  return selectDown(store, completed);
}
