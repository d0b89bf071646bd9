import { formatIds, migrationName, type Migration } from "./migration.js";
import { sortAscending } from "./sequencer.js";
import { timestamp, type Observer } from "./observer.js";
import type { Store } from "../store/types.js";

/**
 * Result of an up batch. `failed` means a migration reported failure and the
 * rest of the batch was abandoned; nothing was thrown.
 */
export type UpOutcome<A = unknown> =
  | { status: "completed"; applied: Migration<A>[] }
  | { status: "failed"; applied: Migration<A>[]; failed: Migration<A> };

export interface DownOutcome<A = unknown> {
  reverted: Migration<A>[];
}

/**
 * Apply `migrations` in ascending id order, stopping at the first one whose
 * up action reports failure.
 */
export async function migrateUp<A>(
  store: Store<A>,
  migrations: ReadonlyArray<Migration<A>>,
  observer: Observer
): Promise<UpOutcome<A>> {
  const ordered = sortAscending(migrations);
  const applied: Migration<A>[] = [];
  if (ordered.length === 0) {
    return { status: "completed", applied };
  }

  const { logger, events } = observer;
  logger.action(`Running up for ${formatIds(ordered)}`);

  for (const migration of ordered) {
    const name = migrationName(migration);
    logger.info(`Up ${name}`);
    events({ event: "apply-start", direction: "up", id: migration.id, name: migration.name, ts: timestamp() });
    const startedAt = Date.now();

    const ok = await store.applyUp(migration);
    if (!ok) {
      events({ event: "apply-failed", direction: "up", id: migration.id, name: migration.name, ts: timestamp() });
      logger.error(`Stopping: ${name} failed to migrate`);
      return { status: "failed", applied, failed: migration };
    }

    events({ event: "apply-end", direction: "up", id: migration.id, name: migration.name, ms: Date.now() - startedAt, ts: timestamp() });
    applied.push(migration);
  }

  return { status: "completed", applied };
}

/**
 * Revert `migrations` in the order given (callers pass them descending).
 * Every migration is attempted; the first thrown error ends the batch.
 */
export async function migrateDown<A>(
  store: Store<A>,
  migrations: ReadonlyArray<Migration<A>>,
  observer: Observer
): Promise<DownOutcome<A>> {
  const reverted: Migration<A>[] = [];
  if (migrations.length === 0) {
    return { reverted };
  }

  const { logger, events } = observer;
  logger.action(`Running down for ${formatIds(migrations)}`);

  for (const migration of migrations) {
    logger.info(`Down ${migrationName(migration)}`);
    events({ event: "apply-start", direction: "down", id: migration.id, name: migration.name, ts: timestamp() });
    const startedAt = Date.now();

    try {
      await store.applyDown(migration);
    } catch (error) {
      events({ event: "apply-failed", direction: "down", id: migration.id, name: migration.name, ts: timestamp() });
      throw error;
    }

    events({ event: "apply-end", direction: "down", id: migration.id, name: migration.name, ms: Date.now() - startedAt, ts: timestamp() });
    reverted.push(migration);
  }

  return { reverted };
}
