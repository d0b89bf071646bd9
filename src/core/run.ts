import { errorMessage, unwrapBatchError } from "./errors.js";
import { timestamp, type Observer } from "./observer.js";
import type { Store } from "../store/types.js";

/**
 * Connect `store`, run `command` against it and disconnect on every exit
 * path. A batch wrapper thrown by the command is replaced by its cause.
 */
export async function run<A, T>(
  store: Store<A>,
  command: (store: Store<A>) => Promise<T>,
  observer: Observer
): Promise<T> {
  const { logger, events } = observer;
  let failed = false;

  try {
    logger.note("Starting migrations");
    events({ event: "run-start", ts: timestamp() });
    await store.connect();
    return await command(store);
  } catch (error) {
    failed = true;
    throw unwrapBatchError(error);
  } finally {
    logger.note("Ending migrations");
    events({ event: "run-end", ok: !failed, ts: timestamp() });
    try {
      await store.disconnect();
    } catch (disconnectError) {
      // an error already in flight takes precedence
      if (!failed) {
        // eslint-disable-next-line no-unsafe-finally
        throw disconnectError;
      }
      logger.warn(`Failed to disconnect store: ${errorMessage(disconnectError)}`);
    }
  }
}
