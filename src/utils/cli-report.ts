import type { DownOutcome, UpOutcome } from "../core/executor.js";
import { formatIds } from "../core/migration.js";
import type { Logger } from "./logger.js";

export function reportUp(outcome: UpOutcome, logger: Logger): void {
  if (outcome.status === "failed") {
    // the executor already logged the stop; a soft stop is not a process failure
    return;
  }
  if (outcome.applied.length === 0) {
    logger.info("No migrations to apply");
    return;
  }
  logger.success(`Applied ${formatIds(outcome.applied)}`);
}

export function reportDown(outcome: DownOutcome, logger: Logger, nothingMessage: string): void {
  if (outcome.reverted.length === 0) {
    logger.info(nothingMessage);
    return;
  }
  logger.success(`Reverted ${formatIds(outcome.reverted)}`);
}
