import { logger as consoleLogger, type Logger } from "../utils/logger.js";
import { noopEventSink, type EventSink } from "../utils/events.js";

/**
 * Where a run reports to. Handed down from the command layer to the run
 * wrapper, the executors and the store.
 */
export interface Observer {
  logger: Logger;
  events: EventSink;
  verbose: boolean;
}

export function createObserver(overrides: Partial<Observer> = {}): Observer {
  return {
    logger: overrides.logger ?? consoleLogger,
    events: overrides.events ?? noopEventSink,
    verbose: overrides.verbose ?? false
  };
}

export function timestamp(): string {
  return new Date().toISOString();
}
