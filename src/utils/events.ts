import { errorMessage } from "../core/errors.js";
import { logger } from "./logger.js";

export type EventRecord = Record<string, unknown> & { event: string };

export type EventSink = (record: EventRecord) => void;

export const noopEventSink: EventSink = () => {};

/**
 * Newline-delimited JSON on stdout, one object per event. Bigint ids are
 * written as strings.
 */
export const jsonEventSink: EventSink = (record) => {
  try {
    // Use console.log directly (not colorized logger)
    // eslint-disable-next-line no-console
    console.log(JSON.stringify(record, (_, value: unknown) => (typeof value === "bigint" ? value.toString() : value)));
  } catch (e) {
    logger.warn(`Failed to emit event: ${errorMessage(e)}`);
  }
};

export function previewSql(sql: string, max: number = 60): string {
  return sql.length > max ? sql.slice(0, max - 3) + "..." : sql;
}
