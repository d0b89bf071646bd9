import { describe, it, expect } from "vitest";
import { run } from "../../src/core/run.js";
import { createObserver } from "../../src/core/observer.js";
import { BatchStatementError, ConnectionError, SqlError } from "../../src/core/errors.js";
import { RecordingStore, createCapturingLogger, createEventRecorder } from "../helpers/store-mock.js";

function setup() {
  const logger = createCapturingLogger();
  const recorder = createEventRecorder();
  return { logger, recorder, observer: createObserver({ logger, events: recorder.sink }) };
}

describe("run", () => {
  it("connects, runs the command and disconnects", async () => {
    const { observer, logger, recorder } = setup();
    const store = new RecordingStore([1n]);

    const result = await run(store, async s => {
      await s.completedIds();
      return "done";
    }, observer);

    expect(result).toBe("done");
    expect(store.calls).toEqual(["connect", "completedIds", "disconnect"]);
    expect(logger.messages("note")).toEqual(["Starting migrations", "Ending migrations"]);
    expect(recorder.events.map(e => [e.event, e.ok])).toEqual([
      ["run-start", undefined],
      ["run-end", true]
    ]);
  });

  it("disconnects when the command throws", async () => {
    const { observer, recorder } = setup();
    const store = new RecordingStore([1n]);
    const boom = new SqlError("boom");

    await expect(run(store, async () => {
      throw boom;
    }, observer)).rejects.toBe(boom);

    expect(store.calls).toEqual(["connect", "disconnect"]);
    expect(recorder.events.at(-1)?.ok).toBe(false);
  });

  it("disconnects when connect throws", async () => {
    const { observer } = setup();
    const failure = new ConnectionError("refused");
    const store = new RecordingStore([1n], [], { connectError: failure });

    await expect(run(store, async () => "never", observer)).rejects.toBe(failure);
    expect(store.calls).toEqual(["connect", "disconnect"]);
  });

  it("surfaces exactly the error a batch failure wraps", async () => {
    const { observer } = setup();
    const store = new RecordingStore([1n]);
    const inner = new SqlError("relation does not exist");

    await expect(run(store, async () => {
      throw new BatchStatementError("Failed DOWN 1-m1: statement 1 of 1", inner);
    }, observer)).rejects.toBe(inner);
  });

  it("unwraps only one level", async () => {
    const { observer } = setup();
    const store = new RecordingStore([1n]);
    const middle = new BatchStatementError("middle", new SqlError("inner"));

    await expect(run(store, async () => {
      throw new BatchStatementError("outer", middle);
    }, observer)).rejects.toBe(middle);
  });

  it("rethrows a disconnect failure after a successful command", async () => {
    const { observer } = setup();
    const failure = new ConnectionError("reset by peer");
    const store = new RecordingStore([1n], [], { disconnectError: failure });

    await expect(run(store, async () => "ok", observer)).rejects.toBe(failure);
  });

  it("keeps the original error when disconnect also fails", async () => {
    const { observer, logger } = setup();
    const store = new RecordingStore([1n], [], { disconnectError: new Error("socket closed") });
    const boom = new SqlError("boom");

    await expect(run(store, async () => {
      throw boom;
    }, observer)).rejects.toBe(boom);
    expect(logger.messages("warn")).toEqual(["Failed to disconnect store: socket closed"]);
  });
});
