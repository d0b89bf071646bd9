import { describe, it, expect } from "vitest";
import { reportDown, reportUp } from "../../src/utils/cli-report.js";
import type { Migration } from "../../src/core/migration.js";
import { createCapturingLogger } from "../helpers/store-mock.js";

const unit = (id: bigint): Migration<string> => ({ id, name: `m${id}`, up: "", down: "" });

describe("command reports", () => {
  it("names what a down reverted", () => {
    const logger = createCapturingLogger();

    reportDown({ reverted: [unit(3n), unit(2n)] }, logger, "No completed migrations to revert");

    expect(logger.lines).toEqual([{ level: "success", message: "Reverted [3 2]" }]);
  });

  it("says so when a down reverted nothing", () => {
    const logger = createCapturingLogger();

    reportDown({ reverted: [] }, logger, "No completed migrations to revert");

    expect(logger.lines).toEqual([{ level: "info", message: "No completed migrations to revert" }]);
  });

  it("reports applied migrations and stays quiet after a soft stop", () => {
    const logger = createCapturingLogger();

    reportUp({ status: "completed", applied: [unit(1n)] }, logger);
    reportUp({ status: "completed", applied: [] }, logger);
    reportUp({ status: "failed", failed: unit(2n), applied: [unit(1n)] }, logger);

    expect(logger.lines).toEqual([
      { level: "success", message: "Applied [1]" },
      { level: "info", message: "No migrations to apply" }
    ]);
  });
});
