import { describe, it, expect } from "vitest";
import { MissingFileError, SqlError } from "../../src/core/errors.js";
import { formatCliError } from "../../src/utils/format-error.js";

describe("CLI error formatting", () => {
  it("prints a file:line prefix for SqlError", () => {
    const error = new SqlError("Failed DOWN 20240101120000-create_users: no such table: users", {
      file: "migrations/20240101120000-create_users.sql",
      line: 5
    });

    expect(formatCliError(error)).toBe(
      "migrations/20240101120000-create_users.sql:5 - Failed DOWN 20240101120000-create_users: no such table: users"
    );
  });

  it("falls back to the message when no location is present", () => {
    const error = new SqlError("syntax error");
    expect(formatCliError(error)).toBe("syntax error");
  });

  it("formats other errors by message", () => {
    expect(formatCliError(new MissingFileError(["seed"]))).toBe("Missing migration file: seed");
    expect(formatCliError("plain text")).toBe("plain text");
  });

  it("prints nothing for an absent error", () => {
    expect(formatCliError(undefined)).toBe("");
    expect(formatCliError(null)).toBe("");
  });
});
