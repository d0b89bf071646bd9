import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { existsSync, mkdirSync, mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import initSqlJs from "sql.js";
import { DatabaseStore } from "../../src/store/database.js";
import { createObserver } from "../../src/core/observer.js";
import { down, init, migrate, pendingList, rollback } from "../../src/core/commands.js";
import {
  BatchStatementError,
  ConnectionError,
  MissingFileError,
  ParseConfigError,
  SqlError
} from "../../src/core/errors.js";
import type { Config } from "../../src/config.js";
import type { Driver, DriverConnection } from "../../src/driver/types.js";
import { createCapturingLogger } from "../helpers/store-mock.js";

interface TestContext {
  tempDir: string;
  dir: string;
  config: Config;
}

async function tableNames(dbPath: string): Promise<string[]> {
  const SQL = await initSqlJs();
  const db = new SQL.Database(readFileSync(dbPath));
  try {
    const [result] = db.exec("SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name");
    return (result?.values ?? []).flatMap(([name]) => (typeof name === "string" ? [name] : []));
  } finally {
    db.close();
  }
}

describe("DatabaseStore on SQLite", () => {
  let ctx: TestContext;

  const write = (file: string, content: string) => writeFileSync(join(ctx.dir, file), content);

  beforeEach(() => {
    const tempDir = mkdtempSync(join(tmpdir(), "tidemark-store-test-"));
    const dir = join(tempDir, "migrations");
    mkdirSync(dir);
    ctx = {
      tempDir,
      dir,
      config: { store: "database", driver: "sqlite", url: join(tempDir, "test.sqlite"), dir, table: "schema_migrations" }
    };
  });

  afterEach(() => {
    rmSync(ctx.tempDir, { recursive: true, force: true });
  });

  it("reads migrations from the directory", async () => {
    write("2-second.sql", "-- +tidemark Up\nCREATE TABLE b (id INTEGER);\n-- +tidemark Down\nDROP TABLE b;\n");
    write("1-first.sql", "-- +tidemark Up\nCREATE TABLE a (id INTEGER);\n");
    write("notes.md", "ignored");

    const store = new DatabaseStore(ctx.config, createObserver({ logger: createCapturingLogger() }));
    const migrations = await store.migrations();

    expect(migrations.map(m => [m.id, m.name])).toEqual([
      [1n, "first"],
      [2n, "second"]
    ]);
    expect(migrations[1]?.down).toEqual({
      statements: [{ sql: "DROP TABLE b;", line: 4 }],
      noTransaction: false,
      file: join(ctx.dir, "2-second.sql")
    });
  });

  it("has no migrations when the directory is missing", async () => {
    const store = new DatabaseStore({ ...ctx.config, dir: join(ctx.tempDir, "absent") }, createObserver());
    expect(await store.migrations()).toEqual([]);
  });

  it("rejects duplicate ids", async () => {
    write("1-a.sql", "-- +tidemark Up\nSELECT 1;\n");
    write("1-b.sql", "-- +tidemark Up\nSELECT 1;\n");

    const store = new DatabaseStore(ctx.config, createObserver());
    await expect(store.migrations()).rejects.toThrow(ParseConfigError);
  });

  it("needs a connection before reading completed ids", async () => {
    const store = new DatabaseStore(ctx.config, createObserver());
    await expect(store.completedIds()).rejects.toThrow("Database connection error: Store is not connected");
  });

  it("migrates, rolls back and records completed ids", async () => {
    write("1-first.sql", "-- +tidemark Up\nCREATE TABLE a (id INTEGER);\n-- +tidemark Down\nDROP TABLE a;\n");
    write("2-second.sql", "-- +tidemark Up\nCREATE TABLE b (id INTEGER);\n-- +tidemark Down\nDROP TABLE b;\n");
    const logger = createCapturingLogger();

    const outcome = await migrate(ctx.config, { logger });

    expect(outcome.status).toBe("completed");
    expect(await tableNames(ctx.config.url ?? "")).toEqual(["a", "b", "schema_migrations"]);

    await rollback(ctx.config, { logger });
    expect(await tableNames(ctx.config.url ?? "")).toEqual(["a", "schema_migrations"]);

    const store = new DatabaseStore(ctx.config, createObserver({ logger }));
    await store.connect();
    try {
      expect(await store.completedIds()).toEqual([1n]);
    } finally {
      await store.disconnect();
    }
  });

  it("keeps timestamp ids with millisecond precision completed", async () => {
    write("20240102030405123-big.sql", "-- +tidemark Up\nCREATE TABLE big (id INTEGER);\n-- +tidemark Down\nDROP TABLE big;\n");
    const logger = createCapturingLogger();

    const first = await migrate(ctx.config, { logger });
    expect(first.applied.map(m => m.id)).toEqual([20240102030405123n]);

    expect(await pendingList(ctx.config, { logger })).toBe("You have 0 pending migrations:\n");
    expect(await migrate(ctx.config, { logger })).toEqual({ status: "completed", applied: [] });
  });

  it("rolls a failed up back and stops the batch", async () => {
    write("1-first.sql", "-- +tidemark Up\nCREATE TABLE a (id INTEGER);\n");
    write("2-broken.sql", "-- +tidemark Up\nCREATE TABLE partial (id INTEGER);\nCREATE TABLE broken (;\n");
    write("3-third.sql", "-- +tidemark Up\nCREATE TABLE c (id INTEGER);\n");
    const logger = createCapturingLogger();

    const outcome = await migrate(ctx.config, { logger });

    expect(outcome.status).toBe("failed");
    expect(await tableNames(ctx.config.url ?? "")).toEqual(["a", "schema_migrations"]);
    const errors = logger.messages("error");
    expect(errors).toHaveLength(2);
    expect(errors[0]).toMatch(/^Failed UP 2-broken: .+ \(.*2-broken\.sql:3\)$/);
    expect(errors[1]).toBe("Stopping: 2-broken failed to migrate");
  });

  it("surfaces the statement error of a failed down", async () => {
    write("1-first.sql", "-- +tidemark Up\nCREATE TABLE a (id INTEGER);\n-- +tidemark Down\nDROP TABLE nope;\n");
    const logger = createCapturingLogger();
    await migrate(ctx.config, { logger });

    const failure = await down(ctx.config, [1n], { logger }).then(
      () => undefined,
      (error: unknown) => error
    );

    expect(failure).toBeInstanceOf(SqlError);
    expect(failure).not.toBeInstanceOf(BatchStatementError);
    if (!(failure instanceof SqlError)) throw new Error("expected SqlError");
    expect(failure.message).toBe("Failed DOWN 1-first: no such table: nope");
    expect(failure.sql).toBe("DROP TABLE nope;");
    expect(failure.line).toBe(4);
    expect(await tableNames(ctx.config.url ?? "")).toEqual(["a", "schema_migrations"]);
  });

  it("logs each statement when verbose", async () => {
    write("1-first.sql", "-- +tidemark Up\nCREATE TABLE a (id INTEGER);\nCREATE TABLE b (id INTEGER);\n");
    const logger = createCapturingLogger();

    await migrate(ctx.config, { logger, verbose: true });

    const statementLines = logger.messages("info").filter(message => message.startsWith("s"));
    expect(statementLines).toHaveLength(2);
    expect(statementLines[0]).toMatch(/^s1\/2 \(\d+ms\): CREATE TABLE a \(id INTEGER\);$/);
    expect(statementLines[1]).toMatch(/^s2\/2 \(\d+ms\): CREATE TABLE b \(id INTEGER\);$/);
  });

  it("init creates the table and runs init.sql", async () => {
    write("init.sql", "CREATE TABLE settings (key TEXT);\n");

    await init(ctx.config, undefined, { logger: createCapturingLogger() });

    expect(await tableNames(ctx.config.url ?? "")).toEqual(["schema_migrations", "settings"]);
  });

  it("init runs a configured script and keeps it out of the migrations", async () => {
    write("0-bootstrap.sql", "CREATE TABLE boot (id INTEGER);\n");
    write("1-first.sql", "-- +tidemark Up\nCREATE TABLE a (id INTEGER);\n");
    const config = { ...ctx.config, initScript: "0-bootstrap.sql" };

    await init(config, undefined, { logger: createCapturingLogger() });

    expect(await tableNames(ctx.config.url ?? "")).toEqual(["boot", "schema_migrations"]);
    const store = new DatabaseStore(config, createObserver());
    expect((await store.migrations()).map(m => m.name)).toEqual(["first"]);
  });

  it("init fails for a configured script that does not exist", async () => {
    const config = { ...ctx.config, initScript: "setup.sql" };

    await expect(init(config, undefined, { logger: createCapturingLogger() })).rejects.toThrow(
      new MissingFileError(["setup.sql"]).message
    );
  });

  it("creates a timestamped migration from the template", async () => {
    const dir = join(ctx.tempDir, "fresh");
    const store = new DatabaseStore({ ...ctx.config, dir }, createObserver({ logger: createCapturingLogger() }));

    const [file] = await store.create("add_users");

    expect(file).toMatch(/[\\/]\d{14}-add_users\.sql$/);
    expect(readdirSync(dir)).toHaveLength(1);
  });

  it("gives migrations created back to back distinct ids", async () => {
    const store = new DatabaseStore(ctx.config, createObserver({ logger: createCapturingLogger() }));

    await store.create("a");
    await store.create("b");

    const ids = (await store.migrations()).map(m => m.id);
    expect(ids).toHaveLength(2);
    expect(ids[1]).toBeGreaterThan(ids[0] ?? 0n);
  });

  it("refuses a missing or path-like name", async () => {
    const store = new DatabaseStore(ctx.config, createObserver());
    await expect(store.create()).rejects.toThrow(ParseConfigError);
    await expect(store.create("../escape")).rejects.toThrow("Invalid migration name: ../escape");
  });

  it("destroys migrations by name", async () => {
    write("1-first.sql", "");
    write("2-second.sql", "");
    const store = new DatabaseStore(ctx.config, createObserver({ logger: createCapturingLogger() }));

    expect(await store.destroy("first")).toEqual([join(ctx.dir, "1-first.sql")]);
    expect(existsSync(join(ctx.dir, "1-first.sql"))).toBe(false);
    expect(existsSync(join(ctx.dir, "2-second.sql"))).toBe(true);
    await expect(store.destroy("first")).rejects.toThrow("Missing migration file: first");
  });
});

describe("DatabaseStore error handling", () => {
  function stubDriver(overrides: Partial<DriverConnection> = {}) {
    const connection = {
      ensureMigrationsTable: vi.fn<[], Promise<void>>().mockResolvedValue(undefined),
      fetchCompletedIds: vi.fn<[], Promise<bigint[]>>().mockResolvedValue([]),
      markCompleted: vi.fn<[{ id: bigint; name: string }], Promise<void>>().mockResolvedValue(undefined),
      markReverted: vi.fn<[bigint], Promise<void>>().mockResolvedValue(undefined),
      beginTransaction: vi.fn<[], Promise<void>>().mockResolvedValue(undefined),
      commitTransaction: vi.fn<[], Promise<void>>().mockResolvedValue(undefined),
      rollbackTransaction: vi.fn<[], Promise<void>>().mockResolvedValue(undefined),
      runStatement: vi.fn<[string], Promise<void>>().mockResolvedValue(undefined),
      dispose: vi.fn<[], Promise<void>>().mockResolvedValue(undefined),
      ...overrides
    };
    const driver: Driver = {
      supportsTransactionalDDL: true,
      connect: vi.fn<[], Promise<DriverConnection>>().mockResolvedValue(connection),
      close: vi.fn<[], Promise<void>>().mockResolvedValue(undefined),
      mapError: (error: unknown) =>
        error instanceof Error && error.message === "socket hang up"
          ? new ConnectionError(error.message)
          : new SqlError(error instanceof Error ? error.message : String(error))
    };
    return { connection, driver };
  }

  const migration = {
    id: 7n,
    name: "seven",
    up: { statements: [{ sql: "SELECT 1;", line: 2 }], noTransaction: false, file: "7-seven.sql" },
    down: { statements: [{ sql: "SELECT 2;", line: 4 }], noTransaction: true, file: "7-seven.sql" }
  };

  it("throws connection failures from an up instead of reporting them", async () => {
    const { connection, driver } = stubDriver({
      runStatement: vi.fn<[string], Promise<void>>().mockRejectedValue(new Error("socket hang up"))
    });
    const store = new DatabaseStore({}, createObserver({ logger: createCapturingLogger() }), () => driver);
    await store.connect();

    await expect(store.applyUp(migration)).rejects.toThrow(ConnectionError);
    expect(connection.rollbackTransaction).toHaveBeenCalledTimes(1);
    expect(connection.markCompleted).not.toHaveBeenCalled();
  });

  it("wraps a failure to record completion in a batch error", async () => {
    const { connection, driver } = stubDriver({
      markCompleted: vi.fn<[{ id: bigint; name: string }], Promise<void>>().mockRejectedValue(new Error("disk full"))
    });
    const store = new DatabaseStore({}, createObserver({ logger: createCapturingLogger() }), () => driver);
    await store.connect();

    const failure = await store.applyUp(migration).then(() => undefined, (error: unknown) => error);

    expect(failure).toBeInstanceOf(BatchStatementError);
    if (!(failure instanceof BatchStatementError)) throw new Error("expected batch error");
    expect(failure.message).toBe("Failed to record 7-seven as completed");
    expect(failure.cause).toBeInstanceOf(SqlError);
    expect(connection.rollbackTransaction).toHaveBeenCalledTimes(1);
  });

  it("runs a NO TRANSACTION down outside a transaction", async () => {
    const { connection, driver } = stubDriver();
    const store = new DatabaseStore({}, createObserver(), () => driver);
    await store.connect();

    await store.applyDown(migration);

    expect(connection.beginTransaction).not.toHaveBeenCalled();
    expect(connection.runStatement).toHaveBeenCalledWith("SELECT 2;");
    expect(connection.markReverted).toHaveBeenCalledWith(7n);
  });

  it("releases the connection and the driver on disconnect", async () => {
    const { connection, driver } = stubDriver();
    const store = new DatabaseStore({}, createObserver(), () => driver);
    await store.connect();

    await store.disconnect();
    await store.disconnect();

    expect(connection.dispose).toHaveBeenCalledTimes(1);
    expect(driver.close).toHaveBeenCalledTimes(1);
  });
});
