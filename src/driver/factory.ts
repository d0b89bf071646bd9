import { DEFAULT_TABLE, type Config } from "../config.js";
import { ParseConfigError } from "../core/errors.js";
import type { Driver } from "./types.js";
import { createPostgresDriver } from "./postgres.js";
import { createMySqlDriver } from "./mysql.js";
import { createSqliteDriver } from "./sqlite.js";

export function createDriver(config: Config): Driver {
  const table = config.table || DEFAULT_TABLE;

  if (config.driver === "sqlite") {
    return createSqliteDriver({ url: config.url ?? "", table });
  }

  if (!config.url) {
    throw new ParseConfigError("DATABASE_URL is not set (provide via --url, config file, or environment variable)");
  }

  if (config.driver === "mysql") {
    return createMySqlDriver({
      url: config.url,
      table,
      schema: config.schema,
      connectTimeoutMs: config.connectTimeoutMs
    });
  }

  if (config.driver === "postgres") {
    return createPostgresDriver({
      url: config.url,
      table,
      schema: config.schema || "public",
      connectTimeoutMs: config.connectTimeoutMs
    });
  }

  throw new ParseConfigError(`Cannot determine database driver for ${config.url} (set --driver)`);
}
