import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { ParseConfigError, errorMessage } from "./core/errors.js";
import { logger } from "./utils/logger.js";

export type DriverName = "postgres" | "mysql" | "sqlite";

const DRIVER_NAMES: readonly DriverName[] = ["postgres", "mysql", "sqlite"];

/**
 * Configuration handed to every command. The engine itself only reads
 * `store`; the rest belongs to whichever store the registry builds.
 */
export interface Config {
  store?: string;
  driver?: DriverName;
  url?: string;
  dir?: string;
  table?: string;
  schema?: string;
  initScript?: string;
  connectTimeoutMs?: number;
}

export type TidemarkConfigFile = {
  store?: {
    type?: string;
  };
  database?: {
    driver?: string;
    url?: string;
    table?: string;
    schema?: string;
  };
  migrations?: {
    dir?: string;
    initScript?: string;
  };
};

export type CliConfigInput = {
  store?: string;
  driver?: string;
  url?: string;
  dir?: string;
  table?: string;
  schema?: string;
  initScript?: string;
};

export type ResolveConfigOptions = {
  cli: CliConfigInput;
  cwd: string;
  configPath?: string;
};

export const DEFAULT_STORE = "database";
export const DEFAULT_TABLE = "schema_migrations";
export const DEFAULT_DIR = "migrations";

const DEFAULT_CONFIG_FILES = ["tidemark.toml", "tidemark.json"];
const TOML_SECTIONS = ["store", "database", "migrations"] as const;
type TomlSection = (typeof TOML_SECTIONS)[number];

let loadedEnvPath: string | null = null;

// For testing - reset the loaded env path
export function resetConfigCache(): void {
  loadedEnvPath = null;
}

export function resolveConfig(opts: ResolveConfigOptions): Config {
  loadDotEnvIfPresent(opts.cwd);
  const fileConfig = loadConfigFile(opts);

  const env = process.env;
  const store = opts.cli.store ?? env.TIDEMARK_STORE ?? fileConfig?.store?.type ?? DEFAULT_STORE;
  const url = opts.cli.url ?? env.TIDEMARK_DATABASE_URL ?? env.DATABASE_URL ?? fileConfig?.database?.url;
  const dir = opts.cli.dir ?? env.TIDEMARK_MIGRATIONS_DIR ?? fileConfig?.migrations?.dir ?? DEFAULT_DIR;
  const table = opts.cli.table ?? env.TIDEMARK_TABLE ?? fileConfig?.database?.table ?? DEFAULT_TABLE;
  const schema = opts.cli.schema ?? env.TIDEMARK_SCHEMA ?? fileConfig?.database?.schema;
  const initScript = opts.cli.initScript ?? env.TIDEMARK_INIT_SCRIPT ?? fileConfig?.migrations?.initScript;
  const driverRaw = opts.cli.driver ?? env.TIDEMARK_DRIVER ?? fileConfig?.database?.driver;

  const expandedUrl = url === undefined ? undefined : expandEnvVars(url);

  return {
    store: expandEnvVars(store),
    driver: resolveDriverName(driverRaw === undefined ? undefined : expandEnvVars(driverRaw), expandedUrl),
    url: expandedUrl,
    dir: expandEnvVars(dir),
    table: expandEnvVars(table),
    schema: schema === undefined ? undefined : expandEnvVars(schema),
    initScript: initScript === undefined ? undefined : expandEnvVars(initScript),
    connectTimeoutMs: parseTimeout(env.TIDEMARK_CONNECT_TIMEOUT_MS)
  };
}

/**
 * Explicit driver name wins; otherwise the URL scheme decides. A URL without
 * a scheme is a SQLite file path.
 */
export function resolveDriverName(explicit: string | undefined, url: string | undefined): DriverName | undefined {
  if (explicit !== undefined) {
    const normalized = explicit.trim().toLowerCase();
    const match = DRIVER_NAMES.find(name => name === normalized);
    if (!match) {
      throw new ParseConfigError(`Unknown driver: ${explicit} (expected one of ${DRIVER_NAMES.join(", ")})`);
    }
    return match;
  }

  if (!url) return undefined;
  const lower = url.trim().toLowerCase();
  if (lower.startsWith("postgres:") || lower.startsWith("postgresql:")) return "postgres";
  if (lower.startsWith("mysql:")) return "mysql";
  if (lower.startsWith("sqlite:") || lower.startsWith("file:") || !lower.includes("://")) return "sqlite";
  return undefined;
}

function parseTimeout(raw: string | undefined): number | undefined {
  if (!raw) return undefined;
  const ms = parseInt(raw, 10);
  return !Number.isNaN(ms) && ms > 0 ? ms : undefined;
}

function loadConfigFile(opts: ResolveConfigOptions): TidemarkConfigFile | undefined {
  const candidates = resolveConfigPaths(opts);
  for (const filePath of candidates) {
    if (!existsSync(filePath)) continue;
    const raw = readFileSync(filePath, "utf8");
    if (filePath.endsWith(".json")) {
      return parseJsonConfig(raw, filePath);
    }
    if (filePath.endsWith(".toml")) {
      return parseTomlConfig(raw, filePath);
    }
  }
  if (opts.configPath) {
    throw new ParseConfigError(`Config file not found: ${candidates[0]}`);
  }
  return undefined;
}

function resolveConfigPaths(opts: ResolveConfigOptions): string[] {
  if (opts.configPath) {
    return [resolve(opts.cwd, opts.configPath)];
  }
  return DEFAULT_CONFIG_FILES.map((name) => resolve(opts.cwd, name));
}

function parseJsonConfig(raw: string, filePath: string): TidemarkConfigFile {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new ParseConfigError(`Failed to parse ${filePath}: ${errorMessage(error)}`);
  }
  return normaliseConfigShape(data, filePath);
}

function parseTomlConfig(raw: string, filePath: string): TidemarkConfigFile {
  const config: Partial<Record<TomlSection, Record<string, unknown>>> = {};
  let currentSection: TomlSection | undefined;
  const lines = raw.split(/\r?\n/);

  for (const originalLine of lines) {
    const line = originalLine.trim();
    if (!line || line.startsWith("#") || line.startsWith(";")) continue;
    const sectionMatch = line.match(/^\[(.+)]$/);
    if (sectionMatch) {
      currentSection = TOML_SECTIONS.find(section => section === sectionMatch[1]);
      if (currentSection && !config[currentSection]) {
        config[currentSection] = {};
      }
      continue;
    }

    const kvMatch = line.match(/^([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.+)$/);
    if (!kvMatch) {
      throw new ParseConfigError(`Invalid TOML line in ${filePath}: ${originalLine}`);
    }
    const key = kvMatch[1];
    const valueLiteral = kvMatch[2];
    if (!key || valueLiteral === undefined) {
      throw new ParseConfigError(`Invalid TOML assignment in ${filePath}: ${originalLine}`);
    }
    if (!currentSection) {
      continue;
    }
    const section = config[currentSection] ?? {};
    section[key] = parseTomlValue(valueLiteral);
    config[currentSection] = section;
  }

  return normaliseConfigShape(config, filePath);
}

function parseTomlValue(literal: string): unknown {
  const trimmed = literal.trim();
  if ((trimmed.startsWith("\"") && trimmed.endsWith("\"")) || (trimmed.startsWith("'") && trimmed.endsWith("'"))) {
    return trimmed.slice(1, -1);
  }
  if (trimmed === "true") return true;
  if (trimmed === "false") return false;
  const number = Number(trimmed);
  if (!Number.isNaN(number)) return number;
  return trimmed;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringField(section: Record<string, unknown>, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = section[key];
    if (typeof value === "string") return value;
  }
  return undefined;
}

function normaliseConfigShape(input: unknown, filePath: string): TidemarkConfigFile {
  if (!isRecord(input)) {
    throw new ParseConfigError(`Config at ${filePath} must be an object`);
  }
  const out: TidemarkConfigFile = {};
  const store = input.store;
  if (isRecord(store)) {
    out.store = { type: stringField(store, "type") };
  } else if (typeof store === "string") {
    out.store = { type: store };
  }
  const database = input.database;
  if (isRecord(database)) {
    out.database = {
      driver: stringField(database, "driver"),
      url: stringField(database, "url"),
      table: stringField(database, "table"),
      schema: stringField(database, "schema")
    };
  }
  const migrations = input.migrations;
  if (isRecord(migrations)) {
    out.migrations = {
      dir: stringField(migrations, "dir"),
      initScript: stringField(migrations, "init_script", "initScript")
    };
  }
  return out;
}

function loadDotEnvIfPresent(cwd: string): void {
  const envPath = resolve(cwd, ".env");
  if (loadedEnvPath === envPath) return;
  loadedEnvPath = envPath;
  if (!existsSync(envPath)) {
    return;
  }
  const raw = readFileSync(envPath, "utf8");
  const lines = raw.split(/\r?\n/);
  for (const originalLine of lines) {
    const line = originalLine.trim();
    if (!line || line.startsWith("#")) continue;
    const match = line.match(/^([A-Za-z_][A-Za-z0-9_]*)=(.*)$/);
    if (!match) continue;
    const key = match[1] ?? "";
    const value = match[2] ?? "";
    if (!key) continue;
    if (process.env[key] !== undefined) continue;
    process.env[key] = stripQuotes(value);
  }
}

function stripQuotes(value: string): string {
  const trimmed = value.trim();
  if ((trimmed.startsWith("\"") && trimmed.endsWith("\"")) || (trimmed.startsWith("'") && trimmed.endsWith("'"))) {
    return trimmed.slice(1, -1);
  }
  return trimmed;
}

export function expandEnvVars(value: string): string {
  // Support ${VAR_NAME} and $VAR_NAME syntax
  return value.replace(/\$\{([^}]+)\}|\$([A-Za-z_][A-Za-z0-9_]*)/g, (match: string, braced?: string, bare?: string) => {
    const varName = braced ?? bare ?? "";
    const envValue = process.env[varName];
    if (envValue === undefined) {
      logger.warn(`Environment variable ${varName} is not defined`);
      return match; // Keep original if not found
    }
    return envValue;
  });
}
