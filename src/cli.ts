#!/usr/bin/env node
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import {
  create,
  destroy,
  down,
  init,
  migrate,
  migrateUntilJustBefore,
  pendingList,
  reset,
  rollback,
  up,
  type CommandOptions
} from "./core/commands.js";
import { TidemarkError, formatExitCodesHelp } from "./core/errors.js";
import { formatIds } from "./core/migration.js";
import { resolveConfig, type Config } from "./config.js";
import { jsonEventSink } from "./utils/events.js";
import { logger } from "./utils/logger.js";
import { formatCliError } from "./utils/format-error.js";
import { parseMigrationId, parseMigrationIds } from "./utils/cli-args.js";
import { reportDown, reportUp } from "./utils/cli-report.js";

type GlobalArgs = {
  store?: string;
  driver?: string;
  url?: string;
  dir?: string;
  table?: string;
  schema?: string;
  config?: string;
  initScript?: string;
  verbose?: boolean;
  eventsJson?: boolean;
};

function loadConfig(args: GlobalArgs): Config {
  return resolveConfig({
    cli: {
      store: args.store,
      driver: args.driver,
      url: args.url,
      dir: args.dir,
      table: args.table,
      schema: args.schema,
      initScript: args.initScript
    },
    cwd: process.cwd(),
    configPath: args.config
  });
}

function commandOptions(args: GlobalArgs): CommandOptions {
  return {
    logger,
    verbose: args.verbose === true,
    events: args.eventsJson ? jsonEventSink : undefined
  };
}

async function main(): Promise<void> {
  const cli = yargs(hideBin(process.argv))
    .scriptName("tidemark")
    .strict()
    .wrap(100)
    .option("store", { type: "string", describe: "Store type (default: database)" })
    .option("driver", { type: "string", describe: "Database driver: postgres, mysql or sqlite" })
    .option("url", { type: "string", describe: "DB connection string (overrides DATABASE_URL)" })
    .option("dir", { type: "string", describe: "Migrations directory (default: migrations)" })
    .option("table", { type: "string", describe: "Completed-migrations table name" })
    .option("schema", { type: "string", describe: "Database schema (postgres: public)" })
    .option("config", { type: "string", describe: "Path to config file (tidemark.toml or tidemark.json)" })
    .option("init-script", { type: "string", describe: "Script run by init, relative to the migrations directory" })
    .option("verbose", { type: "boolean", describe: "Per-statement logs and timings" })
    .option("events-json", { type: "boolean", describe: "Stream newline-delimited JSON events to stdout" })
    .epilogue(`Exit Codes:\n${formatExitCodesHelp()}`);

  cli.command(
    "migrate",
    "Apply every pending migration",
    (yy) => yy,
    async (argv) => {
      reportUp(await migrate(loadConfig(argv), commandOptions(argv)), logger);
    }
  );

  cli.command(
    "up <ids..>",
    "Apply the given migrations, skipping completed ones",
    (yy) => yy.positional("ids", { type: "string", array: true, demandOption: true }),
    async (argv) => {
      const ids = parseMigrationIds(argv.ids);
      reportUp(await up(loadConfig(argv), ids, commandOptions(argv)), logger);
    }
  );

  cli.command(
    "down <ids..>",
    "Revert the given migrations, skipping ones that are not completed",
    (yy) => yy.positional("ids", { type: "string", array: true, demandOption: true }),
    async (argv) => {
      const ids = parseMigrationIds(argv.ids);
      reportDown(await down(loadConfig(argv), ids, commandOptions(argv)), logger, "No completed migrations to revert");
    }
  );

  cli.command(
    "rollback",
    "Revert the most recently completed migration",
    (yy) => yy,
    async (argv) => {
      reportDown(await rollback(loadConfig(argv), commandOptions(argv)), logger, "No completed migrations to roll back");
    }
  );

  cli.command(
    "reset",
    "Revert every completed migration, then apply everything again",
    (yy) => yy,
    async (argv) => {
      const outcome = await reset(loadConfig(argv), commandOptions(argv));
      logger.info(`Reverted ${formatIds(outcome.down.reverted)}`);
      reportUp(outcome.up, logger);
    }
  );

  cli.command(
    "until <id>",
    "Apply pending migrations with ids below <id>",
    (yy) => yy.positional("id", { type: "string", demandOption: true }),
    async (argv) => {
      const target = parseMigrationId(argv.id);
      reportUp(await migrateUntilJustBefore(loadConfig(argv), target, commandOptions(argv)), logger);
    }
  );

  cli.command(
    "pending",
    "List pending migrations",
    (yy) => yy,
    async (argv) => {
      const listing = await pendingList(loadConfig(argv), commandOptions(argv));
      // eslint-disable-next-line no-console
      console.log(listing);
    }
  );

  cli.command(
    "init",
    "Create the completed-migrations table and run the init script",
    (yy) => yy,
    async (argv) => {
      await init(loadConfig(argv), undefined, commandOptions(argv));
    }
  );

  cli.command(
    "create <name>",
    "Create a new timestamped migration",
    (yy) => yy.positional("name", { type: "string", demandOption: true }),
    async (argv) => {
      const created = await create(loadConfig(argv), argv.name, commandOptions(argv));
      for (const file of created) {
        // eslint-disable-next-line no-console
        console.log(file);
      }
    }
  );

  cli.command(
    "destroy <name>",
    "Delete the migration called <name>",
    (yy) => yy.positional("name", { type: "string", demandOption: true }),
    async (argv) => {
      await destroy(loadConfig(argv), argv.name, commandOptions(argv));
    }
  );

  await cli
    .demandCommand(1)
    .help()
    .fail((msg, err) => {
      const formatted = formatCliError(err) || msg || "Unknown error";
      logger.error(formatted);
      process.exit(err instanceof TidemarkError ? err.exitCode : 1);
    })
    .parseAsync();
}

main().catch((error: unknown) => {
  logger.error(formatCliError(error) || "Unknown error");
  process.exit(error instanceof TidemarkError ? error.exitCode : 1);
});
