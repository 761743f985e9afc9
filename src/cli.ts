import yargs from "yargs";
import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { loadConfig, type LoadedConfig } from "./config/loader.js";
import { ConfigResolver, type EffectiveSettings } from "./config/resolver.js";
import { processEnvironment, type EnvironmentProvider } from "./config/env.js";
import type { MigrationType, VersioningScheme } from "./config/entity.js";
import { addMigration } from "./core/authoring.js";
import { calculateChecksum } from "./core/checksum.js";
import { ExitCode, ParseConfigError, formatExitCodesHelp } from "./core/errors.js";
import { isErrnoException, writeDefaultConfig } from "./core/files.js";
import { formatPath, logger } from "./utils/logger.js";
import { formatCliError } from "./utils/format-error.js";

export type CliOptions = {
  cwd?: string;
  /** Replaces the process environment (and skips `.env` loading). */
  env?: EnvironmentProvider;
  exit?: (code: number) => void;
};

type GlobalArgs = {
  config?: string;
  dir?: string;
};

type Session = {
  loaded: LoadedConfig;
  resolver: ConfigResolver;
  migrationsDir: string;
};

export function createCli(argv: string[], options: CliOptions = {}) {
  const cwd = options.cwd ?? process.cwd();
  const exit = options.exit ?? ((code: number) => process.exit(code));

  function openSession(args: GlobalArgs): Session {
    const loaded = loadConfig({ cwd, configPath: args.config, env: options.env });
    const resolver = new ConfigResolver(loaded.config, options.env ?? processEnvironment());
    const migrationsDir = resolve(cwd, args.dir ?? resolver.migrationsDir());
    return { loaded, resolver, migrationsDir };
  }

  const cli = yargs(argv)
    .scriptName("migrakit")
    .strict()
    .wrap(100)
    .option("config", { type: "string", describe: "Path to config file (default: migrakit.toml)" })
    .option("dir", { type: "string", describe: "Migrations directory (overrides migrate.migrations-dir)" })
    .epilogue(`Exit Codes:\n${formatExitCodesHelp()}`);

  cli.command(
    "config [driver]",
    "Show the effective migration settings",
    (yy) =>
      yy
        .positional("driver", {
          type: "string",
          default: "postgres",
          describe: "Database kind (postgres, mysql, sqlite, ...)"
        })
        .option("json", { type: "boolean", describe: "Output settings as JSON" }),
    async (args) => {
      const session = openSession(args);
      const settings = session.resolver.describe(args.driver);
      settings.migrationsDir = session.migrationsDir;

      if (args.json) {
        console.log(JSON.stringify({ source: session.loaded.source ?? null, ...settings }, null, 2));
      } else {
        printSettings(session.loaded, settings);
      }
    }
  );

  cli.command(
    "add <description>",
    "Create a new migration",
    (yy) =>
      yy
        .positional("description", { type: "string", demandOption: true })
        .option("reversible", { alias: "r", type: "boolean", describe: "Create an up/down pair" })
        .option("simple", { type: "boolean", describe: "Create a single forward-only file" })
        .option("timestamp", { type: "boolean", describe: "Use a UTC timestamp version" })
        .option("sequential", { type: "boolean", describe: "Use the next sequential version" })
        .conflicts("reversible", "simple")
        .conflicts("timestamp", "sequential"),
    async (args) => {
      const session = openSession(args);
      const type: MigrationType | undefined = args.reversible ? "reversible" : args.simple ? "simple" : undefined;
      const versioning: VersioningScheme | undefined = args.timestamp
        ? "timestamp"
        : args.sequential
          ? "sequential"
          : undefined;

      const added = addMigration({
        dir: session.migrationsDir,
        description: args.description,
        defaults: session.resolver.defaults(),
        type,
        versioning
      });

      logger.success(`Created ${added.type} migration ${added.version} (${added.versioning} versioning)`);
      for (const file of added.files) {
        console.log(file);
      }
    }
  );

  cli.command(
    "checksum <file>",
    "Print the checksum of a migration file, honouring migrate.ignored-chars",
    (yy) => yy.positional("file", { type: "string", demandOption: true }),
    async (args) => {
      const session = openSession(args);
      const content = readFileSync(resolve(cwd, args.file), "utf8");
      console.log(calculateChecksum(content, session.resolver.toResolveConfig()));
    }
  );

  cli.command(
    "init-config",
    "Create a default migrakit.toml",
    (yy) =>
      yy.option("output", {
        type: "string",
        alias: "o",
        default: "migrakit.toml",
        describe: "Output filename"
      }),
    async (args) => {
      const filename = resolve(cwd, args.output);
      try {
        writeDefaultConfig(filename);
      } catch (error) {
        if (isErrnoException(error) && error.code === "EEXIST") {
          throw new ParseConfigError(`${filename} already exists. Remove it first or use a different filename with --output.`, filename);
        }
        throw error;
      }
      logger.success(`Created ${filename}`);
      logger.note("Run `migrakit config` to check the effective settings.");
    }
  );

  return cli
    .demandCommand(1)
    .help()
    .fail((msg, err) => {
      if (err instanceof Error && "exitCode" in err && typeof err.exitCode === "number") {
        logger.error(formatCliError(err) || msg);
        exit(err.exitCode);
        return;
      }
      logger.error(formatCliError(err) || msg || "Unknown error");
      exit(ExitCode.GENERAL_ERROR);
    });
}

function printSettings(loaded: LoadedConfig, settings: EffectiveSettings): void {
  logger.action("Effective migration settings");
  logger.info(`Config file: ${loaded.source ? formatPath(loaded.source) : "(none, using defaults)"}`);
  logger.info(`Driver: ${settings.driver}`);
  logger.info(`Migrations dir: ${settings.migrationsDir}`);
  logger.info(`Tracking table: ${settings.tableName}`);
  if (settings.schema !== undefined) {
    logger.info(`Schema: ${settings.schema}`);
  }
  logger.info(`Create schemas: ${settings.createSchemas.length ? settings.createSchemas.join(", ") : "(none)"}`);
  logger.info(
    `Ignored chars: ${settings.ignoredChars.length ? settings.ignoredChars.map((ch) => JSON.stringify(ch)).join(" ") : "(none)"}`
  );
  logger.info(`Default migration type: ${settings.defaults.migrationType}`);
  logger.info(`Default versioning: ${settings.defaults.migrationVersioning}`);
}
