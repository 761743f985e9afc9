import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { parse as parseToml } from "smol-toml";
import { ParseConfigError } from "../core/errors.js";
import { logger } from "../utils/logger.js";
import { defaultConfig, type MigrateConfig } from "./entity.js";
import { processEnvironment, type EnvironmentProvider } from "./env.js";
import { configFileSchema, formatIssuePath, type MigrateSection } from "./schema.js";

export const DEFAULT_CONFIG_FILE = "migrakit.toml";

export type LoadConfigOptions = {
  cwd: string;
  configPath?: string;
  /**
   * Defaults to the process environment, after loading `.env` from `cwd`
   * into it. A provided environment is used as-is.
   */
  env?: EnvironmentProvider;
};

export type LoadedConfig = {
  config: MigrateConfig;
  /** Absolute path of the file read, if any. */
  source?: string;
};

let loadedEnvPath: string | null = null;

// For testing - reset the loaded env path
export function resetConfigCache(): void {
  loadedEnvPath = null;
}

/**
 * Read `migrakit.toml` (or `configPath`) from `cwd`. A missing default file
 * yields the default config; a missing explicit `configPath` is an error.
 */
export function loadConfig(opts: LoadConfigOptions): LoadedConfig {
  let env = opts.env;
  if (!env) {
    loadDotEnvIfPresent(opts.cwd);
    env = processEnvironment();
  }

  const filePath = resolve(opts.cwd, opts.configPath ?? DEFAULT_CONFIG_FILE);
  if (!existsSync(filePath)) {
    if (opts.configPath) {
      throw new ParseConfigError(`Config file not found: ${filePath}`, filePath);
    }
    return { config: defaultConfig(env) };
  }

  const raw = readFileSync(filePath, "utf8");
  return { config: parseConfig(raw, filePath, env), source: filePath };
}

/**
 * Parse a config document. Keys the document leaves out take their value
 * from `defaultConfig(env)`.
 */
export function parseConfig(raw: string, filePath: string, env: EnvironmentProvider = processEnvironment()): MigrateConfig {
  let document: unknown;
  try {
    document = parseToml(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ParseConfigError(`Failed to parse ${filePath}: ${message}`, filePath);
  }

  const result = configFileSchema.safeParse(document);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue ? formatIssuePath(issue.path) : "(root)";
    const message = issue ? issue.message : result.error.message;
    throw new ParseConfigError(`Invalid config in ${filePath}: ${path}: ${message}`, filePath);
  }

  return toMigrateConfig(result.data.migrate ?? {}, env);
}

function toMigrateConfig(section: MigrateSection, env: EnvironmentProvider): MigrateConfig {
  const base = defaultConfig(env);
  const defaults: NonNullable<MigrateSection["defaults"]> = section.defaults ?? {};
  const postgres: NonNullable<NonNullable<MigrateSection["drivers"]>["postgres"]> = section.drivers?.postgres ?? {};

  return {
    createSchemas: section["create-schemas"] ? new Set(section["create-schemas"]) : base.createSchemas,
    tableName: section["table-name"] ?? base.tableName,
    migrationsDir: section["migrations-dir"] ?? base.migrationsDir,
    ignoredChars: section["ignored-chars"] ? new Set(section["ignored-chars"]) : base.ignoredChars,
    defaults: {
      migrationType: defaults["migration-type"] ?? base.defaults.migrationType,
      migrationVersioning: defaults["migration-versioning"] ?? base.defaults.migrationVersioning
    },
    drivers: {
      postgres: {
        schema: postgres.schema ?? base.drivers.postgres.schema
      }
    }
  };
}

/**
 * Copy `KEY=value` lines from `cwd/.env` into `target`, once per path.
 * Variables already present in `target` win.
 */
export function loadDotEnvIfPresent(cwd: string, target: NodeJS.ProcessEnv = process.env): void {
  const envPath = resolve(cwd, ".env");
  if (loadedEnvPath === envPath) return;
  loadedEnvPath = envPath;
  if (!existsSync(envPath)) return;

  const raw = readFileSync(envPath, "utf8");
  for (const originalLine of raw.split(/\r?\n/)) {
    const line = originalLine.trim();
    if (!line || line.startsWith("#")) continue;
    const match = line.match(/^(?:export\s+)?([A-Za-z_][A-Za-z0-9_]*)=(.*)$/);
    if (!match) {
      logger.warn(`Ignoring malformed line in ${envPath}: ${originalLine}`);
      continue;
    }
    const key = match[1] ?? "";
    const value = match[2] ?? "";
    if (target[key] !== undefined) continue;
    target[key] = stripQuotes(value);
  }
}

function stripQuotes(value: string): string {
  const trimmed = value.trim();
  if ((trimmed.startsWith("\"") && trimmed.endsWith("\"")) || (trimmed.startsWith("'") && trimmed.endsWith("'"))) {
    return trimmed.slice(1, -1);
  }
  return trimmed;
}
