import { MIGRATIONS_SCHEMA_VAR, MIGRATIONS_TABLE_VAR, processEnvironment, type EnvironmentProvider } from "./env.js";

export const DEFAULT_MIGRATIONS_DIR = "migrations";
export const DEFAULT_TABLE_NAME = "_sqlx_migrations";
export const DEFAULT_POSTGRES_SCHEMA = "public";

/** Shape of a migration on disk: one forward-only file, or an up/down pair. */
export type MigrationType = "simple" | "reversible";

/** Numbering scheme for new migration versions. */
export type VersioningScheme = "timestamp" | "sequential";

/**
 * `inferred` selects the inferencer; any other value is used as-is.
 */
export type DefaultMigrationType = "inferred" | MigrationType;
export type DefaultVersioning = "inferred" | VersioningScheme;

export const DEFAULT_MIGRATION_TYPES = ["inferred", "simple", "reversible"] as const satisfies readonly DefaultMigrationType[];
export const DEFAULT_VERSIONINGS = ["inferred", "timestamp", "sequential"] as const satisfies readonly DefaultVersioning[];

export interface MigrationDefaults {
  /** What `migrakit add` creates when no flag is given. */
  migrationType: DefaultMigrationType;
  /** Version numbering `migrakit add` uses when no flag is given. */
  migrationVersioning: DefaultVersioning;
}

export interface PostgresConfig {
  /** Schema of the tracking table. */
  schema?: string;
}

export interface DriversConfig {
  postgres: PostgresConfig;
}

/**
 * The `[migrate]` table of `migrakit.toml` after parsing.
 *
 * Changing `tableName`, `ignoredChars` or the postgres `schema` on a database
 * that already has migrations applied makes the runner lose track of them.
 */
export interface MigrateConfig {
  /** Schemas created before the tracking table is checked. */
  createSchemas: ReadonlySet<string>;
  /** May already be schema-qualified and/or quoted. */
  tableName?: string;
  migrationsDir?: string;
  /**
   * Characters dropped from migration contents before hashing. Each entry is
   * one code point; the loader enforces this and `ResolveConfig` rejects
   * anything longer.
   */
  ignoredChars: ReadonlySet<string>;
  defaults: MigrationDefaults;
  drivers: DriversConfig;
}

export function defaultMigrationDefaults(): MigrationDefaults {
  return {
    migrationType: "inferred",
    migrationVersioning: "inferred"
  };
}

/**
 * Postgres block used when the file has none. Reads `MIGRATIONS_SCHEMA` now.
 */
export function defaultPostgresConfig(env: EnvironmentProvider = processEnvironment()): PostgresConfig {
  return { schema: env.get(MIGRATIONS_SCHEMA_VAR) };
}

/**
 * Config used when no file exists, and the base for keys a file leaves out.
 * Reads `MIGRATIONS_TABLE` (and `MIGRATIONS_SCHEMA` via the postgres block) now.
 */
export function defaultConfig(env: EnvironmentProvider = processEnvironment()): MigrateConfig {
  return {
    createSchemas: new Set<string>(),
    tableName: env.get(MIGRATIONS_TABLE_VAR),
    migrationsDir: undefined,
    ignoredChars: new Set<string>(),
    defaults: defaultMigrationDefaults(),
    drivers: { postgres: defaultPostgresConfig(env) }
  };
}
