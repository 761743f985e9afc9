export { ConfigResolver } from "./config/resolver.js";
export type { EffectiveSettings } from "./config/resolver.js";
export {
  defaultConfig,
  defaultPostgresConfig,
  defaultMigrationDefaults,
  DEFAULT_MIGRATIONS_DIR,
  DEFAULT_TABLE_NAME,
  DEFAULT_POSTGRES_SCHEMA
} from "./config/entity.js";
export type {
  MigrateConfig,
  MigrationDefaults,
  DriversConfig,
  PostgresConfig,
  MigrationType,
  VersioningScheme,
  DefaultMigrationType,
  DefaultVersioning
} from "./config/entity.js";
export {
  processEnvironment,
  staticEnvironment,
  MIGRATIONS_TABLE_VAR,
  MIGRATIONS_SCHEMA_VAR
} from "./config/env.js";
export type { EnvironmentProvider } from "./config/env.js";
export { DriverRegistry, postgresDriver, DEFAULT_DRIVERS } from "./config/drivers.js";
export type { DriverDefinition, DriverOverrides } from "./config/drivers.js";
export { loadConfig, parseConfig, DEFAULT_CONFIG_FILE } from "./config/loader.js";
export type { LoadConfigOptions, LoadedConfig } from "./config/loader.js";
export {
  inferMigrationType,
  inferVersioning,
  resolveMigrationType,
  resolveVersioning
} from "./core/inference.js";
export type { AuthoredMigration } from "./core/inference.js";
export { ResolveConfig, calculateChecksum, verifyChecksum } from "./core/checksum.js";
export { addMigration } from "./core/authoring.js";
export type { AddMigrationOptions, AddedMigration } from "./core/authoring.js";
export { listMigrations, parseMigrationFilename, nextVersion } from "./core/files.js";
export type { MigrationSource, MigrationFileName } from "./core/files.js";
export {
  MigrakitError,
  ParseConfigError,
  MigrationExistsError,
  InvalidMigrationNameError,
  ExitCode
} from "./core/errors.js";
