import { ResolveConfig } from "../core/checksum.js";
import { DEFAULT_DRIVERS, DriverRegistry, type DriverDefinition } from "./drivers.js";
import { DEFAULT_MIGRATIONS_DIR, DEFAULT_TABLE_NAME, type MigrateConfig, type MigrationDefaults } from "./entity.js";
import { processEnvironment, type EnvironmentProvider } from "./env.js";

export type EffectiveSettings = {
  driver: string;
  migrationsDir: string;
  tableName: string;
  schema?: string;
  createSchemas: string[];
  ignoredChars: string[];
  defaults: MigrationDefaults;
};

/**
 * Effective migration settings.
 *
 * Precedence for every key is: value from the config file, then the
 * environment, then the built-in constant. Nothing is cached; each call reads
 * the config and the environment again.
 */
export class ConfigResolver {
  private readonly drivers: DriverRegistry;

  constructor(
    private readonly config: MigrateConfig,
    private readonly env: EnvironmentProvider = processEnvironment(),
    drivers: readonly DriverDefinition[] = DEFAULT_DRIVERS
  ) {
    this.drivers = new DriverRegistry(config, env, drivers);
  }

  migrationsDir(): string {
    return this.config.migrationsDir ?? DEFAULT_MIGRATIONS_DIR;
  }

  /**
   * Tracking table, prefixed with the postgres schema when one is configured.
   *
   * A `tableName` that is already qualified gets prefixed again
   * (`schema.other.table`).
   */
  tableName(): string {
    const table = this.config.tableName ?? DEFAULT_TABLE_NAME;
    const schema = this.postgresSchema();
    return schema === undefined ? table : `${schema}.${table}`;
  }

  /**
   * Tracking table for a given driver kind. Drivers with overrides always get
   * `schema.table`; the rest fall back to `tableName()`.
   */
  qualifiedTableName(driverKind: string): string {
    const driver = this.drivers.get(driverKind);
    if (!driver) {
      return this.tableName();
    }
    const schema = driver.resolveSchema() ?? driver.defaultSchema;
    return `${schema}.${driver.resolveTable()}`;
  }

  /** Not defaulted to `public`; only `qualifiedTableName` does that. */
  postgresSchema(): string | undefined {
    return this.drivers.get("postgres")?.resolveSchema();
  }

  ignoredChars(): ReadonlySet<string> {
    return this.config.ignoredChars;
  }

  createSchemas(): string[] {
    return Array.from(this.config.createSchemas).sort();
  }

  defaults(): MigrationDefaults {
    return { ...this.config.defaults };
  }

  /** Throws `TypeError` for a hand-built config whose `ignoredChars` holds a multi-character entry. */
  toResolveConfig(): ResolveConfig {
    return new ResolveConfig().ignoreChars(this.config.ignoredChars);
  }

  supportedDrivers(): string[] {
    return this.drivers.kinds();
  }

  describe(driverKind: string): EffectiveSettings {
    const driver = this.drivers.get(driverKind);
    return {
      driver: driver?.kind ?? driverKind.toLowerCase(),
      migrationsDir: this.migrationsDir(),
      tableName: this.qualifiedTableName(driverKind),
      schema: driver ? driver.resolveSchema() ?? driver.defaultSchema : undefined,
      createSchemas: this.createSchemas(),
      ignoredChars: Array.from(this.config.ignoredChars).sort(),
      defaults: this.defaults()
    };
  }
}
