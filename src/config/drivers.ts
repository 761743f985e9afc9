import { DEFAULT_POSTGRES_SCHEMA, DEFAULT_TABLE_NAME, type MigrateConfig } from "./entity.js";
import { MIGRATIONS_SCHEMA_VAR, MIGRATIONS_TABLE_VAR, type EnvironmentProvider } from "./env.js";

/**
 * Per-driver naming rules for the tracking table.
 */
export interface DriverOverrides {
  readonly kind: string;
  /** Schema from the driver's own config or the environment, if any. */
  resolveSchema(): string | undefined;
  resolveTable(): string;
  /** Used by qualified lookups when `resolveSchema()` has nothing. */
  readonly defaultSchema: string;
}

export interface DriverDefinition {
  /** Lower-case names this driver answers to. */
  readonly kinds: readonly string[];
  create(config: MigrateConfig, env: EnvironmentProvider): DriverOverrides;
}

export const postgresDriver: DriverDefinition = {
  kinds: ["postgres", "postgresql"],
  create(config, env) {
    return {
      kind: "postgres",
      defaultSchema: DEFAULT_POSTGRES_SCHEMA,
      resolveSchema() {
        return config.drivers.postgres.schema ?? env.get(MIGRATIONS_SCHEMA_VAR);
      },
      resolveTable() {
        return config.tableName ?? env.get(MIGRATIONS_TABLE_VAR) ?? DEFAULT_TABLE_NAME;
      }
    };
  }
};

export const DEFAULT_DRIVERS: readonly DriverDefinition[] = [postgresDriver];

export class DriverRegistry {
  private readonly definitions = new Map<string, DriverDefinition>();

  constructor(
    private readonly config: MigrateConfig,
    private readonly env: EnvironmentProvider,
    definitions: readonly DriverDefinition[] = DEFAULT_DRIVERS
  ) {
    for (const definition of definitions) {
      for (const kind of definition.kinds) {
        this.definitions.set(kind.toLowerCase(), definition);
      }
    }
  }

  /** Case-insensitive; undefined for drivers without overrides. */
  get(kind: string): DriverOverrides | undefined {
    const definition = this.definitions.get(kind.toLowerCase());
    return definition?.create(this.config, this.env);
  }

  kinds(): string[] {
    return Array.from(this.definitions.keys()).sort();
  }
}
