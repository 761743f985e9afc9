/** Fallback for the tracking table name when the config file is silent. */
export const MIGRATIONS_TABLE_VAR = "MIGRATIONS_TABLE";

/** Fallback for the PostgreSQL tracking table schema when the config file is silent. */
export const MIGRATIONS_SCHEMA_VAR = "MIGRATIONS_SCHEMA";

/**
 * Read-only view over named environment values.
 *
 * The resolver and the default config constructors only ever see the
 * environment through this interface, so the process table can be swapped
 * for a fixed map in tests.
 */
export interface EnvironmentProvider {
  get(name: string): string | undefined;
}

export function processEnvironment(env: NodeJS.ProcessEnv = process.env): EnvironmentProvider {
  return {
    get(name: string): string | undefined {
      return env[name];
    }
  };
}

export function staticEnvironment(values: Readonly<Record<string, string | undefined>> = {}): EnvironmentProvider {
  const snapshot = { ...values };
  return {
    get(name: string): string | undefined {
      return Object.prototype.hasOwnProperty.call(snapshot, name) ? snapshot[name] : undefined;
    }
  };
}
