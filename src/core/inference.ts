import type { DefaultMigrationType, DefaultVersioning, MigrationType, VersioningScheme } from "../config/entity.js";

/** What the inferencer needs to know about an existing migration. */
export interface AuthoredMigration {
  version: bigint;
  type: MigrationType;
}

/**
 * Same type as the most recent migration, or `simple` when there is none.
 * `history` is ordered oldest first.
 */
export function inferMigrationType(history: readonly AuthoredMigration[]): MigrationType {
  const latest = history[history.length - 1];
  return latest ? latest.type : "simple";
}

/**
 * - no migrations, or a single migration at version 1: `sequential`
 * - last two versions differ by exactly 1: `sequential`
 * - anything else: `timestamp`
 */
export function inferVersioning(history: readonly AuthoredMigration[]): VersioningScheme {
  if (history.length === 0) {
    return "sequential";
  }
  const latest = history[history.length - 1];
  if (history.length === 1) {
    return latest.version === 1n ? "sequential" : "timestamp";
  }
  const previous = history[history.length - 2];
  return latest.version - previous.version === 1n ? "sequential" : "timestamp";
}

export function resolveMigrationType(
  configured: DefaultMigrationType,
  history: readonly AuthoredMigration[]
): MigrationType {
  return configured === "inferred" ? inferMigrationType(history) : configured;
}

export function resolveVersioning(
  configured: DefaultVersioning,
  history: readonly AuthoredMigration[]
): VersioningScheme {
  return configured === "inferred" ? inferVersioning(history) : configured;
}
