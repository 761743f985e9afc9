import { existsSync, readdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import type { MigrationType, VersioningScheme } from "../config/entity.js";
import { InvalidMigrationNameError, MigrationExistsError } from "./errors.js";
import type { AuthoredMigration } from "./inference.js";

export type MigrationFileKind = "simple" | "up" | "down";

export interface MigrationFileName {
  version: bigint;
  description: string;
  kind: MigrationFileKind;
}

export interface MigrationSource extends AuthoredMigration {
  description: string;
  files: string[];
}

const FILENAME_PATTERN = /^(\d+)_(.+?)(?:\.(up|down))?\.sql$/;

export function parseMigrationFilename(fileName: string): MigrationFileName {
  const match = fileName.match(FILENAME_PATTERN);
  if (!match) {
    throw new InvalidMigrationNameError(fileName, "expected <VERSION>_<DESCRIPTION>.sql, .up.sql or .down.sql");
  }
  const [, version = "", description = "", direction] = match;
  return {
    version: BigInt(version),
    description,
    kind: direction === "up" || direction === "down" ? direction : "simple"
  };
}

/**
 * Migrations in `dir`, oldest first. Up/down pairs collapse into one
 * reversible entry. A missing directory has no migrations. Each version
 * belongs to exactly one migration.
 */
export function listMigrations(dir: string): MigrationSource[] {
  if (!existsSync(dir)) {
    return [];
  }

  const byVersion = new Map<bigint, MigrationSource>();
  const names = readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && entry.name.endsWith(".sql"))
    .map((entry) => entry.name)
    .sort();

  for (const name of names) {
    const parsed = parseMigrationFilename(name);
    const type: MigrationType = parsed.kind === "simple" ? "simple" : "reversible";
    const existing = byVersion.get(parsed.version);
    if (existing) {
      if (existing.type !== type) {
        throw new InvalidMigrationNameError(name, `version ${parsed.version} mixes simple and reversible files`);
      }
      if (existing.description !== parsed.description) {
        throw new InvalidMigrationNameError(
          name,
          `version ${parsed.version} is already used by "${existing.description}"`
        );
      }
      existing.files.push(join(dir, name));
      continue;
    }
    byVersion.set(parsed.version, {
      version: parsed.version,
      description: parsed.description,
      type,
      files: [join(dir, name)]
    });
  }

  return Array.from(byVersion.values()).sort((a, b) => (a.version < b.version ? -1 : a.version > b.version ? 1 : 0));
}

/** UTC `YYYYMMDDHHMMSS`. */
export function timestampVersion(now: Date = new Date()): string {
  return now.toISOString().replace(/[-:TZ.]/g, "").slice(0, 14);
}

export function nextVersion(scheme: VersioningScheme, history: readonly AuthoredMigration[], now: Date = new Date()): string {
  if (scheme === "timestamp") {
    return timestampVersion(now);
  }
  const latest = history[history.length - 1];
  const next = latest ? latest.version + 1n : 1n;
  return next.toString().padStart(4, "0");
}

/**
 * Normalise a human description into the file name part: trimmed, spaces
 * become underscores.
 */
export function migrationSlug(description: string): string {
  const trimmed = description.trim();
  if (!trimmed) {
    throw new InvalidMigrationNameError(description, "description is empty");
  }
  if (!/^[A-Za-z0-9_\- ]+$/.test(trimmed)) {
    throw new InvalidMigrationNameError(description, "only letters, digits, spaces, '-' and '_' are allowed");
  }
  return trimmed.replace(/\s+/g, "_");
}

export function migrationFileNames(version: string, slug: string, type: MigrationType): string[] {
  if (type === "reversible") {
    return [`${version}_${slug}.up.sql`, `${version}_${slug}.down.sql`];
  }
  return [`${version}_${slug}.sql`];
}

export function templateFor(fileName: string): string {
  if (fileName.endsWith(".up.sql")) {
    return "-- Add up migration script here\n";
  }
  if (fileName.endsWith(".down.sql")) {
    return "-- Add down migration script here\n";
  }
  return "-- Add migration script here\n";
}

/** Exclusive create; never overwrites. */
export function writeMigrationFile(filePath: string, content: string): void {
  try {
    writeFileSync(filePath, content, { encoding: "utf8", flag: "wx" });
  } catch (error) {
    if (isErrnoException(error) && error.code === "EEXIST") {
      throw new MigrationExistsError(filePath);
    }
    throw error;
  }
}

export function writeDefaultConfig(filePath: string): void {
  const content = `# migrakit configuration file

[migrate]
# Schemas to create before the tracking table is checked.
# create-schemas = ["app"]

# Tracking table (default: _sqlx_migrations, or $MIGRATIONS_TABLE).
# May be schema-qualified.
# table-name = "_sqlx_migrations"

# Directory containing migration files (default: migrations)
migrations-dir = "migrations"

# Characters dropped from migrations before they are hashed.
# Changing this changes the checksum of every existing migration.
# ignored-chars = ["\\r"]

[migrate.defaults]
# inferred | simple | reversible
migration-type = "inferred"
# inferred | timestamp | sequential
migration-versioning = "inferred"

[migrate.drivers.postgres]
# Schema of the tracking table (default: $MIGRATIONS_SCHEMA, then public)
# schema = "public"
`;

  writeFileSync(filePath, content, { encoding: "utf8", flag: "wx" });
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
