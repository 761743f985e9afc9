import { existsSync, mkdirSync, rmSync } from "node:fs";
import { join } from "node:path";
import type { MigrationDefaults, MigrationType, VersioningScheme } from "../config/entity.js";
import { listMigrations, migrationFileNames, migrationSlug, nextVersion, templateFor, writeMigrationFile } from "./files.js";
import { MigrationExistsError } from "./errors.js";
import { resolveMigrationType, resolveVersioning } from "./inference.js";

export type AddMigrationOptions = {
  dir: string;
  description: string;
  defaults: MigrationDefaults;
  /** Flag values; win over `defaults`. */
  type?: MigrationType;
  versioning?: VersioningScheme;
  now?: Date;
};

export type AddedMigration = {
  version: string;
  type: MigrationType;
  versioning: VersioningScheme;
  files: string[];
};

/**
 * Create the file(s) for a new migration in `dir`.
 *
 * Type and versioning come from the explicit option, then the configured
 * default, then inference from the migrations already in `dir`. Nothing is
 * written when the version is taken or any target file exists; a pair left
 * half-written by a failed write is removed again.
 */
export function addMigration(opts: AddMigrationOptions): AddedMigration {
  const slug = migrationSlug(opts.description);
  const history = listMigrations(opts.dir);

  const type = opts.type ?? resolveMigrationType(opts.defaults.migrationType, history);
  const versioning = opts.versioning ?? resolveVersioning(opts.defaults.migrationVersioning, history);
  const version = nextVersion(versioning, history, opts.now);

  const taken = history.find((migration) => migration.version === BigInt(version));
  if (taken) {
    throw new MigrationExistsError(taken.files[0] ?? join(opts.dir, version));
  }

  const files = migrationFileNames(version, slug, type).map((name) => join(opts.dir, name));
  const existing = files.find((file) => existsSync(file));
  if (existing) {
    throw new MigrationExistsError(existing);
  }

  mkdirSync(opts.dir, { recursive: true });
  const written: string[] = [];
  try {
    for (const file of files) {
      writeMigrationFile(file, templateFor(file));
      written.push(file);
    }
  } catch (error) {
    for (const file of written) {
      rmSync(file, { force: true });
    }
    throw error;
  }

  return { version, type, versioning, files };
}
