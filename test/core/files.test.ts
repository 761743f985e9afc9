import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  listMigrations,
  migrationFileNames,
  migrationSlug,
  nextVersion,
  parseMigrationFilename,
  templateFor,
  timestampVersion,
  writeDefaultConfig,
  writeMigrationFile
} from "../../src/core/files.js";
import { InvalidMigrationNameError, MigrationExistsError } from "../../src/core/errors.js";
import { parseConfig } from "../../src/config/loader.js";
import { staticEnvironment } from "../../src/config/env.js";

interface TestContext {
  tempDir: string;
}

describe("parseMigrationFilename", () => {
  it("parses simple migrations", () => {
    expect(parseMigrationFilename("0001_create_users.sql")).toEqual({
      version: 1n,
      description: "create_users",
      kind: "simple"
    });
  });

  it("parses up and down files", () => {
    expect(parseMigrationFilename("20240101120000_add_index.up.sql")).toEqual({
      version: 20240101120000n,
      description: "add_index",
      kind: "up"
    });
    expect(parseMigrationFilename("20240101120000_add_index.down.sql").kind).toBe("down");
  });

  it("rejects names without a version", () => {
    expect(() => parseMigrationFilename("readme.sql")).toThrow(InvalidMigrationNameError);
  });
});

describe("listMigrations", () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = { tempDir: mkdtempSync(join(tmpdir(), "migrakit-files-test-")) };
  });

  afterEach(() => {
    rmSync(ctx.tempDir, { recursive: true, force: true });
  });

  it("returns nothing for a missing directory", () => {
    expect(listMigrations(join(ctx.tempDir, "absent"))).toEqual([]);
  });

  it("groups reversible pairs and orders by version", () => {
    writeFileSync(join(ctx.tempDir, "0010_b.up.sql"), "");
    writeFileSync(join(ctx.tempDir, "0010_b.down.sql"), "");
    writeFileSync(join(ctx.tempDir, "0002_a.sql"), "");
    writeFileSync(join(ctx.tempDir, "notes.txt"), "");
    mkdirSync(join(ctx.tempDir, "0003_dir.sql"));

    expect(listMigrations(ctx.tempDir)).toEqual([
      { version: 2n, description: "a", type: "simple", files: [join(ctx.tempDir, "0002_a.sql")] },
      {
        version: 10n,
        description: "b",
        type: "reversible",
        files: [join(ctx.tempDir, "0010_b.down.sql"), join(ctx.tempDir, "0010_b.up.sql")]
      }
    ]);
  });

  it("rejects a version with both simple and reversible files", () => {
    writeFileSync(join(ctx.tempDir, "0001_a.sql"), "");
    writeFileSync(join(ctx.tempDir, "0001_a.up.sql"), "");

    expect(() => listMigrations(ctx.tempDir)).toThrow(/mixes simple and reversible files/);
  });

  it("rejects two simple migrations sharing a version", () => {
    writeFileSync(join(ctx.tempDir, "20240102030405_a.sql"), "");
    writeFileSync(join(ctx.tempDir, "20240102030405_b.sql"), "");

    expect(() => listMigrations(ctx.tempDir)).toThrow(
      'Invalid migration name "20240102030405_b.sql": version 20240102030405 is already used by "a"'
    );
  });

  it("rejects reversible files of different migrations sharing a version", () => {
    writeFileSync(join(ctx.tempDir, "0003_a.up.sql"), "");
    writeFileSync(join(ctx.tempDir, "0003_b.down.sql"), "");

    expect(() => listMigrations(ctx.tempDir)).toThrow(InvalidMigrationNameError);
  });
});

describe("nextVersion", () => {
  const now = new Date(Date.UTC(2024, 0, 2, 3, 4, 5));

  it("formats timestamps in UTC", () => {
    expect(timestampVersion(now)).toBe("20240102030405");
    expect(nextVersion("timestamp", [], now)).toBe("20240102030405");
  });

  it("starts sequential numbering at 1", () => {
    expect(nextVersion("sequential", [], now)).toBe("0001");
  });

  it("continues after the latest version", () => {
    expect(nextVersion("sequential", [{ version: 41n, type: "simple" }], now)).toBe("0042");
    expect(nextVersion("sequential", [{ version: 12345n, type: "simple" }], now)).toBe("12346");
  });
});

describe("migration names", () => {
  it("turns descriptions into slugs", () => {
    expect(migrationSlug("  add users table ")).toBe("add_users_table");
    expect(migrationSlug("add-index")).toBe("add-index");
  });

  it("rejects empty or unsafe descriptions", () => {
    expect(() => migrationSlug("   ")).toThrow("description is empty");
    expect(() => migrationSlug("drop;table")).toThrow(InvalidMigrationNameError);
  });

  it("builds file names per type", () => {
    expect(migrationFileNames("0003", "seed", "simple")).toEqual(["0003_seed.sql"]);
    expect(migrationFileNames("0003", "seed", "reversible")).toEqual(["0003_seed.up.sql", "0003_seed.down.sql"]);
  });

  it("picks a template per file kind", () => {
    expect(templateFor("0003_seed.sql")).toBe("-- Add migration script here\n");
    expect(templateFor("0003_seed.up.sql")).toBe("-- Add up migration script here\n");
    expect(templateFor("0003_seed.down.sql")).toBe("-- Add down migration script here\n");
  });
});

describe("writing files", () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = { tempDir: mkdtempSync(join(tmpdir(), "migrakit-write-test-")) };
  });

  afterEach(() => {
    rmSync(ctx.tempDir, { recursive: true, force: true });
  });

  it("refuses to overwrite a migration", () => {
    const filePath = join(ctx.tempDir, "0001_a.sql");
    writeMigrationFile(filePath, "first\n");

    expect(() => writeMigrationFile(filePath, "second\n")).toThrow(MigrationExistsError);
    expect(readFileSync(filePath, "utf8")).toBe("first\n");
  });

  it("writes a default config that parses", () => {
    const filePath = join(ctx.tempDir, "migrakit.toml");
    writeDefaultConfig(filePath);

    const config = parseConfig(readFileSync(filePath, "utf8"), filePath, staticEnvironment());

    expect(config.migrationsDir).toBe("migrations");
    expect(config.defaults).toEqual({ migrationType: "inferred", migrationVersioning: "inferred" });
    expect(config.drivers.postgres.schema).toBeUndefined();
    expect(() => writeDefaultConfig(filePath)).toThrow(/EEXIST/);
  });
});
