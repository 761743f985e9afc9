import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { Mock, MockInstance } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createHash } from "node:crypto";
import { createCli } from "../../src/cli.js";
import { staticEnvironment } from "../../src/config/env.js";
import { ExitCode } from "../../src/core/errors.js";

describe("CLI", () => {
  let cwd: string;
  let exit: Mock<(code: number) => void>;
  let log: MockInstance<typeof console.log>;

  function run(args: string[], env = staticEnvironment()): Promise<unknown> {
    return createCli(args, { cwd, env, exit })
      .parseAsync()
      .catch(() => undefined);
  }

  beforeEach(() => {
    cwd = mkdtempSync(join(tmpdir(), "migrakit-cli-"));
    exit = vi.fn<(code: number) => void>();
    log = vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(cwd, { recursive: true, force: true });
  });

  describe("config", () => {
    it("prints effective settings as JSON", async () => {
      writeFileSync(
        join(cwd, "migrakit.toml"),
        `[migrate]\ntable-name = "tracking"\nignored-chars = ["\\r"]\n\n[migrate.drivers.postgres]\nschema = "app"\n`
      );

      await run(["config", "--json"]);

      expect(exit).not.toHaveBeenCalled();
      expect(log).toHaveBeenCalledTimes(1);
      expect(JSON.parse(String(log.mock.calls[0]?.[0]))).toEqual({
        source: join(cwd, "migrakit.toml"),
        driver: "postgres",
        migrationsDir: join(cwd, "migrations"),
        tableName: "app.tracking",
        schema: "app",
        createSchemas: [],
        ignoredChars: ["\r"],
        defaults: { migrationType: "inferred", migrationVersioning: "inferred" }
      });
    });

    it("uses environment fallbacks when there is no file", async () => {
      await run(["config", "mysql", "--json"], staticEnvironment({ MIGRATIONS_TABLE: "env_table" }));

      const settings = JSON.parse(String(log.mock.calls[0]?.[0]));
      expect(settings.source).toBeNull();
      expect(settings.driver).toBe("mysql");
      expect(settings.tableName).toBe("env_table");
      expect(settings.schema).toBeUndefined();
    });

    it("exits with the config error code on unknown keys", async () => {
      writeFileSync(join(cwd, "migrakit.toml"), `[migrate]\ntable = "x"\n`);

      await run(["config"]);

      expect(exit).toHaveBeenCalledWith(ExitCode.PARSE_CONFIG_ERROR);
    });
  });

  describe("add", () => {
    it("creates a migration in the configured directory", async () => {
      writeFileSync(join(cwd, "migrakit.toml"), `[migrate]\nmigrations-dir = "db"\n`);

      await run(["add", "create users"]);

      const file = join(cwd, "db", "0001_create_users.sql");
      expect(exit).not.toHaveBeenCalled();
      expect(existsSync(file)).toBe(true);
      expect(log).toHaveBeenCalledWith(file);
    });

    it("honours --reversible and --dir", async () => {
      await run(["add", "seed", "--reversible", "--dir", "custom"]);

      expect(existsSync(join(cwd, "custom", "0001_seed.up.sql"))).toBe(true);
      expect(existsSync(join(cwd, "custom", "0001_seed.down.sql"))).toBe(true);
    });

    it("exits with the invalid name code for unusable descriptions", async () => {
      await run(["add", "bad;name"]);

      expect(exit).toHaveBeenCalledWith(ExitCode.INVALID_MIGRATION_NAME);
    });
  });

  describe("checksum", () => {
    it("hashes after dropping ignored characters", async () => {
      writeFileSync(join(cwd, "migrakit.toml"), `[migrate]\nignored-chars = ["\\r"]\n`);
      writeFileSync(join(cwd, "0001_init.sql"), "SELECT 1;\r\n");

      await run(["checksum", "0001_init.sql"]);

      const expected = createHash("sha256").update("SELECT 1;\n", "utf8").digest("hex");
      expect(log).toHaveBeenCalledWith(expected);
    });
  });

  describe("init-config", () => {
    it("writes migrakit.toml once", async () => {
      await run(["init-config"]);

      expect(readFileSync(join(cwd, "migrakit.toml"), "utf8")).toContain("[migrate.drivers.postgres]\n");
      expect(exit).not.toHaveBeenCalled();
      expect(log).toHaveBeenLastCalledWith(
        expect.stringContaining("Run `migrakit config` to check the effective settings.")
      );

      await run(["init-config"]);

      expect(exit).toHaveBeenCalledWith(ExitCode.PARSE_CONFIG_ERROR);
    });
  });
});
