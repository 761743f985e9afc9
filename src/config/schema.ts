import { z } from "zod";
import { DEFAULT_MIGRATION_TYPES, DEFAULT_VERSIONINGS } from "./entity.js";

const singleCharSchema = z
  .string()
  .refine((value) => Array.from(value).length === 1, { message: "Expected exactly one character" });

export const postgresSectionSchema = z
  .object({
    schema: z.string().optional()
  })
  .strict();

export const driversSectionSchema = z
  .object({
    postgres: postgresSectionSchema.optional()
  })
  .strict();

// Unknown keys are dropped here rather than rejected.
export const defaultsSectionSchema = z.object({
  "migration-type": z.enum(DEFAULT_MIGRATION_TYPES).optional(),
  "migration-versioning": z.enum(DEFAULT_VERSIONINGS).optional()
});

export const migrateSectionSchema = z
  .object({
    "create-schemas": z.array(z.string()).optional(),
    "table-name": z.string().optional(),
    "migrations-dir": z.string().optional(),
    "ignored-chars": z.array(singleCharSchema).optional(),
    defaults: defaultsSectionSchema.optional(),
    drivers: driversSectionSchema.optional()
  })
  .strict();

/** Other top-level tables belong to other tools and are ignored. */
export const configFileSchema = z.object({
  migrate: migrateSectionSchema.optional()
});

export type ConfigFile = z.infer<typeof configFileSchema>;
export type MigrateSection = z.infer<typeof migrateSectionSchema>;

export function formatIssuePath(path: ReadonlyArray<string | number>): string {
  return path.length === 0 ? "(root)" : path.join(".");
}
