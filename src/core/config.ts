import { z } from "zod";

import { PACKAGE_FIELDS } from "../query/fields.js";

// Directions are written lower-case in YAML and mapped to the query tags.
const DIRECTION_ALIASES = {
  asc: "ASCENDING",
  desc: "DESCENDING",
} as const;

export const SortEntrySchema = z
  .object({
    field: z.enum(PACKAGE_FIELDS),
    direction: z
      .enum(["asc", "desc"])
      .default("asc")
      .transform((value) => DIRECTION_ALIASES[value]),
  })
  .strict();

export const QueryConfigSchema = z
  .object({
    max_limit: z.number().int().positive().optional(),
    default_sort: z.array(SortEntrySchema).default([]),
  })
  .strict();

export const LoggingConfigSchema = z
  .object({
    file: z.string().min(1).optional(),
  })
  .strict();

export const EngineConfigSchema = z
  .object({
    query: QueryConfigSchema.default({}),
    logging: LoggingConfigSchema.default({}),
  })
  .strict();

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

export function createDefaultConfig(): EngineConfig {
  return EngineConfigSchema.parse({});
}
