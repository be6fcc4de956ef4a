// Package query parameter parsing.
// Purpose: validate untyped sort/filter/pagination input into a typed PackageQuery.
// Assumes API and CLI layers pass their decoded request values straight through.

import { z, type ZodIssue } from "zod";

import { InvalidQueryError } from "../core/errors.js";
import { formatIssueLocation, formatSchemaIssues } from "../core/zod-issues.js";

import {
  ORDER_DIRECTIONS,
  PACKAGE_FIELDS,
  type OrderField,
  type PackageFilter,
} from "./fields.js";

// =============================================================================
// SCHEMA
// =============================================================================

const FieldSchema = z.enum(PACKAGE_FIELDS);

export const OrderFieldSchema = z
  .object({
    field: FieldSchema,
    direction: z.enum(ORDER_DIRECTIONS).default("ASCENDING"),
  })
  .strict();

export const PackageFilterSchema = z.discriminatedUnion("operator", [
  z.object({ field: FieldSchema, operator: z.literal("ILIKE"), value: z.string() }).strict(),
  z.object({ field: FieldSchema, operator: z.literal("IN"), value: z.array(z.string()) }).strict(),
]);

export const PackageQuerySchema = z
  .object({
    sort: z.array(OrderFieldSchema).default([]),
    filters: z.array(PackageFilterSchema).default([]),
    limit: z.number().int().nonnegative().nullable().default(null),
    offset: z.number().int().nonnegative().default(0),
  })
  .strict();

export type PackageQueryInput = z.input<typeof PackageQuerySchema>;

export type PackageQuery = {
  sort: OrderField[];
  filters: PackageFilter[];
  limit: number | null;
  offset: number;
};

export type QueryDefaults = {
  defaultSort?: OrderField[];
  maxLimit?: number;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function parsePackageQuery(input: unknown, defaults: QueryDefaults = {}): PackageQuery {
  const parsed = PackageQuerySchema.safeParse(input ?? {});
  if (!parsed.success) {
    throw toInvalidQueryError(parsed.error.issues);
  }

  const query: PackageQuery = {
    ...parsed.data,
    sort: parsed.data.sort.length > 0 ? parsed.data.sort : [...(defaults.defaultSort ?? [])],
  };
  assertPagination(query, defaults.maxLimit);
  return query;
}

export function assertPagination(query: Pick<PackageQuery, "limit" | "offset">, maxLimit?: number): void {
  const { limit, offset } = query;

  if (limit !== null && (!Number.isInteger(limit) || limit < 0)) {
    throw new InvalidQueryError(`limit must be a non-negative integer, received ${limit}.`, {
      field: "limit",
    });
  }
  if (!Number.isInteger(offset) || offset < 0) {
    throw new InvalidQueryError(`offset must be a non-negative integer, received ${offset}.`, {
      field: "offset",
    });
  }
  if (maxLimit !== undefined && limit !== null && limit > maxLimit) {
    throw new InvalidQueryError(`limit ${limit} exceeds the configured maximum of ${maxLimit}.`, {
      field: "limit",
    });
  }
}

// =============================================================================
// INTERNAL HELPERS
// =============================================================================

function toInvalidQueryError(issues: ZodIssue[]): InvalidQueryError {
  const [first] = issues;
  const message = formatSchemaIssues(issues).join("; ");
  if (!first) {
    return new InvalidQueryError("Invalid package query.");
  }

  const allowed =
    first.code === "invalid_enum_value"
      ? first.options.map(String)
      : first.code === "invalid_union_discriminator"
        ? first.options.map(String)
        : undefined;

  return new InvalidQueryError(message, { field: formatIssueLocation(first), allowed });
}
