import { InvalidQueryError } from "../core/errors.js";
import type { RunId } from "../model/types.js";

// Raw shapes handed to parsePackageQuery, which owns field/operator validation.

export type RawSortArg = { field: string; direction: string };

export type RawFilterArg = { field: string; operator: string; value: string | string[] };

const DIRECTION_ALIASES: Record<string, string> = {
  asc: "ASCENDING",
  ascending: "ASCENDING",
  desc: "DESCENDING",
  descending: "DESCENDING",
};

export function collectValues(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function parseRunIds(values: string[]): RunId[] {
  return values.flatMap((value) =>
    value
      .split(",")
      .map((part) => part.trim())
      .filter(Boolean)
      .map((part) => {
        if (!/^\d+$/.test(part)) {
          throw new InvalidQueryError(`Run id "${part}" is not a non-negative integer.`, { field: "runIds" });
        }
        return Number(part);
      }),
  );
}

/** `field` or `field:asc|desc`. */
export function parseSortArg(value: string): RawSortArg {
  const [field = "", direction = "asc"] = value.split(":", 2);
  const normalized = DIRECTION_ALIASES[direction.trim().toLowerCase()];
  if (!normalized) {
    throw new InvalidQueryError(`Unknown sort direction "${direction}" in "${value}".`, {
      field: "sort",
      allowed: ["asc", "desc"],
    });
  }
  return { field: field.trim(), direction: normalized };
}

/** `field:operator:value`; the value keeps any further colons, IN values are comma separated. */
export function parseFilterArg(value: string): RawFilterArg {
  const first = value.indexOf(":");
  const second = first >= 0 ? value.indexOf(":", first + 1) : -1;
  if (first <= 0 || second < 0) {
    throw new InvalidQueryError(`Filter "${value}" must look like field:operator:value.`, {
      field: "filters",
    });
  }

  const field = value.slice(0, first).trim();
  const operator = value.slice(first + 1, second).trim().toUpperCase();
  const raw = value.slice(second + 1);

  if (operator === "IN") {
    return {
      field,
      operator,
      value: raw
        .split(",")
        .map((part) => part.trim())
        .filter(Boolean),
    };
  }

  return { field, operator, value: raw };
}

export function parseIntegerOption(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  return /^-?\d+$/.test(value.trim()) ? Number(value.trim()) : Number.NaN;
}
