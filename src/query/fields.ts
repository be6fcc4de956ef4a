// Package query fields.
// Purpose: map each sortable/filterable field tag to its comparator and filter candidates.
// Assumes callers validated field names at the boundary (see query-parameters.ts).

import {
  compareIdentifiers,
  compareStrings,
  toCompactIdentifierString,
  toIdentifierString,
} from "../model/identifier.js";
import type { PackageRunData } from "../model/types.js";

// =============================================================================
// FIELD + OPERATOR TAGS
// =============================================================================

export const PACKAGE_FIELDS = ["identifier", "purl", "processedDeclaredLicense"] as const;

export type PackageField = (typeof PACKAGE_FIELDS)[number];

export const COMPARISON_OPERATORS = ["ILIKE", "IN"] as const;

export type ComparisonOperator = (typeof COMPARISON_OPERATORS)[number];

export const ORDER_DIRECTIONS = ["ASCENDING", "DESCENDING"] as const;

export type OrderDirection = (typeof ORDER_DIRECTIONS)[number];

export type OrderField = {
  field: PackageField;
  direction: OrderDirection;
};

export type PackageFilter =
  | { field: PackageField; operator: "ILIKE"; value: string }
  | { field: PackageField; operator: "IN"; value: string[] };

// =============================================================================
// FIELD TABLE
// =============================================================================

export type FieldDefinition = {
  compare: (left: PackageRunData, right: PackageRunData) => number;
  /** Strings a filter on this field is evaluated against; any match counts. */
  candidates: (view: PackageRunData) => string[];
  /** Applied to both sides of an IN comparison. */
  normalize: (value: string) => string;
};

const identity = (value: string): string => value;

export const FIELD_TABLE: Record<PackageField, FieldDefinition> = {
  identifier: {
    compare: (left, right) => compareIdentifiers(left.pkg.identifier, right.pkg.identifier),
    candidates: (view) => {
      const full = toIdentifierString(view.pkg.identifier);
      const compact = toCompactIdentifierString(view.pkg.identifier);
      return full === compact ? [full] : [full, compact];
    },
    normalize: identity,
  },
  purl: {
    compare: (left, right) => compareStrings(purlSortKey(left.pkg.purl), purlSortKey(right.pkg.purl)),
    candidates: (view) => [view.pkg.purl],
    normalize: (value) => value.toLowerCase(),
  },
  processedDeclaredLicense: {
    compare: (left, right) =>
      compareStrings(
        left.pkg.processedDeclaredLicense.spdxExpression,
        right.pkg.processedDeclaredLicense.spdxExpression,
      ),
    candidates: (view) => [view.pkg.processedDeclaredLicense.spdxExpression],
    normalize: identity,
  },
};

// `/` and `@` must sort below every name character, so `name@1.0` precedes `name2@1.0`.
function purlSortKey(purl: string): string {
  return purl.replace(/[/@]/g, (separator) => (separator === "/" ? "\u0001" : "\u0002"));
}

// =============================================================================
// PREDICATES + COMPARATORS
// =============================================================================

export function createFilterPredicate(filter: PackageFilter): (view: PackageRunData) => boolean {
  const definition = FIELD_TABLE[filter.field];

  if (filter.operator === "ILIKE") {
    const pattern = likePatternToRegExp(filter.value);
    return (view) => definition.candidates(view).some((candidate) => pattern.test(candidate));
  }

  const accepted = new Set(filter.value.map(definition.normalize));
  return (view) => definition.candidates(view).some((candidate) => accepted.has(definition.normalize(candidate)));
}

/** Chains the requested order and falls back to identifier order for ties. */
export function createComparator(sort: OrderField[]): (left: PackageRunData, right: PackageRunData) => number {
  const steps = sort.map(({ field, direction }) => {
    const compare = FIELD_TABLE[field].compare;
    return direction === "DESCENDING"
      ? (left: PackageRunData, right: PackageRunData) => compare(right, left)
      : compare;
  });

  return (left, right) => {
    for (const step of steps) {
      const result = step(left, right);
      if (result !== 0) return result;
    }
    return FIELD_TABLE.identifier.compare(left, right);
  };
}

/**
 * Case-insensitive containment match; `%` matches any run of characters and `_` a single one.
 */
export function likePatternToRegExp(pattern: string): RegExp {
  let source = "";
  for (const char of pattern) {
    if (char === "%") source += ".*";
    else if (char === "_") source += ".";
    else source += char.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");
  }
  return new RegExp(source, "is");
}
