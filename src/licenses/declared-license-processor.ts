// Declared license processing.
// Purpose: turn a package's declared licenses plus a declared-license mapping into one SPDX expression.
// Assumes mapping values are SPDX fragments supplied by analyzers or curations and are used verbatim.

import spdxParse from "spdx-expression-parse";

import { compareStrings } from "../model/identifier.js";
import type { ProcessedDeclaredLicense } from "../model/schema.js";

export type DeclaredLicenseMapping = Record<string, string>;

const LICENSE_REF_PREFIX = "LicenseRef-";

// =============================================================================
// PUBLIC API
// =============================================================================

export function processDeclaredLicenses(
  declaredLicenses: Iterable<string>,
  mapping: DeclaredLicenseMapping = {},
): ProcessedDeclaredLicense {
  const mappedLicenses: DeclaredLicenseMapping = {};
  const unmappedLicenses: string[] = [];

  // Keys and unmapped entries keep the declared spelling; only the expression is trimmed.
  for (const license of distinctSorted(declaredLicenses)) {
    const mapped = lookupMapping(mapping, license);
    if (mapped) {
      mappedLicenses[license] = mapped;
    } else {
      unmappedLicenses.push(license);
    }
  }

  const components = new Set<string>(Object.values(mappedLicenses));
  for (const license of unmappedLicenses) {
    const trimmed = license.trim();
    if (trimmed.length > 0) {
      components.add(toLicenseReference(trimmed));
    }
  }

  return {
    spdxExpression: conjoin(Array.from(components).sort(compareStrings)),
    mappedLicenses,
    unmappedLicenses,
  };
}

/** Keeps parseable SPDX expressions verbatim and wraps anything else as a `LicenseRef-`. */
export function toLicenseReference(license: string): string {
  if (isSpdxExpression(license)) {
    return license;
  }

  return `${LICENSE_REF_PREFIX}${license.replace(/[^A-Za-z0-9.-]/g, "-")}`;
}

export function isSpdxExpression(value: string): boolean {
  try {
    spdxParse(value);
    return true;
  } catch {
    return false;
  }
}

// =============================================================================
// INTERNAL HELPERS
// =============================================================================

function distinctSorted(licenses: Iterable<string>): string[] {
  return Array.from(new Set(licenses)).sort(compareStrings);
}

// Exact key first, then the trimmed spelling.
function lookupMapping(mapping: DeclaredLicenseMapping, license: string): string | undefined {
  for (const key of [license, license.trim()]) {
    if (Object.hasOwn(mapping, key)) {
      const mapped = mapping[key]?.trim();
      if (mapped) return mapped;
    }
  }
  return undefined;
}

function conjoin(components: string[]): string {
  if (components.length === 1) {
    return components[0] ?? "";
  }
  return components.map((component) => (hasTopLevelOr(component) ? `(${component})` : component)).join(" AND ");
}

function hasTopLevelOr(expression: string): boolean {
  let depth = 0;
  for (const token of expression.split(/(\(|\)|\s+)/)) {
    if (token === "(") depth += 1;
    else if (token === ")") depth -= 1;
    else if (depth === 0 && token.toUpperCase() === "OR") return true;
  }
  return false;
}
