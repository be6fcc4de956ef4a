import semver from "semver";

import type { Identifier } from "./schema.js";

// =============================================================================
// IDENTITY + ORDER
// =============================================================================

/** Stable hash key; equal keys mean the same package within and across runs. */
export function identifierKey(id: Identifier): string {
  return JSON.stringify([id.type, id.namespace, id.name, id.version]);
}

export function compareIdentifiers(left: Identifier, right: Identifier): number {
  return (
    compareStrings(left.type, right.type) ||
    compareStrings(left.namespace, right.namespace) ||
    compareStrings(left.name, right.name) ||
    compareStrings(left.version, right.version)
  );
}

// Code-unit order, independent of the host locale.
export function compareStrings(left: string, right: string): number {
  if (left === right) return 0;
  return left < right ? -1 : 1;
}

// =============================================================================
// STRING FORMS
// =============================================================================

export function toPurl(id: Identifier): string {
  const segments = id.namespace
    .split("/")
    .filter((segment) => segment.length > 0)
    .map((segment) => encodeURIComponent(segment));
  segments.push(encodeURIComponent(id.name));

  const version = id.version ? `@${encodeURIComponent(id.version)}` : "";
  return `pkg:${id.type}/${segments.join("/")}${version}`;
}

/** `type:namespace/name@version`, the form identifier filters match against. */
export function toIdentifierString(id: Identifier): string {
  return `${id.type}:${id.namespace}/${id.name}@${id.version}`;
}

/** `type:name@version` for packages without a namespace, otherwise the full form. */
export function toCompactIdentifierString(id: Identifier): string {
  if (id.namespace.length === 0) {
    return `${id.type}:${id.name}@${id.version}`;
  }
  return toIdentifierString(id);
}

/**
 * Parses the compact and full string forms back into an identifier.
 * Returns null when the value lacks a type or a name.
 */
export function parseIdentifierString(value: string): Identifier | null {
  const colon = value.indexOf(":");
  if (colon <= 0) return null;

  const type = value.slice(0, colon);
  let rest = value.slice(colon + 1);

  let version = "";
  const at = rest.lastIndexOf("@");
  if (at > 0) {
    version = rest.slice(at + 1);
    rest = rest.slice(0, at);
  }

  const slash = rest.lastIndexOf("/");
  const namespace = slash >= 0 ? rest.slice(0, slash) : "";
  const name = slash >= 0 ? rest.slice(slash + 1) : rest;
  if (name.length === 0) return null;

  return { type, namespace, name, version };
}

// =============================================================================
// CURATION APPLICABILITY
// =============================================================================

const VERSION_RANGE_MARKERS = /[\s<>=^~*|]/;

/**
 * A curation applies when type (case-insensitive), namespace and name match and its
 * version is empty, identical, or a semver range the package version satisfies.
 */
export function isCurationApplicable(curationId: Identifier, packageId: Identifier): boolean {
  if (curationId.type.toLowerCase() !== packageId.type.toLowerCase()) return false;
  if (curationId.namespace !== packageId.namespace) return false;
  if (curationId.name !== packageId.name) return false;

  const range = curationId.version.trim();
  if (range.length === 0 || range === packageId.version) return true;
  if (!VERSION_RANGE_MARKERS.test(range) || semver.validRange(range, { loose: true }) === null) {
    return false;
  }

  return semver.satisfies(packageId.version, range, { loose: true });
}
