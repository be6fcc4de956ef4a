import { processDeclaredLicenses } from "../licenses/declared-license-processor.js";

import { RawPackageSchema, type Identifier, type RawPackage, type ShortestDependencyPath } from "./schema.js";
import type { RunDependencyPath, RunId, RunPackage } from "./types.js";

export function identifier(type: string, namespace: string, name: string, version: string): Identifier {
  return { type, namespace, name, version };
}

/** A raw package whose processed declared license is consistent with its declared licenses. */
export function generatePackage(id: Identifier, overrides: Partial<Omit<RawPackage, "identifier">> = {}): RawPackage {
  const declaredLicenses = overrides.declaredLicenses ?? [];
  return RawPackageSchema.parse({
    identifier: id,
    processedDeclaredLicense: processDeclaredLicenses(declaredLicenses),
    ...overrides,
  });
}

export function runPackage(runId: RunId, pkgId: number, pkg: RawPackage): RunPackage {
  return { runId, pkgId, pkg };
}

export function runPath(
  runId: RunId,
  packageIdentifier: Identifier,
  projectIdentifier: Identifier,
  scope: string,
  path: Identifier[] = [],
): RunDependencyPath {
  const shortestPath: ShortestDependencyPath = { projectIdentifier, scope, path };
  return { runId, packageIdentifier, path: shortestPath };
}
