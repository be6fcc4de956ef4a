import { compareStrings, identifierKey } from "../model/identifier.js";
import type { Identifier } from "../model/schema.js";
import type { EcosystemStats, PackageRunData } from "../model/types.js";

// Each aggregator counts a package once, however many of the runs contain it.

export function countDistinctPackages(identifiers: Iterable<Identifier>): number {
  return distinctIdentifiers(identifiers).length;
}

export function countEcosystems(identifiers: Iterable<Identifier>): EcosystemStats[] {
  const counts = new Map<string, number>();
  for (const identifier of distinctIdentifiers(identifiers)) {
    counts.set(identifier.type, (counts.get(identifier.type) ?? 0) + 1);
  }

  return Array.from(counts, ([name, count]) => ({ name, count })).sort((left, right) =>
    compareStrings(left.name, right.name),
  );
}

/** Distinct curated SPDX expressions over every occurrence; empty expressions are skipped. */
export function distinctProcessedLicenses(views: Iterable<PackageRunData>): string[] {
  const licenses = new Set<string>();
  for (const view of views) {
    const expression = view.pkg.processedDeclaredLicense.spdxExpression;
    if (expression.length > 0) {
      licenses.add(expression);
    }
  }
  return Array.from(licenses).sort(compareStrings);
}

function distinctIdentifiers(identifiers: Iterable<Identifier>): Identifier[] {
  const unique = new Map<string, Identifier>();
  for (const identifier of identifiers) {
    unique.set(identifierKey(identifier), identifier);
  }
  return Array.from(unique.values());
}
