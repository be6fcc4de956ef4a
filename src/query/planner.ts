// Package query planner.
// Purpose: filter per-run occurrences, keep one match per identifier, then sort and paginate.
// Assumes views come from assemblePackageRunData for the requested runs only.

import { identifierKey } from "../model/identifier.js";
import type { ListQueryResult, PackageRunData } from "../model/types.js";

import { createComparator, createFilterPredicate } from "./fields.js";
import { assertPagination, type PackageQuery } from "./query-parameters.js";

// =============================================================================
// PUBLIC API
// =============================================================================

export function listPackages(
  views: PackageRunData[],
  query: PackageQuery,
): ListQueryResult<PackageRunData> {
  assertPagination(query);

  const predicates = query.filters.map(createFilterPredicate);
  const matches = selectRepresentatives(
    views.filter((view) => predicates.every((predicate) => predicate(view))),
  );

  matches.sort(createComparator(query.sort));

  const end = query.limit === null ? undefined : query.offset + query.limit;
  return {
    data: matches.slice(query.offset, end),
    totalCount: matches.length,
  };
}

/**
 * Keeps one view per identifier: the occurrence from the lowest run id, then the lowest
 * package key. Its curations and dependency paths are the ones reported. Applied after
 * filtering, so an occurrence that matches is never hidden by one that does not.
 */
export function selectRepresentatives(views: PackageRunData[]): PackageRunData[] {
  const chosen = new Map<string, PackageRunData>();

  for (const view of views) {
    const key = identifierKey(view.pkg.identifier);
    const current = chosen.get(key);
    if (!current || precedes(view, current)) {
      chosen.set(key, view);
    }
  }

  return Array.from(chosen.values());
}

function precedes(candidate: PackageRunData, current: PackageRunData): boolean {
  if (candidate.runId !== current.runId) {
    return candidate.runId < current.runId;
  }
  return candidate.pkgId < current.pkgId;
}
