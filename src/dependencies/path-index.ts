import { identifierKey } from "../model/identifier.js";
import type { Identifier, ShortestDependencyPath } from "../model/schema.js";
import type { RunDependencyPath, RunId } from "../model/types.js";

/** Shortest dependency paths grouped by the package they end at, in input order. */
export class DependencyPathIndex {
  private readonly byPackage = new Map<string, ShortestDependencyPath[]>();

  constructor(entries: Iterable<{ packageIdentifier: Identifier; path: ShortestDependencyPath }> = []) {
    for (const entry of entries) {
      const key = identifierKey(entry.packageIdentifier);
      const existing = this.byPackage.get(key);
      if (existing) {
        existing.push(entry.path);
      } else {
        this.byPackage.set(key, [entry.path]);
      }
    }
  }

  /** Fresh copies; callers may mutate them without touching the index. */
  pathsFor(identifier: Identifier): ShortestDependencyPath[] {
    return (this.byPackage.get(identifierKey(identifier)) ?? []).map((entry) => ({
      projectIdentifier: { ...entry.projectIdentifier },
      scope: entry.scope,
      path: entry.path.map((step) => ({ ...step })),
    }));
  }

  get size(): number {
    return this.byPackage.size;
  }
}

export function indexDependencyPaths(
  entries: Iterable<{ packageIdentifier: Identifier; path: ShortestDependencyPath }>,
): DependencyPathIndex {
  return new DependencyPathIndex(entries);
}

/** One index per run, so paths never leak between runs that share a package. */
export function indexDependencyPathsByRun(paths: RunDependencyPath[]): Map<RunId, DependencyPathIndex> {
  const grouped = new Map<RunId, RunDependencyPath[]>();
  for (const entry of paths) {
    const existing = grouped.get(entry.runId) ?? [];
    existing.push(entry);
    grouped.set(entry.runId, existing);
  }

  const indexes = new Map<RunId, DependencyPathIndex>();
  for (const [runId, entries] of grouped) {
    indexes.set(runId, new DependencyPathIndex(entries));
  }
  return indexes;
}
