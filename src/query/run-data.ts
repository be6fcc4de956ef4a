import { mergeCurations } from "../curations/curation-merger.js";
import { indexDependencyPathsByRun } from "../dependencies/path-index.js";
import type { PackageCuration } from "../model/schema.js";
import type { PackageRunData, RunDependencyPath, RunId, RunPackage } from "../model/types.js";

export type RunDataSnapshot = {
  packages: RunPackage[];
  dependencyPaths: RunDependencyPath[];
  /** Resolved curations per run, already in application order. */
  curations: Map<RunId, PackageCuration[]>;
};

/**
 * Builds one curated, path-annotated view per package occurrence of the requested runs.
 * Occurrences from runs outside `runIds` are ignored.
 */
export function assemblePackageRunData(runIds: Iterable<RunId>, snapshot: RunDataSnapshot): PackageRunData[] {
  const requested = new Set(runIds);
  const pathIndexes = indexDependencyPathsByRun(
    snapshot.dependencyPaths.filter((entry) => requested.has(entry.runId)),
  );

  return snapshot.packages
    .filter((entry) => requested.has(entry.runId))
    .map((entry) => {
      const merged = mergeCurations(entry.pkg, snapshot.curations.get(entry.runId) ?? []);
      const view: PackageRunData = {
        pkg: merged.pkg,
        pkgId: entry.pkgId,
        runId: entry.runId,
        shortestDependencyPaths: pathIndexes.get(entry.runId)?.pathsFor(entry.pkg.identifier) ?? [],
        curations: merged.curations,
      };
      if (merged.concludedLicense !== undefined) {
        view.concludedLicense = merged.concludedLicense;
      }
      return view;
    });
}
