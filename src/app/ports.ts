/**
 * Data source port for the package query engine.
 * Purpose: the narrow surface through which stored run data reaches the engine.
 * Assumptions: each call returns a consistent snapshot; failures propagate to the caller unchanged.
 * Usage: implement over a database or a snapshot file and pass to PackageService.
 */

import type { PackageCuration } from "../model/schema.js";
import type { RunDependencyPath, RunId, RunPackage } from "../model/types.js";

export interface PackageDataSource {
  fetchPackages(runIds: RunId[]): Promise<RunPackage[]>;
  fetchDependencyPaths(runIds: RunId[]): Promise<RunDependencyPath[]>;
  /** Curations for one run, ordered by the provider's precedence policy. */
  fetchResolvedCurations(runId: RunId): Promise<PackageCuration[]>;
}
