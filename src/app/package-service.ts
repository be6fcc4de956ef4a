// Package service.
// Purpose: fetch run data through the data source port and answer list/count/license queries.
// Assumes the pure engine never suspends; every await here is a data-source round trip.

import { InvalidQueryError } from "../core/errors.js";
import { logQueryEvent, type JsonObject, type JsonlLogger } from "../core/logger.js";
import type { PackageCuration } from "../model/schema.js";
import type { EcosystemStats, ListQueryResult, PackageRunData, RunId } from "../model/types.js";
import { countDistinctPackages, countEcosystems, distinctProcessedLicenses } from "../query/aggregators.js";
import { listPackages } from "../query/planner.js";
import { assertPagination, type PackageQuery } from "../query/query-parameters.js";
import { assemblePackageRunData } from "../query/run-data.js";

import type { PackageDataSource } from "./ports.js";

// =============================================================================
// TYPES
// =============================================================================

export type PackageServiceOptions = {
  dataSource: PackageDataSource;
  logger?: JsonlLogger;
  maxLimit?: number;
};

const DEFAULT_QUERY: PackageQuery = { sort: [], filters: [], limit: null, offset: 0 };

// =============================================================================
// SERVICE
// =============================================================================

export class PackageService {
  private readonly dataSource: PackageDataSource;
  private readonly logger?: JsonlLogger;
  private readonly maxLimit?: number;

  constructor(options: PackageServiceOptions) {
    this.dataSource = options.dataSource;
    this.logger = options.logger;
    this.maxLimit = options.maxLimit;
  }

  async listForRunIds(
    runIds: RunId[],
    query: PackageQuery = DEFAULT_QUERY,
  ): Promise<ListQueryResult<PackageRunData>> {
    const requested = normalizeRunIds(runIds);
    assertPagination(query, this.maxLimit);

    return this.track("list", requested, async () => {
      const views = await this.loadRunData(requested);
      const result = listPackages(views, query);
      return { result, payload: { total_count: result.totalCount, returned: result.data.length } };
    });
  }

  async countForRunIds(runIds: RunId[]): Promise<number> {
    const requested = normalizeRunIds(runIds);

    return this.track("count", requested, async () => {
      const packages = requested.length > 0 ? await this.dataSource.fetchPackages(requested) : [];
      const count = countDistinctPackages(
        packages.filter((entry) => requested.includes(entry.runId)).map((entry) => entry.pkg.identifier),
      );
      return { result: count, payload: { count } };
    });
  }

  async countEcosystemsForRunIds(runIds: RunId[]): Promise<EcosystemStats[]> {
    const requested = normalizeRunIds(runIds);

    return this.track("ecosystems", requested, async () => {
      const packages = requested.length > 0 ? await this.dataSource.fetchPackages(requested) : [];
      const ecosystems = countEcosystems(
        packages.filter((entry) => requested.includes(entry.runId)).map((entry) => entry.pkg.identifier),
      );
      return { result: ecosystems, payload: { ecosystem_count: ecosystems.length } };
    });
  }

  async getProcessedDeclaredLicenses(runIds: RunId[]): Promise<string[]> {
    const requested = normalizeRunIds(runIds);

    return this.track("licenses", requested, async () => {
      const licenses = distinctProcessedLicenses(await this.loadRunData(requested));
      return { result: licenses, payload: { license_count: licenses.length } };
    });
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private async loadRunData(runIds: RunId[]): Promise<PackageRunData[]> {
    if (runIds.length === 0) {
      return [];
    }

    const [packages, dependencyPaths, curationLists] = await Promise.all([
      this.dataSource.fetchPackages(runIds),
      this.dataSource.fetchDependencyPaths(runIds),
      Promise.all(runIds.map((runId) => this.dataSource.fetchResolvedCurations(runId))),
    ]);

    const curations = new Map<RunId, PackageCuration[]>();
    runIds.forEach((runId, index) => curations.set(runId, curationLists[index] ?? []));

    return assemblePackageRunData(runIds, { packages, dependencyPaths, curations });
  }

  private async track<T>(
    operation: string,
    runIds: RunId[],
    run: () => Promise<{ result: T; payload: JsonObject }>,
  ): Promise<T> {
    const startedAt = Date.now();
    if (this.logger) {
      logQueryEvent(this.logger, `packages.${operation}.start`, { run_ids: runIds });
    }

    let outcome: { result: T; payload: JsonObject };
    try {
      outcome = await run();
    } catch (error) {
      if (this.logger) {
        logQueryEvent(this.logger, `packages.${operation}.failed`, {
          run_ids: runIds,
          message: error instanceof Error ? error.message : String(error),
        });
      }
      throw error;
    }

    const { result, payload } = outcome;
    if (this.logger) {
      logQueryEvent(this.logger, `packages.${operation}.complete`, {
        run_ids: runIds,
        duration_ms: Date.now() - startedAt,
        ...payload,
      });
    }
    return result;
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function normalizeRunIds(runIds: RunId[]): RunId[] {
  for (const runId of runIds) {
    if (!Number.isInteger(runId) || runId < 0) {
      throw new InvalidQueryError(`Run ids must be non-negative integers, received ${runId}.`, {
        field: "runIds",
      });
    }
  }

  return Array.from(new Set(runIds)).sort((left, right) => left - right);
}
