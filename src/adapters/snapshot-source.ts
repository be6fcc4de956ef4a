// Snapshot-backed package data source.
// Purpose: serve run packages, dependency paths and resolved curations from a JSON snapshot file.
// Assumes the snapshot is exported by the run pipeline and does not change while it is being read.

import path from "node:path";

import fse from "fs-extra";
import { z } from "zod";

import type { PackageDataSource } from "../app/ports.js";
import { DataSourceError, UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { formatSchemaIssues } from "../core/zod-issues.js";
import {
  IdentifierSchema,
  PackageCurationSchema,
  RawPackageSchema,
  ShortestDependencyPathSchema,
  type PackageCuration,
} from "../model/schema.js";
import type { RunDependencyPath, RunId, RunPackage } from "../model/types.js";

// =============================================================================
// SCHEMA
// =============================================================================

export const SnapshotRunSchema = z
  .object({
    id: z.number().int().nonnegative(),
    packages: z.array(RawPackageSchema.extend({ id: z.number().int() })).default([]),
    dependencyPaths: z.array(ShortestDependencyPathSchema.extend({ package: IdentifierSchema })).default([]),
    curations: z.array(PackageCurationSchema).default([]),
  })
  .strict();

export const SnapshotSchema = z
  .object({
    runs: z.array(SnapshotRunSchema).default([]),
  })
  .strict();

export type SnapshotInput = z.input<typeof SnapshotSchema>;
export type Snapshot = z.infer<typeof SnapshotSchema>;

const SNAPSHOT_HINT = "Pass --data <file> pointing at an exported run snapshot.";

// =============================================================================
// DATA SOURCE
// =============================================================================

export class SnapshotPackageDataSource implements PackageDataSource {
  private readonly runs: Map<RunId, Snapshot["runs"][number]>;

  constructor(snapshot: Snapshot) {
    this.runs = new Map(snapshot.runs.map((run) => [run.id, run]));
  }

  static fromInput(input: SnapshotInput): SnapshotPackageDataSource {
    return new SnapshotPackageDataSource(parseSnapshot(input, "<inline>"));
  }

  static async fromFile(filePath: string): Promise<SnapshotPackageDataSource> {
    const resolved = path.resolve(filePath);
    if (!(await fse.pathExists(resolved))) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.dataSource,
        title: "Package snapshot missing.",
        message: `No package snapshot found at ${resolved}.`,
        hint: SNAPSHOT_HINT,
        cause: new DataSourceError(`Snapshot file not found: ${resolved}`),
      });
    }

    let raw: unknown;
    try {
      raw = await fse.readJson(resolved);
    } catch (err) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.dataSource,
        title: "Package snapshot unreadable.",
        message: `Package snapshot at ${resolved} is not valid JSON.`,
        hint: SNAPSHOT_HINT,
        cause: new DataSourceError(`Failed to parse snapshot ${resolved}`, err),
      });
    }

    return new SnapshotPackageDataSource(parseSnapshot(raw, resolved));
  }

  async fetchPackages(runIds: RunId[]): Promise<RunPackage[]> {
    return this.selectRuns(runIds).flatMap((run) =>
      run.packages.map(({ id, ...pkg }) => ({ runId: run.id, pkgId: id, pkg })),
    );
  }

  async fetchDependencyPaths(runIds: RunId[]): Promise<RunDependencyPath[]> {
    return this.selectRuns(runIds).flatMap((run) =>
      run.dependencyPaths.map(({ package: packageIdentifier, ...shortestPath }) => ({
        runId: run.id,
        packageIdentifier,
        path: shortestPath,
      })),
    );
  }

  async fetchResolvedCurations(runId: RunId): Promise<PackageCuration[]> {
    return this.runs.get(runId)?.curations ?? [];
  }

  private selectRuns(runIds: RunId[]): Snapshot["runs"] {
    return runIds.flatMap((runId) => {
      const run = this.runs.get(runId);
      return run ? [run] : [];
    });
  }
}

// =============================================================================
// INTERNAL HELPERS
// =============================================================================

function parseSnapshot(raw: unknown, source: string): Snapshot {
  const parsed = SnapshotSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = formatSchemaIssues(parsed.error.issues);
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.dataSource,
      title: "Package snapshot invalid.",
      message: `Package snapshot ${source} does not match the expected schema: ${issues.join("; ")}`,
      hint: SNAPSHOT_HINT,
      cause: new DataSourceError("Snapshot schema validation failed", parsed.error),
    });
  }
  return parsed.data;
}
