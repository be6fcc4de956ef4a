import { buildCli } from "./cli/index.js";
import { emitError } from "./cli/output.js";

export { SnapshotPackageDataSource, type Snapshot, type SnapshotInput } from "./adapters/snapshot-source.js";
export { PackageService, type PackageServiceOptions } from "./app/package-service.js";
export type { PackageDataSource } from "./app/ports.js";
export { loadEngineConfig } from "./core/config-loader.js";
export { EngineConfigSchema, type EngineConfig } from "./core/config.js";
export {
  ConfigError,
  CuraviewError,
  DataSourceError,
  InvalidQueryError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
} from "./core/errors.js";
export { formatErrorLines, toUserFacingError } from "./core/error-format.js";
export { JsonlLogger } from "./core/logger.js";
export { applyCuration, mergeCurations, type CurationMergeResult } from "./curations/curation-merger.js";
export { DependencyPathIndex, indexDependencyPaths } from "./dependencies/path-index.js";
export { processDeclaredLicenses, toLicenseReference } from "./licenses/declared-license-processor.js";
export {
  compareIdentifiers,
  identifierKey,
  isCurationApplicable,
  parseIdentifierString,
  toIdentifierString,
  toPurl,
} from "./model/identifier.js";
export type * from "./model/schema.js";
export type * from "./model/types.js";
export { countDistinctPackages, countEcosystems, distinctProcessedLicenses } from "./query/aggregators.js";
export type { OrderField, PackageField, PackageFilter } from "./query/fields.js";
export { listPackages, selectRepresentatives } from "./query/planner.js";
export { parsePackageQuery, type PackageQuery, type PackageQueryInput } from "./query/query-parameters.js";
export { assemblePackageRunData, type RunDataSnapshot } from "./query/run-data.js";

export async function main(argv: string[]): Promise<void> {
  try {
    await buildCli().parseAsync(argv);
  } catch (error) {
    emitError(error, { useJson: argv.includes("--json"), prettyJson: false, debug: argv.includes("--debug") });
  }
}
