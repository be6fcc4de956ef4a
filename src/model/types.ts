import type {
  Identifier,
  PackageCuration,
  PackageCurationData,
  RawPackage,
  ShortestDependencyPath,
} from "./schema.js";

export type RunId = number;

/** A raw package as stored for one analysis run. */
export type RunPackage = {
  runId: RunId;
  /** The run's internal key for the package. */
  pkgId: number;
  pkg: RawPackage;
};

export type RunDependencyPath = {
  runId: RunId;
  /** The package the path ends at. */
  packageIdentifier: Identifier;
  path: ShortestDependencyPath;
};

export type RunCurations = {
  runId: RunId;
  curations: PackageCuration[];
};

/** A package with curations applied and its purl derived from the identifier. */
export type Package = RawPackage & {
  purl: string;
};

/** A curated package together with the data specific to the run it was taken from. */
export type PackageRunData = {
  pkg: Package;
  pkgId: number;
  runId: RunId;
  shortestDependencyPaths: ShortestDependencyPath[];
  /** Set by the last applied curation that carries a concluded license. */
  concludedLicense?: string;
  /** Payloads of every applied curation, in application order. */
  curations: PackageCurationData[];
};

export type EcosystemStats = {
  name: string;
  count: number;
};

export type ListQueryResult<T> = {
  data: T[];
  totalCount: number;
};
