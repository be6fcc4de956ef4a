// Curation merging.
// Purpose: fold an ordered list of curation payloads into a package and re-derive its declared license.
// Assumes the caller supplies curations already ordered by provider precedence; order is never changed here.

import { processDeclaredLicenses, type DeclaredLicenseMapping } from "../licenses/declared-license-processor.js";
import { isCurationApplicable, toPurl } from "../model/identifier.js";
import type { PackageCuration, PackageCurationData, RawPackage, VcsInfo } from "../model/schema.js";
import type { Package } from "../model/types.js";

// =============================================================================
// TYPES
// =============================================================================

export type CurationMergeResult = {
  pkg: Package;
  concludedLicense?: string;
  curations: PackageCurationData[];
};

export type CurationState = {
  pkg: RawPackage;
  mapping: DeclaredLicenseMapping;
  concludedLicense?: string;
};

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Applies the curations matching `base` in order; non-matching curations are skipped.
 * The result shares no arrays or objects with `base` or the curation payloads.
 */
export function mergeCurations(base: RawPackage, curations: PackageCuration[]): CurationMergeResult {
  const applicable = curations
    .filter((curation) => isCurationApplicable(curation.id, base.identifier))
    .map((curation) => cloneCurationData(curation.data));

  const initial: CurationState = {
    pkg: clonePackage(base),
    mapping: { ...base.processedDeclaredLicense.mappedLicenses },
  };
  const state = applicable.reduce(applyCuration, initial);

  const pkg: Package = {
    ...state.pkg,
    purl: toPurl(base.identifier),
    processedDeclaredLicense: processDeclaredLicenses(base.declaredLicenses, state.mapping),
  };

  const result: CurationMergeResult = { pkg, curations: applicable };
  if (state.concludedLicense !== undefined) {
    result.concludedLicense = state.concludedLicense;
  }
  return result;
}

// =============================================================================
// FOLD STEP
// =============================================================================

export function applyCuration(state: CurationState, data: PackageCurationData): CurationState {
  const pkg: RawPackage = { ...state.pkg };

  if (data.authors !== undefined) pkg.authors = [...data.authors];
  if (data.description !== undefined) pkg.description = data.description;
  if (data.homepageUrl !== undefined) pkg.homepageUrl = data.homepageUrl;
  if (data.binaryArtifact !== undefined) pkg.binaryArtifact = { ...data.binaryArtifact };
  if (data.sourceArtifact !== undefined) pkg.sourceArtifact = { ...data.sourceArtifact };
  if (data.isMetadataOnly !== undefined) pkg.isMetadataOnly = data.isMetadataOnly;
  if (data.isModified !== undefined) pkg.isModified = data.isModified;
  if (data.vcs !== undefined) pkg.vcs = mergeVcs(pkg.vcs, data.vcs);
  if (data.labels !== undefined) pkg.labels = { ...pkg.labels, ...data.labels };

  return {
    pkg,
    mapping:
      data.declaredLicenseMapping !== undefined
        ? { ...state.mapping, ...data.declaredLicenseMapping }
        : state.mapping,
    concludedLicense: data.concludedLicense ?? state.concludedLicense,
  };
}

// Only the VCS fields a curation names are overridden.
function mergeVcs(current: VcsInfo, patch: Partial<VcsInfo>): VcsInfo {
  return {
    type: patch.type ?? current.type,
    url: patch.url ?? current.url,
    revision: patch.revision ?? current.revision,
    path: patch.path ?? current.path,
  };
}

// =============================================================================
// COPIES
// =============================================================================

function clonePackage(pkg: RawPackage): RawPackage {
  return {
    ...pkg,
    identifier: { ...pkg.identifier },
    authors: [...pkg.authors],
    declaredLicenses: [...pkg.declaredLicenses],
    processedDeclaredLicense: {
      ...pkg.processedDeclaredLicense,
      mappedLicenses: { ...pkg.processedDeclaredLicense.mappedLicenses },
      unmappedLicenses: [...pkg.processedDeclaredLicense.unmappedLicenses],
    },
    binaryArtifact: { ...pkg.binaryArtifact },
    sourceArtifact: { ...pkg.sourceArtifact },
    vcs: { ...pkg.vcs },
    labels: { ...pkg.labels },
  };
}

function cloneCurationData(data: PackageCurationData): PackageCurationData {
  const copy: PackageCurationData = { ...data };
  if (data.authors) copy.authors = [...data.authors];
  if (data.binaryArtifact) copy.binaryArtifact = { ...data.binaryArtifact };
  if (data.sourceArtifact) copy.sourceArtifact = { ...data.sourceArtifact };
  if (data.vcs) copy.vcs = { ...data.vcs };
  if (data.declaredLicenseMapping) copy.declaredLicenseMapping = { ...data.declaredLicenseMapping };
  if (data.labels) copy.labels = { ...data.labels };
  return copy;
}
