// Package run data schema definitions.
// Purpose: define the validated shapes of packages, curations and dependency paths supplied per run.
// Assumes collaborators hand over immutable snapshots; inferred types are the engine's data model.

import { z } from "zod";

// =============================================================================
// PACKAGE METADATA
// =============================================================================

export const IdentifierSchema = z
  .object({
    type: z.string().min(1),
    namespace: z.string().default(""),
    name: z.string().min(1),
    version: z.string().default(""),
  })
  .strict();

export const RemoteArtifactSchema = z
  .object({
    url: z.string().default(""),
    hashValue: z.string().default(""),
    hashAlgorithm: z.string().default(""),
  })
  .strict();

export const VcsInfoSchema = z
  .object({
    type: z.string().default(""),
    url: z.string().default(""),
    revision: z.string().default(""),
    path: z.string().default(""),
  })
  .strict();

export const ProcessedDeclaredLicenseSchema = z
  .object({
    spdxExpression: z.string().default(""),
    mappedLicenses: z.record(z.string()).default({}),
    unmappedLicenses: z.array(z.string()).default([]),
  })
  .strict();

const EMPTY_ARTIFACT = { url: "", hashValue: "", hashAlgorithm: "" };

export const RawPackageSchema = z
  .object({
    identifier: IdentifierSchema,
    authors: z.array(z.string()).default([]),
    declaredLicenses: z.array(z.string()).default([]),
    processedDeclaredLicense: ProcessedDeclaredLicenseSchema.default({}),
    description: z.string().default(""),
    homepageUrl: z.string().default(""),
    binaryArtifact: RemoteArtifactSchema.default(EMPTY_ARTIFACT),
    sourceArtifact: RemoteArtifactSchema.default(EMPTY_ARTIFACT),
    vcs: VcsInfoSchema.default({}),
    isMetadataOnly: z.boolean().default(false),
    isModified: z.boolean().default(false),
    labels: z.record(z.string()).default({}),
  })
  .strict();

// =============================================================================
// CURATIONS
// =============================================================================

// Absent keys leave the curated value untouched; every present key overrides it.
export const PackageCurationDataSchema = z
  .object({
    comment: z.string().optional(),
    authors: z.array(z.string()).optional(),
    concludedLicense: z.string().optional(),
    description: z.string().optional(),
    homepageUrl: z.string().optional(),
    binaryArtifact: RemoteArtifactSchema.optional(),
    sourceArtifact: RemoteArtifactSchema.optional(),
    vcs: VcsInfoSchema.partial().optional(),
    isMetadataOnly: z.boolean().optional(),
    isModified: z.boolean().optional(),
    declaredLicenseMapping: z.record(z.string()).optional(),
    labels: z.record(z.string()).optional(),
  })
  .strict();

export const PackageCurationSchema = z
  .object({
    id: IdentifierSchema,
    data: PackageCurationDataSchema,
  })
  .strict();

// =============================================================================
// DEPENDENCY PATHS
// =============================================================================

export const ShortestDependencyPathSchema = z
  .object({
    projectIdentifier: IdentifierSchema,
    scope: z.string().min(1),
    path: z.array(IdentifierSchema).default([]),
  })
  .strict();

// =============================================================================
// INFERRED TYPES
// =============================================================================

export type Identifier = z.infer<typeof IdentifierSchema>;
export type RemoteArtifact = z.infer<typeof RemoteArtifactSchema>;
export type VcsInfo = z.infer<typeof VcsInfoSchema>;
export type ProcessedDeclaredLicense = z.infer<typeof ProcessedDeclaredLicenseSchema>;
export type RawPackage = z.infer<typeof RawPackageSchema>;
export type PackageCurationData = z.infer<typeof PackageCurationDataSchema>;
export type PackageCuration = z.infer<typeof PackageCurationSchema>;
export type ShortestDependencyPath = z.infer<typeof ShortestDependencyPathSchema>;
