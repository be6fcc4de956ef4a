import { describe, expect, it } from "vitest";

import { generatePackage, identifier, runPackage, runPath } from "../model/package.test-helpers.js";
import type { Identifier, PackageCuration, RawPackage } from "../model/schema.js";
import type { PackageRunData, RunDependencyPath } from "../model/types.js";

import { listPackages } from "./planner.js";
import { parsePackageQuery, type PackageQueryInput } from "./query-parameters.js";
import { assemblePackageRunData } from "./run-data.js";

// =============================================================================
// HELPERS
// =============================================================================

function viewsForRun(
  packages: RawPackage[],
  options: { dependencyPaths?: RunDependencyPath[]; curations?: PackageCuration[] } = {},
): PackageRunData[] {
  return assemblePackageRunData([1], {
    packages: packages.map((pkg, index) => runPackage(1, index + 1, pkg)),
    dependencyPaths: options.dependencyPaths ?? [],
    curations: new Map([[1, options.curations ?? []]]),
  });
}

function list(views: PackageRunData[], input: PackageQueryInput) {
  return listPackages(views, parsePackageQuery(input));
}

function ids(views: PackageRunData[]): Identifier[] {
  return views.map((view) => view.pkg.identifier);
}

const EXAMPLE = identifier("Maven", "com.example", "example", "1.0");
const EXAMPLE2 = identifier("Maven", "com.example", "example2", "1.0");
const EXAMPLE3 = identifier("Maven", "com.example", "example3", "1.0");
const NPM_EXAMPLE2 = identifier("NPM", "com.example", "example2", "1.0");

// =============================================================================
// TESTS
// =============================================================================

describe("listPackages", () => {
  it("limits and sorts the result while counting every match", () => {
    const views = viewsForRun([generatePackage(EXAMPLE), generatePackage(EXAMPLE2), generatePackage(EXAMPLE3)]);

    const result = list(views, { sort: [{ field: "purl", direction: "DESCENDING" }], limit: 2 });

    expect(result.totalCount).toBe(3);
    expect(ids(result.data)).toEqual([EXAMPLE3, EXAMPLE2]);
  });

  it("orders purls segment by segment so a name precedes the names it prefixes", () => {
    const nested = identifier("Maven", "com.example.sub", "alpha", "1.0");
    const views = viewsForRun([
      generatePackage(EXAMPLE3),
      generatePackage(nested),
      generatePackage(EXAMPLE),
      generatePackage(EXAMPLE2),
    ]);

    const result = list(views, { sort: [{ field: "purl" }] });

    expect(ids(result.data)).toEqual([EXAMPLE, EXAMPLE2, EXAMPLE3, nested]);
  });

  it("applies the offset after sorting", () => {
    const views = viewsForRun([generatePackage(EXAMPLE3), generatePackage(EXAMPLE), generatePackage(EXAMPLE2)]);

    const result = list(views, { sort: [{ field: "identifier" }], limit: 5, offset: 1 });

    expect(result.totalCount).toBe(3);
    expect(ids(result.data)).toEqual([EXAMPLE2, EXAMPLE3]);
  });

  it("sorts by identifier descending", () => {
    const which = identifier("NPM", "", "which", "2.0.2");
    const databind = identifier("Maven", "com.fasterxml.jackson.core", "jackson-databind", "2.9.6");
    const log4j214 = identifier("Maven", "org.apache.logging.log4j", "log4j-core", "2.14.0");
    const annotations = identifier("Maven", "com.fasterxml.jackson.core", "jackson-annotations", "2.17.1");
    const log4j25 = identifier("Maven", "org.apache.logging.log4j", "log4j-core", "2.5");
    const views = viewsForRun([which, databind, log4j214, annotations, log4j25].map((id) => generatePackage(id)));

    const result = list(views, { sort: [{ field: "identifier", direction: "DESCENDING" }] });

    expect(result.totalCount).toBe(5);
    expect(ids(result.data)).toEqual([which, log4j25, log4j214, databind, annotations]);
  });

  it("sorts by processed declared license", () => {
    const views = viewsForRun([
      generatePackage(EXAMPLE, { declaredLicenses: ["MIT"] }),
      generatePackage(EXAMPLE2, { declaredLicenses: ["Apache-2.0"] }),
      generatePackage(EXAMPLE3, { declaredLicenses: ["EPL-1.0 OR LGPL-2.1-or-later"] }),
    ]);

    const result = list(views, { sort: [{ field: "processedDeclaredLicense" }] });

    expect(result.data.map((view) => view.pkg.processedDeclaredLicense.spdxExpression)).toEqual([
      "Apache-2.0",
      "EPL-1.0 OR LGPL-2.1-or-later",
      "MIT",
    ]);
  });

  it("returns an empty page for no packages", () => {
    expect(list([], {})).toEqual({ data: [], totalCount: 0 });
  });

  it("filters by identifier substring", () => {
    const views = viewsForRun([generatePackage(EXAMPLE), generatePackage(EXAMPLE2), generatePackage(NPM_EXAMPLE2)]);

    const result = list(views, {
      sort: [{ field: "identifier", direction: "DESCENDING" }],
      filters: [{ field: "identifier", operator: "ILIKE", value: "com.example/example2" }],
    });

    expect(result.totalCount).toBe(2);
    expect(ids(result.data)).toEqual([NPM_EXAMPLE2, EXAMPLE2]);
  });

  it("matches identifiers without a namespace segment", () => {
    const plain = identifier("NPM", "", "example", "1.0");
    const namespaced = identifier("NPM", "com.example", "example", "1.0");
    const views = viewsForRun([generatePackage(plain), generatePackage(namespaced)]);

    const result = list(views, { filters: [{ field: "identifier", operator: "ILIKE", value: "NPM:example@1.0" }] });

    expect(ids(result.data)).toEqual([plain]);
  });

  it("filters purl and identifier case-insensitively", () => {
    const views = viewsForRun([generatePackage(EXAMPLE), generatePackage(EXAMPLE2), generatePackage(NPM_EXAMPLE2)]);

    const byIdentifier = list(views, {
      filters: [{ field: "identifier", operator: "ILIKE", value: "maven:com.example/Example2" }],
    });
    const byPurl = list(views, {
      filters: [{ field: "purl", operator: "ILIKE", value: "pkg:maven/com.example/Example2" }],
    });

    expect(ids(byIdentifier.data)).toEqual([EXAMPLE2]);
    expect(byPurl).toEqual(byIdentifier);
  });

  it("filters by purl prefix", () => {
    const views = viewsForRun([generatePackage(EXAMPLE), generatePackage(EXAMPLE2), generatePackage(NPM_EXAMPLE2)]);

    const result = list(views, { filters: [{ field: "purl", operator: "ILIKE", value: "pkg:NPM" }] });

    expect(result.totalCount).toBe(1);
    expect(result.data[0]?.pkg.purl).toBe("pkg:NPM/com.example/example2@1.0");
  });

  it("filters processed declared licenses by set membership", () => {
    const views = viewsForRun([
      generatePackage(EXAMPLE, { declaredLicenses: ["Apache-2.0 OR LGPL-2.1-or-later"] }),
      generatePackage(EXAMPLE2, { declaredLicenses: ["Apache-2.0"] }),
      generatePackage(NPM_EXAMPLE2, { declaredLicenses: ["MIT"] }),
    ]);

    const result = list(views, {
      sort: [{ field: "processedDeclaredLicense" }],
      filters: [{ field: "processedDeclaredLicense", operator: "IN", value: ["MIT", "Apache-2.0 OR LGPL-2.1-or-later"] }],
    });

    expect(result.totalCount).toBe(2);
    expect(ids(result.data)).toEqual([EXAMPLE, NPM_EXAMPLE2]);
  });

  it("combines filters with AND and supports wildcards", () => {
    const views = viewsForRun([
      generatePackage(EXAMPLE, { declaredLicenses: ["MIT"] }),
      generatePackage(EXAMPLE2, { declaredLicenses: ["Apache-2.0"] }),
      generatePackage(NPM_EXAMPLE2, { declaredLicenses: ["MIT"] }),
    ]);

    const result = list(views, {
      filters: [
        { field: "purl", operator: "ILIKE", value: "pkg:maven/%example_" },
        { field: "processedDeclaredLicense", operator: "ILIKE", value: "apache" },
      ],
    });

    expect(ids(result.data)).toEqual([EXAMPLE2]);
  });

  it("filters on curated licenses", () => {
    const views = viewsForRun([generatePackage(EXAMPLE, { declaredLicenses: ["Custom"] }), generatePackage(EXAMPLE2)], {
      curations: [{ id: EXAMPLE, data: { declaredLicenseMapping: { Custom: "BSD-2-Clause" } } }],
    });

    const result = list(views, {
      filters: [{ field: "processedDeclaredLicense", operator: "IN", value: ["BSD-2-Clause"] }],
    });

    expect(ids(result.data)).toEqual([EXAMPLE]);
  });

  it("attaches shortest dependency paths regardless of sort and filter", () => {
    const project1 = identifier("Gradle", "", "project1", "1.0");
    const project2 = identifier("Gradle", "", "project2", "1.0");
    const views = viewsForRun([generatePackage(EXAMPLE), generatePackage(EXAMPLE2)], {
      dependencyPaths: [
        runPath(1, EXAMPLE, project1, "compileClassPath"),
        runPath(1, EXAMPLE, project2, "compileClassPath"),
        runPath(1, EXAMPLE2, project1, "compileClassPath", [EXAMPLE]),
      ],
    });

    const sorted = list(views, { sort: [{ field: "purl", direction: "DESCENDING" }] });
    const filtered = list(views, { filters: [{ field: "identifier", operator: "ILIKE", value: "example@" }] });

    expect(sorted.data[0]?.shortestDependencyPaths).toEqual([
      { projectIdentifier: project1, scope: "compileClassPath", path: [EXAMPLE] },
    ]);
    expect(sorted.data[1]?.shortestDependencyPaths).toEqual([
      { projectIdentifier: project1, scope: "compileClassPath", path: [] },
      { projectIdentifier: project2, scope: "compileClassPath", path: [] },
    ]);
    expect(filtered.data).toHaveLength(1);
    expect(filtered.data[0]?.shortestDependencyPaths).toHaveLength(2);
  });

  it("rejects invalid pagination passed without parsing", () => {
    expect(() => listPackages([], { sort: [], filters: [], limit: -1, offset: 0 })).toThrow(
      "limit must be a non-negative integer, received -1.",
    );
  });
});

describe("listPackages across runs", () => {
  const A = identifier("Maven", "com.example", "a", "1.0");
  const B = identifier("Maven", "com.example", "b", "1.0");
  const C = identifier("NPM", "", "c", "1.0");

  function twoRunViews(): PackageRunData[] {
    return assemblePackageRunData([1, 2], {
      packages: [
        runPackage(2, 20, generatePackage(A)),
        runPackage(2, 21, generatePackage(C)),
        runPackage(1, 10, generatePackage(A)),
        runPackage(1, 11, generatePackage(B)),
      ],
      dependencyPaths: [
        runPath(1, A, identifier("Gradle", "", "app", "1.0"), "compile"),
        runPath(2, A, identifier("Gradle", "", "app", "2.0"), "runtime"),
      ],
      curations: new Map([
        [1, [{ id: A, data: { concludedLicense: "MIT" } }]],
        [2, [{ id: A, data: { concludedLicense: "Apache-2.0" } }]],
      ]),
    });
  }

  it("returns one entry per identifier taken from the lowest run id", () => {
    const result = list(twoRunViews(), {});

    expect(result.totalCount).toBe(3);
    expect(ids(result.data)).toEqual([A, B, C]);

    const [first] = result.data;
    expect(first?.runId).toBe(1);
    expect(first?.pkgId).toBe(10);
    expect(first?.concludedLicense).toBe("MIT");
    expect(first?.shortestDependencyPaths.map((path) => path.scope)).toEqual(["compile"]);
  });

  it("finds an identifier through a later run whose curation matches the filter", () => {
    const views = assemblePackageRunData([1, 2], {
      packages: [
        runPackage(1, 10, generatePackage(A, { declaredLicenses: ["Custom"] })),
        runPackage(2, 20, generatePackage(A, { declaredLicenses: ["Custom"] })),
      ],
      dependencyPaths: [],
      curations: new Map([[2, [{ id: A, data: { declaredLicenseMapping: { Custom: "Apache-2.0" } } }]]]),
    });

    const curated = list(views, {
      filters: [{ field: "processedDeclaredLicense", operator: "IN", value: ["Apache-2.0"] }],
    });
    const unfiltered = list(views, {});

    expect(curated.totalCount).toBe(1);
    expect(curated.data[0]?.runId).toBe(2);
    expect(curated.data[0]?.pkg.processedDeclaredLicense.spdxExpression).toBe("Apache-2.0");
    expect(unfiltered.totalCount).toBe(1);
    expect(unfiltered.data[0]?.runId).toBe(1);
  });

  it("counts deduplicated matches for filtered queries", () => {
    const result = list(twoRunViews(), { filters: [{ field: "purl", operator: "ILIKE", value: "pkg:maven" }] });

    expect(result.totalCount).toBe(2);
  });
});
