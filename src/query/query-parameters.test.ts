import { describe, expect, it } from "vitest";

import { InvalidQueryError } from "../core/errors.js";

import { parsePackageQuery } from "./query-parameters.js";

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return null;
}

describe("parsePackageQuery", () => {
  it("fills defaults for an empty query", () => {
    expect(parsePackageQuery(undefined)).toEqual({ sort: [], filters: [], limit: null, offset: 0 });
  });

  it("applies the default sort only when no sort is given", () => {
    const defaults = { defaultSort: [{ field: "purl" as const, direction: "DESCENDING" as const }] };

    expect(parsePackageQuery({}, defaults).sort).toEqual([{ field: "purl", direction: "DESCENDING" }]);
    expect(parsePackageQuery({ sort: [{ field: "identifier" }] }, defaults).sort).toEqual([
      { field: "identifier", direction: "ASCENDING" },
    ]);
  });

  it("rejects unknown sort fields with the allowed values", () => {
    const error = captureError(() => parsePackageQuery({ sort: [{ field: "name" }] }));

    expect(error).toBeInstanceOf(InvalidQueryError);
    const queryError = error as InvalidQueryError;
    expect(queryError.details.field).toBe("sort.0.field");
    expect(queryError.details.allowed).toEqual(["identifier", "purl", "processedDeclaredLicense"]);
  });

  it("rejects unknown filter operators", () => {
    const error = captureError(() =>
      parsePackageQuery({ filters: [{ field: "purl", operator: "EQ", value: "pkg:npm" }] }),
    );

    expect(error).toBeInstanceOf(InvalidQueryError);
    expect((error as InvalidQueryError).details).toEqual({ field: "filters.0.operator", allowed: ["ILIKE", "IN"] });
  });

  it("rejects IN filters without a list value", () => {
    const error = captureError(() =>
      parsePackageQuery({ filters: [{ field: "purl", operator: "IN", value: "pkg:npm" }] }),
    );

    expect(error).toBeInstanceOf(InvalidQueryError);
    expect((error as InvalidQueryError).details.field).toBe("filters.0.value");
  });

  it("rejects negative pagination and limits above the maximum", () => {
    expect(captureError(() => parsePackageQuery({ offset: -1 }))).toBeInstanceOf(InvalidQueryError);

    const error = captureError(() => parsePackageQuery({ limit: 50 }, { maxLimit: 10 }));
    expect(error).toBeInstanceOf(InvalidQueryError);
    expect((error as InvalidQueryError).message).toBe("limit 50 exceeds the configured maximum of 10.");
  });
});
