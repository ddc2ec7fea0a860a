import { describe, test, expect } from "vitest";

import { compareApiVersions, matchResourceType, type TypeDescriptor } from "../../src/index.js";

function sorted(versions: string[]): string[] {
  return [...versions].sort(compareApiVersions);
}

describe("compareApiVersions", () => {
  test("orders dates chronologically", () => {
    expect(sorted(["2023-05-01", "2021-01-01", "2022-12-31"])).toEqual(["2021-01-01", "2022-12-31", "2023-05-01"]);
  });

  test("ranks a stable version above a suffixed one from the same day", () => {
    expect(compareApiVersions("2023-05-01", "2023-05-01-preview")).toBeGreaterThan(0);
    expect(compareApiVersions("2023-05-01-preview", "2023-05-01")).toBeLessThan(0);
  });

  test("ranks a later preview above an earlier stable version", () => {
    expect(compareApiVersions("2024-01-01-preview", "2023-05-01")).toBeGreaterThan(0);
  });

  test("compares suffixes case-insensitively, then ordinally", () => {
    expect(sorted(["2023-05-01-preview", "2023-05-01-beta", "2023-05-01-Preview"])).toEqual([
      "2023-05-01-beta",
      "2023-05-01-Preview",
      "2023-05-01-preview",
    ]);
  });

  test("ranks date-stamped versions above anything else", () => {
    expect(sorted(["v2", "2020-01-01", "latest"])).toEqual(["latest", "v2", "2020-01-01"]);
  });

  test("returns zero only for identical strings", () => {
    expect(compareApiVersions("2023-05-01", "2023-05-01")).toBe(0);
    expect(compareApiVersions("V1", "v1")).not.toBe(0);
  });
});

describe("matchResourceType", () => {
  const catalog: TypeDescriptor[] = [
    { fullyQualifiedType: "Test.Widgets/widgets", apiVersion: "2021-01-01" },
    { fullyQualifiedType: "Test.Widgets/gadgets", apiVersion: "2025-01-01" },
    { fullyQualifiedType: "Test.Widgets/widgets", apiVersion: "2023-05-01" },
    { fullyQualifiedType: "Test.Widgets/widgets", apiVersion: "2023-05-01-preview" },
  ];

  test("selects the highest version of the type", () => {
    expect(matchResourceType(catalog, "Test.Widgets/widgets")).toBe(catalog[2]);
  });

  test("matches the type case-insensitively", () => {
    expect(matchResourceType(catalog, "test.widgets/WIDGETS")?.apiVersion).toBe("2023-05-01");
  });

  test("keeps the first of equal versions", () => {
    const first = { fullyQualifiedType: "Test.Widgets/widgets", apiVersion: "2023-05-01" };
    const second = { fullyQualifiedType: "TEST.WIDGETS/WIDGETS", apiVersion: "2023-05-01" };
    expect(matchResourceType([first, second], "Test.Widgets/widgets")).toBe(first);
  });

  test("returns null for an unknown type", () => {
    expect(matchResourceType(catalog, "Test.Widgets/sprockets")).toBeNull();
    expect(matchResourceType([], "Test.Widgets/widgets")).toBeNull();
  });
});
