import { describe, test, expect } from "vitest";

import { CatalogError, ResourceTypeCatalog, formatTypeReference, parseTypeReference } from "../../src/index.js";
import { WIDGET_CATALOG_DOCUMENT, WIDGET_TYPE, WIDGET_VERSION, widgetCatalog } from "../_helpers/widgets.js";

function resource(body: unknown) {
  return { resources: [{ type: "Test.Widgets/widgets", apiVersion: "2024-01-01", body }] };
}

describe("ResourceTypeCatalog.fromDefinitions", () => {
  test("lists descriptors in document order", () => {
    const catalog = ResourceTypeCatalog.fromDefinitions({
      resources: [
        { type: "A.B/c", apiVersion: "2020-01-01", body: { kind: "object" } },
        { type: "A.B/c", apiVersion: "2019-01-01", body: { kind: "object" } },
      ],
    });
    expect(catalog.availableTypes()).toEqual([
      { fullyQualifiedType: "A.B/c", apiVersion: "2020-01-01" },
      { fullyQualifiedType: "A.B/c", apiVersion: "2019-01-01" },
    ]);
  });

  test("looks schemas up case-insensitively", () => {
    const schema = widgetCatalog().tryGetSchema({ fullyQualifiedType: "TEST.widgets/Widgets", apiVersion: WIDGET_VERSION });
    expect(schema?.body.name).toBe("Widget");
    expect(schema?.descriptor).toEqual({ fullyQualifiedType: WIDGET_TYPE, apiVersion: WIDGET_VERSION });
  });

  test("returns null for unknown versions", () => {
    expect(widgetCatalog().tryGetSchema({ fullyQualifiedType: WIDGET_TYPE, apiVersion: "1999-01-01" })).toBeNull();
  });

  test("reads flags, additional properties and array items", () => {
    const body = widgetCatalog().tryGetSchema({ fullyQualifiedType: WIDGET_TYPE, apiVersion: WIDGET_VERSION })?.body;
    expect(body?.properties["id"]?.flags).toEqual(["readOnly"]);
    expect(body?.properties["tags"]?.type).toEqual({
      kind: "object",
      name: "Tags",
      properties: {},
      additionalProperties: { kind: "string" },
    });
    expect(body?.properties["ports"]?.type).toMatchObject({ kind: "array", items: { kind: "object", name: "Port" } });
  });

  test("rejects a document without resources", () => {
    expect(() => ResourceTypeCatalog.fromDefinitions({})).toThrow(
      new CatalogError("expected an object with a 'resources' array", "$"),
    );
  });

  test("rejects a non-object resource body", () => {
    expect(() => ResourceTypeCatalog.fromDefinitions(resource({ kind: "string" }))).toThrow(
      "resources[0].body: resource body must be an object type",
    );
  });

  test("names the path of an unknown kind", () => {
    expect(() =>
      ResourceTypeCatalog.fromDefinitions(resource({ kind: "object", properties: { size: { type: { kind: "float" } } } })),
    ).toThrow(
      'resources[0].body.properties.size.type.kind: unknown kind "float"; expected object, array or one of string, int, bool, any',
    );
  });

  test("names the path of an unknown flag", () => {
    expect(() =>
      ResourceTypeCatalog.fromDefinitions(
        resource({ kind: "object", properties: { size: { type: { kind: "int" }, flags: ["required", "secret"] } } }),
      ),
    ).toThrow('resources[0].body.properties.size.flags[1]: unknown flag "secret"');
  });

  test("requires a type and an api version", () => {
    expect(() => ResourceTypeCatalog.fromDefinitions({ resources: [{ type: "", apiVersion: "x", body: {} }] })).toThrow(
      "resources[0].type: expected a non-empty string",
    );
  });

  test("accepts the shared widget document", () => {
    expect(ResourceTypeCatalog.fromDefinitions(WIDGET_CATALOG_DOCUMENT).availableTypes()).toHaveLength(1);
  });
});

describe("type references", () => {
  test("format as type@version", () => {
    expect(formatTypeReference({ fullyQualifiedType: "A.B/c", apiVersion: "2020-01-01" })).toBe("A.B/c@2020-01-01");
  });

  test("parse at the last @", () => {
    expect(parseTypeReference("A.B/c@2020-01-01")).toEqual({ fullyQualifiedType: "A.B/c", apiVersion: "2020-01-01" });
    expect(parseTypeReference("A.B/c")).toBeNull();
    expect(parseTypeReference("A.B/c@")).toBeNull();
    expect(parseTypeReference("@2020-01-01")).toBeNull();
  });
});
