import { describe, test, expect } from "vitest";
import assert from "node:assert/strict";

import {
  DEFAULT_ANALYZER_CONFIGURATION,
  SemanticModel,
  SemanticModelError,
  createSourceFile,
  propertyKeyName,
  type ObjectExprSyntax,
  type ObjectPropertySyntax,
  type SourceFile,
  type ValueSyntax,
} from "../../src/index.js";
import { WIDGET_REFERENCE, hostCompilation } from "../_helpers/widgets.js";

const WIDGET_TEXT = [
  `resource w '${WIDGET_REFERENCE}' = {`,
  "  id: 'x'",
  "  Name: 'w1'",
  "  tags: {",
  "    env: 'dev'",
  "  }",
  "  extra: true",
  "  ports: [",
  "    { number: 80, state: 'open' }",
  "  ]",
  "}",
].join("\n");

function asObject(value: ValueSyntax | undefined): ObjectExprSyntax {
  assert.ok(value && value.$kind === "ObjectExpr");
  return value;
}

function property(object: ObjectExprSyntax, name: string): ObjectPropertySyntax {
  const found = object.properties.find((p) => propertyKeyName(p.key) === name);
  assert.ok(found, `no property '${name}'`);
  return found;
}

function widgetBody(file: SourceFile): ObjectExprSyntax {
  const [statement] = file.program.statements;
  assert.ok(statement && statement.$kind === "Declaration");
  return asObject(statement.body);
}

function analyze(text: string, configuration = DEFAULT_ANALYZER_CONFIGURATION) {
  const compilation = hostCompilation(text, undefined, configuration);
  const model = SemanticModel.create({ compilation, file: compilation.sourceFile, configuration });
  return { model, body: widgetBody(compilation.sourceFile) };
}

describe("SemanticModel bindings", () => {
  test("binds declarations to their schema", () => {
    const { model } = analyze(WIDGET_TEXT);
    const [binding] = model.getDeclarations();
    expect(binding?.descriptor).toEqual({ fullyQualifiedType: "Test.Widgets/widgets", apiVersion: "2024-01-01" });
    expect(binding?.schema?.body.name).toBe("Widget");
  });

  test("classifies each property key", () => {
    const { model, body } = analyze(WIDGET_TEXT);
    expect(model.getPropertyBinding(property(body, "id"))).toMatchObject({ kind: "declared", name: "id" });
    expect(model.getPropertyBinding(property(body, "Name"))).toMatchObject({ kind: "casing", name: "name" });
    expect(model.getPropertyBinding(property(body, "extra"))).toMatchObject({ kind: "unknown" });

    const env = property(asObject(property(body, "tags").value), "env");
    expect(model.getPropertyBinding(env)).toMatchObject({ kind: "additional", type: { kind: "string" } });
  });

  test("types values under declared and array properties", () => {
    const { model, body } = analyze(WIDGET_TEXT);
    expect(model.getDeclaredType(property(body, "tags").value)).toMatchObject({ kind: "object", name: "Tags" });

    const ports = property(body, "ports").value;
    assert.ok(ports.$kind === "ArrayExpr");
    const port = asObject(ports.items[0]);
    expect(model.getDeclaredType(port)).toMatchObject({ kind: "object", name: "Port" });
    expect(model.getPropertyBinding(property(port, "state"))).toMatchObject({ kind: "declared", name: "state" });
  });

  test("leaves the value of a miscased key untyped", () => {
    const { model, body } = analyze(`resource w '${WIDGET_REFERENCE}' = {\n  Properties: {\n    displayName: 'd'\n  }\n}`);
    const inner = asObject(property(body, "Properties").value);
    expect(model.getDeclaredType(inner)).toBeNull();
    expect(model.getPropertyBinding(property(inner, "displayName"))).toBeNull();
  });

  test("returns null for properties outside any typed object", () => {
    const { model, body } = analyze("resource w 'Test.Widgets/gadgets@2024-01-01' = {\n  id: 'x'\n}");
    expect(model.getDeclarations()[0]?.schema).toBeNull();
    expect(model.getPropertyBinding(property(body, "id"))).toBeNull();
  });
});

describe("SemanticModel diagnostics", () => {
  test("reports read-only, casing and unknown properties in tree order", () => {
    const { model } = analyze(WIDGET_TEXT);
    expect(model.diagnostics.map((d) => [d.code, d.message])).toEqual([
      ["rdl/read-only-property", "Property 'id' is read-only on 'Widget'"],
      ["rdl/property-casing", "Property 'Name' should be spelled 'name'"],
      ["rdl/unknown-property", "Property 'extra' is not defined on 'Widget'"],
      ["rdl/read-only-property", "Property 'state' is read-only on 'Port'"],
    ]);
    expect(model.diagnostics[0]).toMatchObject({ stage: "bind", severity: "warning", span: { offset: 51, length: 2 } });
  });

  test("reports unknown resource types", () => {
    const { model } = analyze("resource w 'Test.Widgets/gadgets@2024-01-01' = {}");
    expect(model.diagnostics).toHaveLength(1);
    expect(model.diagnostics[0]).toMatchObject({
      code: "rdl/unknown-resource-type",
      message: "Resource type 'Test.Widgets/gadgets@2024-01-01' is not available",
    });
  });

  test("follows the configured levels", () => {
    const { model } = analyze(WIDGET_TEXT, {
      ...DEFAULT_ANALYZER_CONFIGURATION,
      propertyCasing: "off",
      unknownProperties: "off",
      readOnlyProperties: "error",
    });
    expect(model.diagnostics.map((d) => [d.code, d.severity])).toEqual([
      ["rdl/read-only-property", "error"],
      ["rdl/read-only-property", "error"],
    ]);
  });
});

describe("SemanticModel on malformed trees", () => {
  const broken = "resource a 'T@v' = {\n  x: =\n}";

  test("refuses a tree with skipped text", () => {
    const compilation = hostCompilation();
    const file = createSourceFile("inmemory:///broken.rdl", broken);
    expect(() =>
      SemanticModel.create({ compilation, file, configuration: DEFAULT_ANALYZER_CONFIGURATION }),
    ).toThrow(SemanticModelError);
  });

  test("the compilation reports no model and only parse diagnostics", () => {
    const compilation = hostCompilation(broken);
    expect(compilation.getSemanticModel()).toBeNull();
    expect(compilation.getDiagnostics().map((d) => d.stage)).toEqual(["parse"]);
  });

  test("the compilation caches its model", () => {
    const compilation = hostCompilation(WIDGET_TEXT);
    expect(compilation.getSemanticModel()).toBe(compilation.getSemanticModel());
    expect(compilation.getDiagnostics()).toHaveLength(4);
  });
});
