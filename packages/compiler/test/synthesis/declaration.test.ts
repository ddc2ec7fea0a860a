import { describe, test, expect } from "vitest";
import assert from "node:assert/strict";

import {
  parseProgram,
  parseResourceId,
  printSyntax,
  readJson,
  sanitizeIdentifier,
  synthesizeDeclaration,
  type ResourceIdentifier,
} from "../../src/index.js";
import { WIDGET_TYPE, WIDGET_VERSION } from "../_helpers/widgets.js";

const descriptor = { fullyQualifiedType: WIDGET_TYPE, apiVersion: WIDGET_VERSION };

function identifier(name: string): ResourceIdentifier {
  const id = parseResourceId(`/subscriptions/sub-1/resourceGroups/rg-1/providers/Test.Widgets/widgets/${name}`);
  assert.ok(id);
  return id;
}

describe("sanitizeIdentifier", () => {
  test.each([
    ["my-vm_01", "myvm"],
    ["Widget", "Widget"],
    ["wïdget", "wdget"],
    ["2024", ""],
  ])("%s -> %s", (input, expected) => {
    expect(sanitizeIdentifier(input)).toBe(expected);
  });
});

describe("synthesizeDeclaration", () => {
  test("names the declaration after the resource and types it with the chosen version", () => {
    const decl = synthesizeDeclaration(identifier("my-vm_01"), descriptor, readJson('{"name":"my-vm_01"}'));
    expect(decl.name.name).toBe("myvm");
    expect(decl.type.value).toBe("Test.Widgets/widgets@2024-01-01");
    expect(decl.modifier).toBeNull();
    expect(printSyntax(decl)).toBe("resource myvm 'Test.Widgets/widgets@2024-01-01' = {\n  name: 'my-vm_01'\n}");
  });

  test("uses the last name of a child resource", () => {
    const id = parseResourceId("/providers/Test.Widgets/widgets/parent-1/parts/gear-2");
    assert.ok(id);
    expect(synthesizeDeclaration(id, descriptor, readJson("{}")).name.name).toBe("gear");
  });

  test("keeps an empty name, which fails to re-parse as an identifier", () => {
    const text = printSyntax(synthesizeDeclaration(identifier("2024"), descriptor, readJson("{}")));
    expect(text).toBe("resource  'Test.Widgets/widgets@2024-01-01' = {}");
    expect(parseProgram(text).diagnostics.map((d) => d.code)).toEqual(["rdl/expected-identifier"]);
  });
});
