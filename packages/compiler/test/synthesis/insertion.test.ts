import { describe, test, expect } from "vitest";
import assert from "node:assert/strict";

import {
  NormalizationError,
  applyReplacement,
  createCollectingExporter,
  createTrace,
  parseProgram,
  parseResourceId,
  readJson,
  synthesizeResourceInsertion,
  type ResourceInsertionInput,
} from "../../src/index.js";
import { WIDGET_ID, WIDGET_TYPE, WIDGET_VERSION, failingProvider, hostCompilation, widgetCatalog } from "../_helpers/widgets.js";

const HOST = "resource existingWidget 'Test.Widgets/widgets@2024-01-01' = {\n  name: 'old'\n}\n";

function input(overrides: Partial<ResourceInsertionInput> = {}): ResourceInsertionInput {
  const identifier = parseResourceId(WIDGET_ID);
  assert.ok(identifier);
  return {
    identifier,
    descriptor: { fullyQualifiedType: WIDGET_TYPE, apiVersion: WIDGET_VERSION },
    body: readJson('{"Name":"w1","id":"x"}'),
    compilation: hostCompilation(HOST),
    offset: HOST.length,
    ...overrides,
  };
}

describe("synthesizeResourceInsertion", () => {
  test("returns a zero-length replacement holding the normalized declaration", () => {
    const replacement = synthesizeResourceInsertion(input());
    expect(replacement).toEqual({
      span: { offset: HOST.length, length: 0 },
      text: "resource widget 'Test.Widgets/widgets@2024-01-01' = {\n  name: 'w1'\n}",
    });

    const updated = applyReplacement(HOST, replacement);
    expect(parseProgram(updated).program.statements.map((s) => s.$kind)).toEqual(["Declaration", "Declaration"]);
  });

  test("renders with the host's print options", () => {
    const replacement = synthesizeResourceInsertion(
      input({ printOptions: { newline: "CRLF", indentKind: "tab", indentSize: 2, insertFinalNewline: true } }),
    );
    expect(replacement.text).toBe("resource widget 'Test.Widgets/widgets@2024-01-01' = {\r\n\tname: 'w1'\r\n}\r\n");
  });

  test("rejects an offset outside the host document", () => {
    expect(() => synthesizeResourceInsertion(input({ offset: HOST.length + 1 }))).toThrow(RangeError);
  });

  test("produces nothing when normalization fails", () => {
    const compilation = hostCompilation(HOST, failingProvider(widgetCatalog(), 3));
    expect(() => synthesizeResourceInsertion(input({ compilation }))).toThrow(NormalizationError);
  });

  test("traces the synthesis steps", () => {
    const exporter = createCollectingExporter();
    synthesizeResourceInsertion(input({ trace: createTrace({ exporter }) }));
    expect(exporter.ended).toEqual(["synthesis.declaration", "normalize", "synthesis"]);
    expect(exporter.events).toHaveLength(5);
  });
});
