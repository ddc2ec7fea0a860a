import { describe, test, expect, vi } from "vitest";
import { CancellationTokenSource, LSPErrorCodes, ResponseError } from "vscode-languageserver/node.js";
import {
  INSERT_RESOURCE_METHOD,
  ResourceFetchError,
  handleInsertResource,
  loadTypeCatalog,
  registerInsertResourceHandlers,
  resolveConfiguration,
} from "@resource-ls/language-server/api";
import { createCollectingExporter } from "@resource-ls/compiler";
import { DOC_URI, STORAGE_ID, createMockContext, failingProvider } from "../helpers/test-factories.js";

const HOST = "// storage accounts\n";
const EXPECTED = [
  "resource acct 'Example.Storage/accounts@2023-05-01-preview' = {",
  "  name: 'acct-01'",
  "  location: 'westus'",
  "  sku: {",
  "    name: 'Standard'",
  "  }",
  "}",
];

function params(resourceId: string | null = STORAGE_ID) {
  return { textDocument: { uri: DOC_URI }, position: { line: 1, character: 0 }, resourceId };
}

function openContext(options: Parameters<typeof createMockContext>[0] = {}) {
  const ctx = createMockContext(options);
  ctx.compilations.upsert(DOC_URI, HOST, 1);
  return ctx;
}

describe("handleInsertResource", () => {
  test("applies one edit holding the normalized declaration at the caret", async () => {
    const ctx = openContext();

    await expect(handleInsertResource(ctx as never, params())).resolves.toBeNull();

    expect(ctx.connection.workspace.applyEdit).toHaveBeenCalledTimes(1);
    expect(ctx.connection.workspace.applyEdit).toHaveBeenCalledWith({
      label: "Insert resource",
      edit: {
        changes: {
          [DOC_URI]: [
            {
              range: { start: { line: 1, character: 0 }, end: { line: 1, character: 0 } },
              newText: EXPECTED.join("\n"),
            },
          ],
        },
      },
    });
    expect(ctx.logger.info).toHaveBeenCalledWith(
      "insertResource: Example.Storage/accounts@2023-05-01-preview inserted into file:///work/main.rdl",
    );
  });

  test("inserts before the line break when the caret is past the end of the line", async () => {
    const ctx = openContext();
    await handleInsertResource(ctx as never, { ...params(), position: { line: 0, character: 99 } });
    const [request] = ctx.connection.workspace.applyEdit.mock.calls[0] ?? [];
    expect(request?.edit.changes?.[DOC_URI]?.[0]?.range).toEqual({
      start: { line: 0, character: 19 },
      end: { line: 0, character: 19 },
    });
  });

  test("traces the fetch and the synthesis of each request", async () => {
    const ctx = openContext();
    const exporter = createCollectingExporter();
    await handleInsertResource(ctx as never, params(), undefined, { traceExporter: exporter });
    expect(exporter.ended).toEqual(["resource.fetch", "synthesis.declaration", "normalize", "synthesis", "insertResource"]);
  });

  test("fetches with the highest available api version", async () => {
    const ctx = openContext();
    await handleInsertResource(ctx as never, params());
    expect(ctx.fetcher.fetch).toHaveBeenCalledWith(
      expect.objectContaining({
        descriptor: { fullyQualifiedType: "Example.Storage/accounts", apiVersion: "2023-05-01-preview" },
        identifier: expect.objectContaining({ nameHierarchy: ["acct-01"] }),
      }),
    );
  });

  test("formats the declaration with the configured options", async () => {
    const configuration = resolveConfiguration({ formatting: { newline: "CRLF", insertFinalNewline: true } });
    const ctx = openContext({ configuration });
    await handleInsertResource(ctx as never, params());
    const [request] = ctx.connection.workspace.applyEdit.mock.calls[0] ?? [];
    expect(request?.edit.changes?.[DOC_URI]?.[0]?.newText).toBe(EXPECTED.join("\r\n") + "\r\n");
  });

  test("reads documents the editor has not opened", async () => {
    const ctx = createMockContext({ files: [[DOC_URI, HOST]] });
    await handleInsertResource(ctx as never, params());
    expect(ctx.connection.workspace.applyEdit).toHaveBeenCalledTimes(1);
  });

  describe("silent stops", () => {
    test("unknown document", async () => {
      const ctx = createMockContext();
      await expect(handleInsertResource(ctx as never, params())).resolves.toBeNull();
      expect(ctx.fetcher.fetch).not.toHaveBeenCalled();
    });

    test.each([[null], ["not-a-resource-id"], ["/subscriptions/sub-1/resourceGroups/rg-1"]])(
      "unparsable resource id %j",
      async (resourceId) => {
        const ctx = openContext();
        await expect(handleInsertResource(ctx as never, params(resourceId))).resolves.toBeNull();
        expect(ctx.fetcher.fetch).not.toHaveBeenCalled();
      },
    );

    test("resource type missing from the catalog", async () => {
      const ctx = openContext();
      await handleInsertResource(ctx as never, params("/providers/Example.Compute/machines/vm-1"));
      expect(ctx.fetcher.fetch).not.toHaveBeenCalled();
      expect(ctx.connection.workspace.applyEdit).not.toHaveBeenCalled();
    });

    test("no payload", async () => {
      const ctx = openContext({ payload: null });
      await expect(handleInsertResource(ctx as never, params())).resolves.toBeNull();
      expect(ctx.connection.workspace.applyEdit).not.toHaveBeenCalled();
      expect(ctx.logger.error).not.toHaveBeenCalled();
    });

    test("cancellation before synthesis", async () => {
      const ctx = openContext();
      const source = new CancellationTokenSource();
      source.cancel();
      await expect(handleInsertResource(ctx as never, params(), source.token)).resolves.toBeNull();
      expect(ctx.connection.workspace.applyEdit).not.toHaveBeenCalled();
    });

    test("cancellation during normalization", async () => {
      const ctx = openContext();
      let reads = 0;
      const token = {
        get isCancellationRequested() {
          reads += 1;
          return reads > 2;
        },
        onCancellationRequested: vi.fn(),
      };
      await expect(handleInsertResource(ctx as never, params(), token as never)).resolves.toBeNull();
      expect(reads).toBe(3);
      expect(ctx.connection.workspace.applyEdit).not.toHaveBeenCalled();
      expect(ctx.logger.error).not.toHaveBeenCalled();
    });
  });

  describe("failures", () => {
    test("a failing semantic model leaves the document untouched", async () => {
      const types = loadTypeCatalog();
      const ctx = openContext({ types, compilationTypes: failingProvider(types, 3) });

      const result = handleInsertResource(ctx as never, params());
      await expect(result).rejects.toBeInstanceOf(ResponseError);
      await expect(result).rejects.toMatchObject({
        code: LSPErrorCodes.RequestFailed,
        message: "Failed to insert the resource",
      });
      expect(ctx.connection.workspace.applyEdit).not.toHaveBeenCalled();
      expect(ctx.logger.error).toHaveBeenCalledWith(
        expect.stringContaining("Semantic analysis failed during recase in iteration 2: schema store unavailable"),
      );
    });

    test("a fetch error is reported as a request failure", async () => {
      const ctx = openContext();
      ctx.fetcher.fetch.mockRejectedValueOnce(new ResourceFetchError("GET /x failed: HTTP 500", 500));
      await expect(handleInsertResource(ctx as never, params())).rejects.toBeInstanceOf(ResponseError);
      expect(ctx.logger.error).toHaveBeenCalledWith(expect.stringContaining("HTTP 500"));
    });

    test("an edit the client refuses is a failure", async () => {
      const ctx = openContext({ applied: { applied: false, failureReason: "document is read-only" } });
      await expect(handleInsertResource(ctx as never, params())).rejects.toBeInstanceOf(ResponseError);
      expect(ctx.logger.error).toHaveBeenCalledWith(
        expect.stringContaining("Client did not apply the edit: document is read-only"),
      );
      expect(ctx.logger.info).not.toHaveBeenCalled();
    });
  });
});

describe("registerInsertResourceHandlers", () => {
  test("registers the request under its method name", () => {
    const ctx = createMockContext();
    registerInsertResourceHandlers(ctx as never);
    expect(ctx.connection.onRequest).toHaveBeenCalledWith(INSERT_RESOURCE_METHOD, expect.any(Function));
    expect(INSERT_RESOURCE_METHOD).toBe("textDocument/insertResource");
  });

  test("passes its options to every request", async () => {
    const ctx = createMockContext();
    ctx.compilations.upsert(DOC_URI, HOST, 1);
    const exporter = createCollectingExporter();
    registerInsertResourceHandlers(ctx as never, { traceExporter: exporter });
    const [, handler] = ctx.connection.onRequest.mock.calls[0] ?? [];
    await handler(params(), new CancellationTokenSource().token);
    expect(exporter.ended.at(-1)).toBe("insertResource");
    expect(ctx.connection.workspace.applyEdit).toHaveBeenCalledTimes(1);
  });
});
