/**
 * Test factory functions for handler tests.
 *
 * Handlers only touch a handful of context members, so tests hand them plain
 * objects built from `vi.fn` and real compiler services.
 */
import { vi } from "vitest";
import type { ApplyWorkspaceEditParams, PublishDiagnosticsParams } from "vscode-languageserver/node.js";
import { readJson, type JsonValue, type ResourceTypeProvider } from "@resource-ls/compiler";
import {
  CompilationManager,
  DEFAULT_CONFIGURATION,
  MapFileResolver,
  loadTypeCatalog,
  type ResourceFetchRequest,
  type ResourceLsConfiguration,
} from "@resource-ls/language-server/api";

export const DOC_URI = "file:///work/main.rdl";
export const STORAGE_ID = "/subscriptions/sub-1/resourceGroups/rg-1/providers/Example.Storage/accounts/acct-01";

export function createLogger() {
  return { log: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export interface MockContextOptions {
  types?: ResourceTypeProvider;
  /** Provider the compilations are built against; defaults to `types`. */
  compilationTypes?: ResourceTypeProvider;
  configuration?: ResourceLsConfiguration;
  files?: readonly (readonly [string, string])[];
  payload?: JsonValue | null;
  applied?: { applied: boolean; failureReason?: string };
}

/** A context with a real compilation manager, a stub fetcher and a stub client. */
export function createMockContext(options: MockContextOptions = {}) {
  const types = options.types ?? loadTypeCatalog();
  const configuration = options.configuration ?? DEFAULT_CONFIGURATION;
  const compilations = new CompilationManager({
    types: options.compilationTypes ?? types,
    configuration,
    fileResolver: new MapFileResolver(options.files ?? []),
  });
  const payload = options.payload === undefined ? storagePayload() : options.payload;
  const applied = options.applied ?? { applied: true };
  return {
    logger: createLogger(),
    compilations,
    types,
    configuration,
    fetcher: { fetch: vi.fn((_request: ResourceFetchRequest) => Promise.resolve(payload)) },
    connection: {
      sendDiagnostics: vi.fn((_params: PublishDiagnosticsParams) => Promise.resolve()),
      onRequest: vi.fn(),
      workspace: { applyEdit: vi.fn((_params: ApplyWorkspaceEditParams) => Promise.resolve(applied)) },
    },
    applyConfiguration: vi.fn(),
  };
}

/** Live state of a storage account as the management endpoint reports it. */
export function storagePayload(): JsonValue {
  return readJson(
    JSON.stringify({
      id: STORAGE_ID,
      Name: "acct-01",
      location: "westus",
      sku: { name: "Standard" },
    }),
  );
}

/** Throws from `tryGetSchema` on the given (1-based) call. */
export function failingProvider(inner: ResourceTypeProvider, failOnCall: number): ResourceTypeProvider {
  let calls = 0;
  return {
    availableTypes: () => inner.availableTypes(),
    tryGetSchema: (descriptor) => {
      calls += 1;
      if (calls === failOnCall) throw new Error("schema store unavailable");
      return inner.tryGetSchema(descriptor);
    },
  };
}
