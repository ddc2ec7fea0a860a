/**
 * LSP lifecycle handlers: initialize, document events, configuration changes
 */
import {
  TextDocumentSyncKind,
  type DidChangeConfigurationParams,
  type InitializeParams,
  type InitializeResult,
} from "vscode-languageserver/node.js";
import type { TextDocument } from "vscode-languageserver-textdocument";
import type { ServerContext } from "../context.js";
import { mapDiagnostics } from "../mapping/lsp-types.js";
import { CONFIGURATION_SECTION, isRecord, resolveConfiguration } from "../services/configuration.js";
import { INSERT_RESOURCE_METHOD } from "./insert-resource.js";

export async function refreshDocument(ctx: ServerContext, doc: TextDocument, reason: "open" | "change"): Promise<void> {
  try {
    const context = ctx.compilations.upsert(doc.uri, doc.getText(), doc.version);
    const diagnostics = mapDiagnostics(context.compilation.getDiagnostics(), context.lineStarts);
    ctx.logger.log(`${reason} ${doc.uri}: ${diagnostics.length} diagnostics`);
    await ctx.connection.sendDiagnostics({ uri: doc.uri, diagnostics });
  } catch (e: unknown) {
    // Previous diagnostics stay on screen.
    const message = e instanceof Error ? e.stack ?? e.message : String(e);
    ctx.logger.error(`refreshDocument failed: ${message}`);
  }
}

async function refreshAllOpenDocuments(ctx: ServerContext): Promise<void> {
  for (const doc of ctx.documents.all()) {
    await refreshDocument(ctx, doc, "change");
  }
}

/** The `resourceLs` section out of initialization options or pushed settings. */
export function settingsSection(settings: unknown): unknown {
  return isRecord(settings) ? settings[CONFIGURATION_SECTION] : undefined;
}

export function handleInitialize(ctx: ServerContext, params: InitializeParams): InitializeResult {
  const initOptions: unknown = params.initializationOptions;
  ctx.applyConfiguration(resolveConfiguration(settingsSection(initOptions)));
  ctx.logger.info(`initialize: root=${params.rootUri ?? "<none>"} endpoint=${ctx.configuration.cloud.endpoint}`);
  return {
    capabilities: {
      textDocumentSync: TextDocumentSyncKind.Incremental,
      experimental: { insertResource: { method: INSERT_RESOURCE_METHOD } },
    },
  };
}

export async function handleDidChangeConfiguration(ctx: ServerContext, params: DidChangeConfigurationParams): Promise<void> {
  try {
    const settings: unknown = params.settings;
    ctx.applyConfiguration(resolveConfiguration(settingsSection(settings), ctx.configuration));
  } catch (e: unknown) {
    const message = e instanceof Error ? e.message : String(e);
    ctx.logger.error(`didChangeConfiguration: keeping previous settings: ${message}`);
    return;
  }
  await refreshAllOpenDocuments(ctx);
}

/**
 * Registers all lifecycle handlers on the connection and documents.
 */
export function registerLifecycleHandlers(ctx: ServerContext): void {
  ctx.connection.onInitialize((params) => handleInitialize(ctx, params));

  ctx.documents.onDidOpen((e) => {
    ctx.logger.log(`didOpen ${e.document.uri}`);
    void refreshDocument(ctx, e.document, "open");
  });

  ctx.documents.onDidChangeContent((e) => {
    ctx.logger.log(`didChange ${e.document.uri}`);
    void refreshDocument(ctx, e.document, "change");
  });

  ctx.documents.onDidClose((e) => {
    ctx.logger.log(`didClose ${e.document.uri}`);
    ctx.compilations.close(e.document.uri);
    void ctx.connection.sendDiagnostics({ uri: e.document.uri, diagnostics: [] });
  });

  ctx.connection.onDidChangeConfiguration((params) => {
    ctx.logger.log("didChangeConfiguration: re-reading settings");
    void handleDidChangeConfiguration(ctx, params);
  });
}
