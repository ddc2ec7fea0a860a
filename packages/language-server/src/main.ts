#!/usr/bin/env node
/**
 * RDL Language Server - Entry Point
 *
 * This is a thin entry point that creates the server context and wires together
 * all the handlers. The actual logic is split into:
 *
 * - context.ts                 - ServerContext with shared services and settings
 * - mapping/lsp-types.ts       - Type conversion from compiler types to LSP types
 * - handlers/insert-resource.ts - textDocument/insertResource
 * - handlers/lifecycle.ts      - Lifecycle and document event handlers
 */
import { createConnection, ProposedFeatures, TextDocuments } from "vscode-languageserver/node.js";
import { TextDocument } from "vscode-languageserver-textdocument";
import { createLogExporter, isDebugEnabled } from "@resource-ls/compiler";
import { createServerContext } from "./context.js";
import type { Logger } from "./services/types.js";
import { registerInsertResourceHandlers } from "./handlers/insert-resource.js";
import { registerLifecycleHandlers } from "./handlers/lifecycle.js";

// Create LSP connection and document store
const connection = createConnection(ProposedFeatures.all);
const documents = new TextDocuments(TextDocument);

// Create logger that writes to LSP connection console
const logger: Logger = {
  log: (m: string) => connection.console.log(`[resource-ls] ${m}`),
  info: (m: string) => connection.console.info(`[resource-ls] ${m}`),
  warn: (m: string) => connection.console.warn(`[resource-ls] ${m}`),
  error: (m: string) => connection.console.error(`[resource-ls] ${m}`),
};

// Create server context with all dependencies
const ctx = createServerContext({
  connection,
  documents,
  logger,
});

// Register all handlers
registerLifecycleHandlers(ctx);
registerInsertResourceHandlers(ctx, {
  // RESOURCE_LS_DEBUG=trace logs request timings
  traceExporter: isDebugEnabled("trace") ? createLogExporter((line) => logger.log(`[trace] ${line}`)) : undefined,
});

// Start listening
documents.listen(connection);
connection.listen();
