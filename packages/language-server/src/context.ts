import type { Connection, TextDocuments } from "vscode-languageserver/node.js";
import type { TextDocument } from "vscode-languageserver-textdocument";
import { ResourceTypeCatalog, type ResourceTypeProvider } from "@resource-ls/compiler";
import { CompilationManager } from "./services/compilation-manager.js";
import { DEFAULT_CONFIGURATION, type ResourceLsConfiguration } from "./services/configuration.js";
import { NodeFileResolver, type FileResolver } from "./services/file-resolver.js";
import { HttpResourceFetcher, type ResourceFetcher } from "./services/resource-client.js";
import { loadTypeCatalog } from "./services/type-catalog.js";
import type { Logger } from "./services/types.js";

/**
 * Shared server context passed to all handlers.
 * Holds references to core services; the catalog and fetcher are replaced
 * when configuration changes.
 */
export interface ServerContext {
  readonly connection: Connection;
  readonly documents: TextDocuments<TextDocument>;
  readonly logger: Logger;
  readonly compilations: CompilationManager;

  // Replaced on configuration change
  readonly configuration: ResourceLsConfiguration;
  readonly types: ResourceTypeProvider;
  readonly fetcher: ResourceFetcher;

  /** Apply new settings: reload the catalog when its path changed, recompile open documents. */
  applyConfiguration(configuration: ResourceLsConfiguration): void;
}

export interface ServerContextInit {
  connection: Connection;
  documents: TextDocuments<TextDocument>;
  logger: Logger;
  fileResolver?: FileResolver;
  loadCatalog?: (catalogPath: string | null) => ResourceTypeProvider;
  createFetcher?: (configuration: ResourceLsConfiguration) => ResourceFetcher;
}

/**
 * Creates the server context. Starts with an empty catalog; `initialize`
 * applies the real configuration.
 */
export function createServerContext(init: ServerContextInit): ServerContext {
  const { connection, documents, logger } = init;
  const loadCatalog = init.loadCatalog ?? loadTypeCatalog;
  const createFetcher = init.createFetcher ?? ((c: ResourceLsConfiguration) => new HttpResourceFetcher({ cloud: c.cloud }));

  let configuration = DEFAULT_CONFIGURATION;
  let types: ResourceTypeProvider = new ResourceTypeCatalog([]);
  let catalogPath: string | null | undefined;
  let fetcher = createFetcher(configuration);

  const compilations = new CompilationManager({
    types,
    configuration,
    fileResolver: init.fileResolver ?? new NodeFileResolver(),
  });

  function applyConfiguration(next: ResourceLsConfiguration): void {
    if (catalogPath === undefined || next.catalogPath !== catalogPath) {
      types = loadCatalog(next.catalogPath);
      catalogPath = next.catalogPath;
      logger.info(`[catalog] loaded ${types.availableTypes().length} type versions from ${next.catalogPath ?? "<bundled>"}`);
    }
    configuration = next;
    fetcher = createFetcher(next);
    compilations.reconfigure({ types, configuration });
  }

  return {
    connection,
    documents,
    logger,
    compilations,
    get configuration() { return configuration; },
    get types() { return types; },
    get fetcher() { return fetcher; },
    applyConfiguration,
  };
}
