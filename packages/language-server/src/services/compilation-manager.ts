/**
 * Compilation manager: one frozen compilation context per open document.
 *
 * A context is never modified. An edit, a configuration change or a new type
 * catalog replaces it wholesale, so a request that captured a context keeps a
 * consistent view even while the document changes underneath it.
 */
import {
  Compilation,
  createSourceFile,
  debug,
  type ResourceTypeProvider,
} from "@resource-ls/compiler";
import type { ResourceLsConfiguration } from "./configuration.js";
import type { FileResolver } from "./file-resolver.js";

export interface CompilationContext {
  readonly uri: string;
  /** Editor version; `null` for documents loaded from disk. */
  readonly version: number | null;
  readonly lineStarts: readonly number[];
  readonly compilation: Compilation;
  readonly fileResolver: FileResolver;
  readonly configuration: ResourceLsConfiguration;
}

export interface CompilationManagerOptions {
  types: ResourceTypeProvider;
  configuration: ResourceLsConfiguration;
  fileResolver: FileResolver;
}

interface OpenDocument {
  readonly text: string;
  readonly version: number | null;
}

export class CompilationManager {
  readonly #documents = new Map<string, OpenDocument>();
  readonly #contexts = new Map<string, CompilationContext>();
  readonly #fileResolver: FileResolver;
  #types: ResourceTypeProvider;
  #configuration: ResourceLsConfiguration;

  constructor(options: CompilationManagerOptions) {
    this.#types = options.types;
    this.#configuration = options.configuration;
    this.#fileResolver = options.fileResolver;
  }

  get configuration(): ResourceLsConfiguration {
    return this.#configuration;
  }

  get types(): ResourceTypeProvider {
    return this.#types;
  }

  /** Compile (or recompile) an open document. */
  upsert(uri: string, text: string, version: number | null = null): CompilationContext {
    this.#documents.set(uri, { text, version });
    const context = this.#compile(uri, text, version);
    this.#contexts.set(uri, context);
    return context;
  }

  close(uri: string): void {
    this.#documents.delete(uri);
    this.#contexts.delete(uri);
  }

  /**
   * Context for `uri`: the open document's, or a fresh one built from the file
   * resolver. `null` when the document is neither open nor readable.
   */
  getCompilation(uri: string): CompilationContext | null {
    const open = this.#contexts.get(uri);
    if (open) return open;
    const text = this.#fileResolver.tryRead(uri);
    if (text === null) {
      debug.server("compilation.missing", { uri });
      return null;
    }
    return this.#compile(uri, text, null);
  }

  openUris(): readonly string[] {
    return [...this.#contexts.keys()];
  }

  /** Swap types and/or configuration, then recompile every open document. */
  reconfigure(update: { types?: ResourceTypeProvider; configuration?: ResourceLsConfiguration }): void {
    if (update.types) this.#types = update.types;
    if (update.configuration) this.#configuration = update.configuration;
    for (const [uri, doc] of this.#documents) {
      this.#contexts.set(uri, this.#compile(uri, doc.text, doc.version));
    }
  }

  #compile(uri: string, text: string, version: number | null): CompilationContext {
    const sourceFile = createSourceFile(uri, text);
    const compilation = new Compilation(sourceFile, this.#types, this.#configuration.analyzers);
    debug.server("compile", { uri, version, statements: sourceFile.program.statements.length });
    return Object.freeze({
      uri,
      version,
      lineStarts: sourceFile.lineStarts,
      compilation,
      fileResolver: this.#fileResolver,
      configuration: this.#configuration,
    });
  }
}
