import type { CompilerDiagnostic } from "../model/diagnostics.js";
import type { ResourceTypeProvider } from "../schema/types.js";
import { SemanticModelError } from "../shared/errors.js";
import type { SourceFile } from "../syntax/source-file.js";
import type { AnalyzerConfiguration } from "./configuration.js";
import { SemanticModel } from "./semantic-model.js";

/**
 * Compiled state of one host document: its parsed file, the type provider and
 * analyzer configuration it was compiled against, and (lazily) its semantic model.
 *
 * A compilation never changes after construction; an edited document gets a new one.
 */
export class Compilation {
  #model: SemanticModel | null | undefined;

  constructor(
    readonly sourceFile: SourceFile,
    readonly types: ResourceTypeProvider,
    readonly configuration: AnalyzerConfiguration,
  ) {}

  /** `null` when the document still holds text the parser skipped. */
  getSemanticModel(): SemanticModel | null {
    if (this.#model === undefined) {
      try {
        this.#model = SemanticModel.create({ compilation: this, file: this.sourceFile, configuration: this.configuration });
      } catch (e) {
        if (!(e instanceof SemanticModelError)) throw e;
        this.#model = null;
      }
    }
    return this.#model;
  }

  getDiagnostics(): readonly CompilerDiagnostic[] {
    const model = this.getSemanticModel();
    return model ? [...this.sourceFile.diagnostics, ...model.diagnostics] : this.sourceFile.diagnostics;
  }
}
