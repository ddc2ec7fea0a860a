/* =======================================================================================
 * NORMALIZATION LOOP
 * ---------------------------------------------------------------------------------------
 * Aligns a synthesized declaration with its schema:
 *
 *   print → parse → [ model → recase → print → parse → model → prune → print → parse ] × 5
 *
 * The iteration count is fixed. There is no fixed-point detection: a renamed key can
 * give its children a type for the first time, so nested mismatches surface one
 * level per iteration, and the bound caps the work for schemas that never settle.
 *
 * Every sub-pass sees a semantic model built from scratch over the freshly printed
 * and re-parsed text. Nothing is returned unless all iterations succeed.
 * ======================================================================================= */

import { CANONICAL_PRINT_OPTIONS, printSyntax } from "../printer/printer.js";
import { ReadOnlyPropertyRemovalRewriter } from "../rewriters/read-only-property-removal.js";
import { TypeCasingFixerRewriter } from "../rewriters/type-casing-fixer.js";
import type { Compilation } from "../semantics/compilation.js";
import { SemanticModel, type SemanticModelFactory } from "../semantics/semantic-model.js";
import { debug } from "../shared/debug.js";
import { errorMessage, NormalizationError, NormalizationErrorCode } from "../shared/errors.js";
import { NOOP_TRACE, PipelineAttributes, type CompileTrace } from "../shared/trace.js";
import { createProgram } from "../syntax/factory.js";
import type { DeclarationSyntax, ProgramSyntax } from "../syntax/nodes.js";
import { createSourceFile, type SourceFile } from "../syntax/source-file.js";

export const MAX_NORMALIZATION_ITERATIONS = 5;

/** URI of the scratch document the loop analyzes. */
export const NORMALIZATION_DOCUMENT_URI = "inmemory:///generated.rdl";

/** Structurally compatible with an LSP `CancellationToken`. */
export interface CancellationSignal {
  readonly isCancellationRequested: boolean;
}

export interface NormalizeOptions {
  /** Compiled context of the host document; supplies types and analyzer settings. */
  readonly compilation: Compilation;
  readonly createModel?: SemanticModelFactory | undefined;
  readonly cancellation?: CancellationSignal | undefined;
  readonly trace?: CompileTrace | undefined;
}

export interface NormalizationResult {
  readonly program: ProgramSyntax;
  /** Canonical text of `program`. */
  readonly text: string;
  readonly iterations: number;
}

type Rewrite = (model: SemanticModel, program: ProgramSyntax) => ProgramSyntax;

const PASSES: readonly (readonly [name: string, rewrite: Rewrite])[] = [
  ["recase", (model, program) => TypeCasingFixerRewriter.rewrite(model, program)],
  ["prune", (model, program) => ReadOnlyPropertyRemovalRewriter.rewrite(model, program)],
];

export function normalizeDeclaration(declaration: DeclarationSyntax, options: NormalizeOptions): NormalizationResult {
  const trace = options.trace ?? NOOP_TRACE;
  return trace.span("normalize", () => {
    const createModel = options.createModel ?? SemanticModel.create;
    const { compilation } = options;
    let file = render(createProgram([declaration]));

    for (let iteration = 1; iteration <= MAX_NORMALIZATION_ITERATIONS; iteration += 1) {
      if (options.cancellation?.isCancellationRequested) {
        throw new NormalizationError("Normalization was cancelled", NormalizationErrorCode.CANCELLED, iteration);
      }
      const before = file.text;
      for (const [pass, rewrite] of PASSES) {
        let model: SemanticModel;
        try {
          model = createModel({ compilation, file, configuration: compilation.configuration });
        } catch (e) {
          throw new NormalizationError(
            `Semantic analysis failed during ${pass} in iteration ${iteration}: ${errorMessage(e)}`,
            NormalizationErrorCode.MODEL_FAILED,
            iteration,
            { cause: e },
          );
        }
        file = render(rewrite(model, file.program));
      }
      trace.event("normalize.iteration", { iteration, changed: file.text !== before });
      debug.normalize("iteration", { iteration, changed: file.text !== before, size: file.text.length });
    }

    const text = printSyntax(file.program, CANONICAL_PRINT_OPTIONS);
    trace.setAttributes({
      [PipelineAttributes.ITERATIONS]: MAX_NORMALIZATION_ITERATIONS,
      [PipelineAttributes.OUTPUT_SIZE]: text.length,
    });
    return { program: file.program, text, iterations: MAX_NORMALIZATION_ITERATIONS };
  });
}

function render(program: ProgramSyntax): SourceFile {
  return createSourceFile(NORMALIZATION_DOCUMENT_URI, printSyntax(program, CANONICAL_PRINT_OPTIONS));
}
