import { makeInsertion, type CodeReplacement } from "../edits/code-replacement.js";
import type { JsonValue } from "../model/json.js";
import { CANONICAL_PRINT_OPTIONS, printSyntax, type PrintOptions } from "../printer/printer.js";
import type { ResourceIdentifier } from "../resources/resource-id.js";
import type { TypeDescriptor } from "../schema/types.js";
import type { Compilation } from "../semantics/compilation.js";
import type { SemanticModelFactory } from "../semantics/semantic-model.js";
import { NOOP_TRACE, PipelineAttributes, type CompileTrace } from "../shared/trace.js";
import { synthesizeDeclaration } from "./declaration.js";
import { normalizeDeclaration, type CancellationSignal } from "./normalize.js";

export interface ResourceInsertionInput {
  readonly identifier: ResourceIdentifier;
  /** Descriptor chosen by the type matcher. */
  readonly descriptor: TypeDescriptor;
  readonly body: JsonValue;
  /** Compilation of the host document. */
  readonly compilation: Compilation;
  /** Insertion point in the host document. */
  readonly offset: number;
  /** Options for the final render; canonical when omitted. */
  readonly printOptions?: PrintOptions | undefined;
  readonly createModel?: SemanticModelFactory | undefined;
  readonly cancellation?: CancellationSignal | undefined;
  readonly trace?: CompileTrace | undefined;
}

/**
 * Synthesize, normalize and print a declaration, and place it at `offset`.
 *
 * Pure apart from tracing: errors propagate (SynthesisError, NormalizationError,
 * RangeError for an offset outside the host document) and no replacement exists
 * unless every step succeeded.
 */
export function synthesizeResourceInsertion(input: ResourceInsertionInput): CodeReplacement {
  const trace = input.trace ?? NOOP_TRACE;
  return trace.span("synthesis", () => {
    trace.setAttributes({
      [PipelineAttributes.RESOURCE_TYPE]: input.descriptor.fullyQualifiedType,
      [PipelineAttributes.API_VERSION]: input.descriptor.apiVersion,
      [PipelineAttributes.DOCUMENT_URI]: input.compilation.sourceFile.uri,
    });
    const declaration = trace.span("synthesis.declaration", () =>
      synthesizeDeclaration(input.identifier, input.descriptor, input.body),
    );
    const normalized = normalizeDeclaration(declaration, {
      compilation: input.compilation,
      createModel: input.createModel,
      cancellation: input.cancellation,
      trace,
    });
    const text = printSyntax(normalized.program, input.printOptions ?? CANONICAL_PRINT_OPTIONS);
    return makeInsertion(input.offset, text, input.compilation.sourceFile.text.length);
  });
}
