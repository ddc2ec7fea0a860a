import type { CompilerDiagnostic } from "../model/diagnostics.js";
import { computeLineStarts } from "../model/text.js";
import type { ProgramSyntax } from "./nodes.js";
import { parseProgram } from "./parser.js";

/** A parsed RDL document: text, tree, parse diagnostics and line starts. */
export interface SourceFile {
  readonly uri: string;
  readonly text: string;
  readonly program: ProgramSyntax;
  readonly lineStarts: readonly number[];
  readonly diagnostics: readonly CompilerDiagnostic[];
}

export function createSourceFile(uri: string, text: string): SourceFile {
  const { program, diagnostics } = parseProgram(text);
  return Object.freeze({ uri, text, program, lineStarts: computeLineStarts(text), diagnostics });
}
