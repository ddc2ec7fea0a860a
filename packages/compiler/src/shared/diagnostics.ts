import type {
  CompilerDiagnostic,
  DiagnosticCode,
  DiagnosticSeverity,
  DiagnosticStage,
} from "../model/diagnostics.js";
import type { TextSpan } from "../model/text.js";

export type {
  CompilerDiagnostic,
  DiagnosticCode,
  DiagnosticSeverity,
  DiagnosticStage,
} from "../model/diagnostics.js";

export interface BuildDiagnosticInput {
  code: DiagnosticCode;
  message: string;
  stage: DiagnosticStage;
  severity?: DiagnosticSeverity;
  span?: TextSpan | null | undefined;
}

/** Centralized diagnostic builder; severity defaults to error. */
export function buildDiagnostic(input: BuildDiagnosticInput): CompilerDiagnostic {
  return {
    code: input.code,
    message: input.message,
    stage: input.stage,
    severity: input.severity ?? "error",
    span: input.span ?? null,
  };
}

export function hasErrors(diagnostics: readonly CompilerDiagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === "error");
}
