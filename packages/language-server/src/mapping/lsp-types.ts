/**
 * Type mapping utilities: compiler types → LSP types
 */
import {
  DiagnosticSeverity as LspDiagnosticSeverity,
  type Diagnostic,
  type Range,
  type WorkspaceEdit,
} from "vscode-languageserver/node.js";
import {
  spanToRange,
  type CompilerDiagnostic,
  type DiagnosticSeverity,
  type EditDescriptor,
  type TextRange,
} from "@resource-ls/compiler";

export const DIAGNOSTIC_SOURCE = "resource-ls";

export function toRange(range: TextRange): Range {
  return {
    start: { line: range.start.line, character: range.start.character },
    end: { line: range.end.line, character: range.end.character },
  };
}

export function toLspSeverity(severity: DiagnosticSeverity): LspDiagnosticSeverity {
  switch (severity) {
    case "warning":
      return LspDiagnosticSeverity.Warning;
    case "info":
      return LspDiagnosticSeverity.Information;
    default:
      return LspDiagnosticSeverity.Error;
  }
}

/** Diagnostics without a span have no place in the editor and are dropped. */
export function mapDiagnostics(diags: readonly CompilerDiagnostic[], lineStarts: readonly number[]): Diagnostic[] {
  const mapped: Diagnostic[] = [];
  for (const diag of diags) {
    if (!diag.span) continue;
    mapped.push({
      range: toRange(spanToRange(diag.span, lineStarts)),
      message: diag.message,
      severity: toLspSeverity(diag.severity),
      code: diag.code,
      source: DIAGNOSTIC_SOURCE,
    });
  }
  return mapped;
}

export function mapWorkspaceEdit(edit: EditDescriptor): WorkspaceEdit {
  return {
    changes: {
      [edit.uri]: [{ range: toRange(edit.range), newText: edit.newText }],
    },
  };
}
