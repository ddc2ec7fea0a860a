/* =======================================================================================
 * DIAGNOSTIC MODEL (foundation types only)
 * ---------------------------------------------------------------------------------------
 * Pure type definitions with no external dependencies.
 * Builder functions live in shared/diagnostics.ts.
 * ======================================================================================= */

import type { TextSpan } from "./text.js";

export type DiagnosticSeverity = "error" | "warning" | "info";

/** Stage tags where the diagnostic was produced. */
export type DiagnosticStage = "parse" | "bind";

export type DiagnosticCode =
  | "rdl/unexpected-token"
  | "rdl/unterminated-string"
  | "rdl/expected-identifier"
  | "rdl/reserved-identifier"
  | "rdl/unknown-resource-type"
  | "rdl/unknown-property"
  | "rdl/property-casing"
  | "rdl/read-only-property";

/** Unified diagnostic envelope for compiler/LSP phases. */
export interface CompilerDiagnostic {
  code: DiagnosticCode;
  message: string;
  stage: DiagnosticStage;
  severity: DiagnosticSeverity;
  span: TextSpan | null;
}
