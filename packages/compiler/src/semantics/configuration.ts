import type { DiagnosticSeverity } from "../model/diagnostics.js";

export type DiagnosticLevel = "off" | DiagnosticSeverity;

/** Per-rule diagnostic levels for the semantic model. */
export interface AnalyzerConfiguration {
  readonly unknownResourceTypes: DiagnosticLevel;
  readonly unknownProperties: DiagnosticLevel;
  readonly propertyCasing: DiagnosticLevel;
  readonly readOnlyProperties: DiagnosticLevel;
}

export const DEFAULT_ANALYZER_CONFIGURATION: AnalyzerConfiguration = Object.freeze({
  unknownResourceTypes: "warning",
  unknownProperties: "warning",
  propertyCasing: "warning",
  readOnlyProperties: "warning",
});

const LEVELS: ReadonlySet<string> = new Set<DiagnosticLevel>(["off", "info", "warning", "error"]);

export function isDiagnosticLevel(value: unknown): value is DiagnosticLevel {
  return typeof value === "string" && LEVELS.has(value);
}
