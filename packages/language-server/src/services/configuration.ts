/**
 * Server settings, read from the client's `resourceLs` configuration section.
 *
 * Unknown or ill-typed values fall back to the defaults field by field, so a typo
 * in one setting never discards the rest.
 */
import {
  CANONICAL_PRINT_OPTIONS,
  DEFAULT_ANALYZER_CONFIGURATION,
  isDiagnosticLevel,
  type AnalyzerConfiguration,
  type DiagnosticLevel,
  type PrintOptions,
} from "@resource-ls/compiler";

export const CONFIGURATION_SECTION = "resourceLs";

export interface CloudConfiguration {
  /** Base URL the resource id is appended to. */
  readonly endpoint: string;
  /** Name of the environment variable holding the bearer token. */
  readonly tokenVariable: string;
}

export interface ResourceLsConfiguration {
  readonly formatting: PrintOptions;
  readonly analyzers: AnalyzerConfiguration;
  readonly cloud: CloudConfiguration;
  /** Type catalog file; the bundled catalog when `null`. */
  readonly catalogPath: string | null;
}

export const DEFAULT_CONFIGURATION: ResourceLsConfiguration = Object.freeze({
  formatting: CANONICAL_PRINT_OPTIONS,
  analyzers: DEFAULT_ANALYZER_CONFIGURATION,
  cloud: Object.freeze({
    endpoint: "https://management.example.com",
    tokenVariable: "RESOURCE_LS_TOKEN",
  }),
  catalogPath: null,
});

export function resolveConfiguration(
  raw: unknown,
  base: ResourceLsConfiguration = DEFAULT_CONFIGURATION,
): ResourceLsConfiguration {
  if (!isRecord(raw)) return base;
  const formatting = isRecord(raw["formatting"]) ? raw["formatting"] : {};
  const analyzers = isRecord(raw["analyzers"]) ? raw["analyzers"] : {};
  const cloud = isRecord(raw["cloud"]) ? raw["cloud"] : {};
  const catalogPath = raw["catalogPath"];

  return Object.freeze({
    formatting: Object.freeze({
      newline: pick(formatting["newline"], isNewline, base.formatting.newline),
      indentKind: pick(formatting["indentKind"], isIndentKind, base.formatting.indentKind),
      indentSize: pick(formatting["indentSize"], isIndentSize, base.formatting.indentSize),
      insertFinalNewline: pick(formatting["insertFinalNewline"], isBoolean, base.formatting.insertFinalNewline),
    }),
    analyzers: Object.freeze({
      unknownResourceTypes: level(analyzers["unknownResourceTypes"], base.analyzers.unknownResourceTypes),
      unknownProperties: level(analyzers["unknownProperties"], base.analyzers.unknownProperties),
      propertyCasing: level(analyzers["propertyCasing"], base.analyzers.propertyCasing),
      readOnlyProperties: level(analyzers["readOnlyProperties"], base.analyzers.readOnlyProperties),
    }),
    cloud: Object.freeze({
      endpoint: pick(cloud["endpoint"], isNonEmptyString, base.cloud.endpoint),
      tokenVariable: pick(cloud["tokenVariable"], isNonEmptyString, base.cloud.tokenVariable),
    }),
    catalogPath: isNonEmptyString(catalogPath) ? catalogPath : catalogPath === null ? null : base.catalogPath,
  });
}

function pick<T>(value: unknown, guard: (value: unknown) => value is T, fallback: T): T {
  return guard(value) ? value : fallback;
}

function level(value: unknown, fallback: DiagnosticLevel): DiagnosticLevel {
  return isDiagnosticLevel(value) ? value : fallback;
}

function isNewline(value: unknown): value is PrintOptions["newline"] {
  return value === "LF" || value === "CRLF";
}

function isIndentKind(value: unknown): value is PrintOptions["indentKind"] {
  return value === "space" || value === "tab";
}

function isIndentSize(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= 16;
}

function isBoolean(value: unknown): value is boolean {
  return typeof value === "boolean";
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.length > 0;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
