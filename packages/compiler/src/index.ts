// Compiler package public API
//
// This barrel exports the insert-resource pipeline and the RDL language pieces it
// is built from. Import from here rather than deep paths for stability.

// === JSON model ===
export {
  JSON_NULL,
  jsonArray,
  jsonBoolean,
  jsonNumber,
  jsonObject,
  jsonString,
  readJson,
  toJsonValue,
} from "./model/json.js";
export type {
  JsonArray,
  JsonBoolean,
  JsonNull,
  JsonNumber,
  JsonObject,
  JsonString,
  JsonValue,
  JsonValueKind,
} from "./model/json.js";

// === Text ===
export { computeLineStarts, offsetAt, positionAt, spanEnd, spanFromBounds, spanToRange } from "./model/text.js";
export type { Position, TextRange, TextSpan } from "./model/text.js";

// === Syntax ===
export { Scanner, TokenType, isIdentifierPart, isIdentifierStart } from "./syntax/scanner.js";
export type { Token } from "./syntax/scanner.js";
export { parseProgram } from "./syntax/parser.js";
export type { ParseResult } from "./syntax/parser.js";
export {
  EXISTING_KEYWORD,
  RESOURCE_KEYWORD,
  createArray,
  createBooleanLiteral,
  createDeclaration,
  createIdentifier,
  createIntegerLiteral,
  createNullLiteral,
  createObject,
  createObjectProperty,
  createProgram,
  createPropertyKey,
  createStringLiteral,
  createToken,
  isValidIdentifier,
} from "./syntax/factory.js";
export type { CreateDeclarationInput } from "./syntax/factory.js";
export { isDeclaration, propertyKeyName } from "./syntax/nodes.js";
export type {
  ArrayExprSyntax,
  BooleanLiteralSyntax,
  DeclarationSyntax,
  IdentifierSyntax,
  IntegerLiteralSyntax,
  NullLiteralSyntax,
  ObjectExprSyntax,
  ObjectPropertySyntax,
  ProgramSyntax,
  PropertyKeySyntax,
  SkippedSyntax,
  StatementSyntax,
  StringLiteralSyntax,
  SyntaxKind,
  SyntaxNode,
  TokenSyntax,
  ValueSyntax,
} from "./syntax/nodes.js";
export { syntaxEquals } from "./syntax/equality.js";
export { SyntaxRewriter } from "./syntax/rewriter.js";
export { createSourceFile } from "./syntax/source-file.js";
export type { SourceFile } from "./syntax/source-file.js";

// === Printer ===
export { CANONICAL_PRINT_OPTIONS, formatStringLiteral, printSyntax } from "./printer/printer.js";
export type { IndentKindOption, NewlineOption, PrintOptions } from "./printer/printer.js";

// === Schema ===
export { ResourceTypeCatalog } from "./schema/catalog.js";
export { compareApiVersions } from "./schema/api-version.js";
export { matchResourceType } from "./schema/type-matcher.js";
export { formatTypeReference, hasFlag, parseTypeReference } from "./schema/types.js";
export type {
  ArraySchema,
  ObjectSchema,
  PrimitiveSchema,
  PropertyFlag,
  PropertySchema,
  ResourceSchema,
  ResourceTypeProvider,
  SchemaType,
  TypeDescriptor,
} from "./schema/types.js";

// === Semantics ===
export { Compilation } from "./semantics/compilation.js";
export { DEFAULT_ANALYZER_CONFIGURATION, isDiagnosticLevel } from "./semantics/configuration.js";
export type { AnalyzerConfiguration, DiagnosticLevel } from "./semantics/configuration.js";
export { SemanticModel } from "./semantics/semantic-model.js";
export type {
  DeclarationBinding,
  PropertyBinding,
  SemanticModelFactory,
  SemanticModelInput,
} from "./semantics/semantic-model.js";

// === Rewriters ===
export { TypeCasingFixerRewriter } from "./rewriters/type-casing-fixer.js";
export { ReadOnlyPropertyRemovalRewriter } from "./rewriters/read-only-property-removal.js";

// === Synthesis ===
export { lowerJsonValue } from "./synthesis/lower.js";
export { sanitizeIdentifier, synthesizeDeclaration } from "./synthesis/declaration.js";
export {
  MAX_NORMALIZATION_ITERATIONS,
  NORMALIZATION_DOCUMENT_URI,
  normalizeDeclaration,
} from "./synthesis/normalize.js";
export type { CancellationSignal, NormalizationResult, NormalizeOptions } from "./synthesis/normalize.js";
export { synthesizeResourceInsertion } from "./synthesis/insertion.js";
export type { ResourceInsertionInput } from "./synthesis/insertion.js";

// === Edits ===
export {
  applyReplacement,
  assertWithinDocument,
  createEditDescriptor,
  makeInsertion,
  offsetAtPosition,
  replacementToRange,
} from "./edits/code-replacement.js";
export type { CodeReplacement, EditDescriptor } from "./edits/code-replacement.js";

// === Resources ===
export { parseResourceId } from "./resources/resource-id.js";
export type { ResourceIdentifier } from "./resources/resource-id.js";

// === Diagnostics ===
export { buildDiagnostic, hasErrors } from "./shared/diagnostics.js";
export type { BuildDiagnosticInput } from "./shared/diagnostics.js";
export type {
  CompilerDiagnostic,
  DiagnosticCode,
  DiagnosticSeverity,
  DiagnosticStage,
} from "./model/diagnostics.js";

// === Errors ===
export {
  CatalogError,
  JsonReadError,
  NormalizationError,
  NormalizationErrorCode,
  SemanticModelError,
  SynthesisError,
  SynthesisErrorCode,
  errorMessage,
} from "./shared/errors.js";
export type { NormalizationErrorCodeType, SynthesisErrorCodeType } from "./shared/errors.js";

// === Debug ===
export { configureDebug, debug, isDebugEnabled, refreshDebugChannels } from "./shared/debug.js";
export type { Debug, DebugChannel, DebugConfig, DebugData } from "./shared/debug.js";

// === Trace ===
export {
  NOOP_SPAN,
  NOOP_TRACE,
  PipelineAttributes,
  createCollectingExporter,
  createLogExporter,
  createTrace,
  nowNanos,
} from "./shared/trace.js";
export type {
  AttributeValue,
  CollectingExporter,
  CompileTrace,
  CreateTraceOptions,
  Span,
  SpanEvent,
  TraceExporter,
} from "./shared/trace.js";
