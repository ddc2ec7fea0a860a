/* =============================================================================
 * PIPELINE ERRORS
 * -----------------------------------------------------------------------------
 * Structural failures surface as distinct error classes so callers can tell a
 * lowering problem from a normalization problem. Silent-abort conditions are
 * modelled as `null` results and never reach these classes.
 * ============================================================================= */

export const SynthesisErrorCode = {
  UNSUPPORTED_VALUE_KIND: "SYNTH_UNSUPPORTED_VALUE_KIND",
} as const;

export type SynthesisErrorCodeType = (typeof SynthesisErrorCode)[keyof typeof SynthesisErrorCode];

/**
 * Error while turning a JSON payload into syntax.
 */
export class SynthesisError extends Error {
  constructor(
    message: string,
    public readonly code: SynthesisErrorCodeType,
    /** JSON pointer of the offending value, when known. */
    public readonly path?: string,
  ) {
    super(message);
    this.name = "SynthesisError";
  }
}

export const NormalizationErrorCode = {
  MODEL_FAILED: "NORMALIZE_MODEL_FAILED",
  CANCELLED: "NORMALIZE_CANCELLED",
} as const;

export type NormalizationErrorCodeType = (typeof NormalizationErrorCode)[keyof typeof NormalizationErrorCode];

/**
 * Error inside the recase/prune loop. No partial output exists when this is thrown.
 */
export class NormalizationError extends Error {
  constructor(
    message: string,
    public readonly code: NormalizationErrorCodeType,
    /** 1-based iteration in which the failure happened. */
    public readonly iteration: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "NormalizationError";
  }
}

/**
 * The semantic model refused a tree (it still contains unparsed text).
 */
export class SemanticModelError extends Error {
  constructor(
    message: string,
    public readonly uri: string,
  ) {
    super(message);
    this.name = "SemanticModelError";
  }
}

/**
 * A type catalog document failed validation.
 */
export class CatalogError extends Error {
  constructor(
    message: string,
    /** Dotted path inside the catalog document, e.g. `resources[2].body`. */
    public readonly path: string,
  ) {
    super(`${path}: ${message}`);
    this.name = "CatalogError";
  }
}

/**
 * Malformed JSON text.
 */
export class JsonReadError extends Error {
  constructor(
    message: string,
    public readonly offset: number,
  ) {
    super(`${message} at offset ${offset}`);
    this.name = "JsonReadError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
