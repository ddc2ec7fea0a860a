import type { JsonNumber, JsonValue } from "../model/json.js";
import { SynthesisError, SynthesisErrorCode } from "../shared/errors.js";
import {
  createArray,
  createBooleanLiteral,
  createIntegerLiteral,
  createNullLiteral,
  createObject,
  createObjectProperty,
  createStringLiteral,
} from "../syntax/factory.js";
import type { ValueSyntax } from "../syntax/nodes.js";

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;
const INTEGER_LEXEME = /^-?\d+$/;

/**
 * Transliterate a JSON value into RDL syntax.
 *
 * Object keys keep their order (and duplicates). Numbers that are not 32-bit
 * integers become string literals holding the number's text.
 */
export function lowerJsonValue(value: JsonValue): ValueSyntax {
  switch (value.$kind) {
    case "Object":
      return createObject(value.entries.map(([key, entry]) => createObjectProperty(key, lowerJsonValue(entry))));
    case "Array":
      return createArray(value.items.map(lowerJsonValue));
    case "String":
      return createStringLiteral(value.value);
    case "Number":
      return lowerNumber(value);
    case "Boolean":
      return createBooleanLiteral(value.value);
    case "Null":
      return createNullLiteral();
    default: {
      const unknownKind: never = value;
      throw unsupportedKind(unknownKind);
    }
  }
}

function lowerNumber(value: JsonNumber): ValueSyntax {
  if (INTEGER_LEXEME.test(value.raw)) {
    const n = Number(value.raw);
    if (n >= INT32_MIN && n <= INT32_MAX) return createIntegerLiteral(n);
  }
  return createStringLiteral(value.raw);
}

function unsupportedKind(value: unknown): SynthesisError {
  const kind = typeof value === "object" && value !== null && "$kind" in value ? String(value.$kind) : typeof value;
  return new SynthesisError(`Unsupported JSON value kind '${kind}'`, SynthesisErrorCode.UNSUPPORTED_VALUE_KIND);
}
