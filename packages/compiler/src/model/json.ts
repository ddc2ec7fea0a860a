/* =======================================================================================
 * JSON VALUE MODEL
 * ---------------------------------------------------------------------------------------
 * Untyped JSON tree as delivered by a resource provider. Object entries keep their
 * authored order (and duplicates); numbers keep their raw lexeme so integers wider
 * than a double survive until lowering decides how to represent them.
 * ======================================================================================= */

import { JsonReadError, SynthesisError, SynthesisErrorCode } from "../shared/errors.js";

export type JsonValue =
  | JsonObject
  | JsonArray
  | JsonString
  | JsonNumber
  | JsonBoolean
  | JsonNull;

export type JsonValueKind = JsonValue["$kind"];

export interface JsonObject {
  readonly $kind: "Object";
  readonly entries: readonly (readonly [key: string, value: JsonValue])[];
}

export interface JsonArray {
  readonly $kind: "Array";
  readonly items: readonly JsonValue[];
}

export interface JsonString {
  readonly $kind: "String";
  readonly value: string;
}

export interface JsonNumber {
  readonly $kind: "Number";
  /** Lexeme as written in the source text (or `String(value)` for parsed values). */
  readonly raw: string;
  readonly value: number;
}

export interface JsonBoolean {
  readonly $kind: "Boolean";
  readonly value: boolean;
}

export interface JsonNull {
  readonly $kind: "Null";
}

export const JSON_NULL: JsonNull = { $kind: "Null" };

export function jsonObject(entries: readonly (readonly [string, JsonValue])[]): JsonObject {
  return { $kind: "Object", entries };
}

export function jsonArray(items: readonly JsonValue[]): JsonArray {
  return { $kind: "Array", items };
}

export function jsonString(value: string): JsonString {
  return { $kind: "String", value };
}

export function jsonNumber(raw: string): JsonNumber {
  return { $kind: "Number", raw, value: Number(raw) };
}

export function jsonBoolean(value: boolean): JsonBoolean {
  return { $kind: "Boolean", value };
}

/**
 * Convert an already-parsed JavaScript value (e.g. from `JSON.parse`).
 * Anything JSON cannot represent fails with SYNTH_UNSUPPORTED_VALUE_KIND.
 */
export function toJsonValue(value: unknown, path = ""): JsonValue {
  if (value === null) return JSON_NULL;
  switch (typeof value) {
    case "string":
      return jsonString(value);
    case "boolean":
      return jsonBoolean(value);
    case "number":
      if (!Number.isFinite(value)) {
        throw unsupported(`non-finite number ${value}`, path);
      }
      return { $kind: "Number", raw: String(value), value };
    case "object": {
      if (Array.isArray(value)) {
        return jsonArray(value.map((item: unknown, i) => toJsonValue(item, `${path}/${i}`)));
      }
      const entries: (readonly [string, JsonValue])[] = [];
      for (const [key, item] of Object.entries(value)) {
        entries.push([key, toJsonValue(item, `${path}/${escapePointer(key)}`)]);
      }
      return jsonObject(entries);
    }
    default:
      throw unsupported(typeof value, path);
  }
}

function unsupported(kind: string, path: string): SynthesisError {
  return new SynthesisError(
    `Unsupported JSON value kind '${kind}' at '${path || "/"}'`,
    SynthesisErrorCode.UNSUPPORTED_VALUE_KIND,
    path || "/",
  );
}

function escapePointer(key: string): string {
  return key.replace(/~/g, "~0").replace(/\//g, "~1");
}

// =============================================================================
// Reader
// =============================================================================

const NUMBER_PATTERN = /-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?/y;

/**
 * Parse JSON text into a JsonValue, keeping number lexemes and key order intact.
 */
export function readJson(text: string): JsonValue {
  const reader = new JsonReader(text);
  const value = reader.readValue();
  reader.skipWhitespace();
  if (!reader.atEnd()) {
    throw new JsonReadError("Unexpected trailing content", reader.position);
  }
  return value;
}

class JsonReader {
  position = 0;

  constructor(private readonly text: string) {}

  atEnd(): boolean {
    return this.position >= this.text.length;
  }

  skipWhitespace(): void {
    while (!this.atEnd()) {
      const ch = this.text.charCodeAt(this.position);
      if (ch !== 0x20 && ch !== 0x09 && ch !== 0x0a && ch !== 0x0d) break;
      this.position += 1;
    }
  }

  readValue(): JsonValue {
    this.skipWhitespace();
    const ch = this.text[this.position];
    switch (ch) {
      case "{":
        return this.readObject();
      case "[":
        return this.readArray();
      case '"':
        return jsonString(this.readString());
      case "t":
        return this.readKeyword("true", jsonBoolean(true));
      case "f":
        return this.readKeyword("false", jsonBoolean(false));
      case "n":
        return this.readKeyword("null", JSON_NULL);
      default:
        return this.readNumber();
    }
  }

  private readObject(): JsonObject {
    this.expect("{");
    const entries: (readonly [string, JsonValue])[] = [];
    this.skipWhitespace();
    if (this.tryConsume("}")) return jsonObject(entries);
    for (;;) {
      this.skipWhitespace();
      if (this.text[this.position] !== '"') {
        throw new JsonReadError("Expected property name", this.position);
      }
      const key = this.readString();
      this.skipWhitespace();
      this.expect(":");
      entries.push([key, this.readValue()]);
      this.skipWhitespace();
      if (this.tryConsume("}")) return jsonObject(entries);
      this.expect(",");
    }
  }

  private readArray(): JsonArray {
    this.expect("[");
    const items: JsonValue[] = [];
    this.skipWhitespace();
    if (this.tryConsume("]")) return jsonArray(items);
    for (;;) {
      items.push(this.readValue());
      this.skipWhitespace();
      if (this.tryConsume("]")) return jsonArray(items);
      this.expect(",");
    }
  }

  private readString(): string {
    const start = this.position;
    this.expect('"');
    let out = "";
    for (;;) {
      if (this.atEnd()) throw new JsonReadError("Unterminated string", start);
      const ch = this.text[this.position] ?? "";
      this.position += 1;
      if (ch === '"') return out;
      if (ch.charCodeAt(0) < 0x20) {
        throw new JsonReadError("Control character in string", this.position - 1);
      }
      if (ch !== "\\") {
        out += ch;
        continue;
      }
      const escape = this.text[this.position];
      this.position += 1;
      switch (escape) {
        case '"': out += '"'; break;
        case "\\": out += "\\"; break;
        case "/": out += "/"; break;
        case "b": out += "\b"; break;
        case "f": out += "\f"; break;
        case "n": out += "\n"; break;
        case "r": out += "\r"; break;
        case "t": out += "\t"; break;
        case "u": {
          const hex = this.text.slice(this.position, this.position + 4);
          if (!/^[0-9a-fA-F]{4}$/.test(hex)) {
            throw new JsonReadError("Invalid unicode escape", this.position - 2);
          }
          out += String.fromCharCode(parseInt(hex, 16));
          this.position += 4;
          break;
        }
        default:
          throw new JsonReadError("Invalid escape sequence", this.position - 2);
      }
    }
  }

  private readNumber(): JsonNumber {
    NUMBER_PATTERN.lastIndex = this.position;
    const match = NUMBER_PATTERN.exec(this.text);
    if (!match) {
      throw new JsonReadError(this.atEnd() ? "Unexpected end of input" : "Unexpected character", this.position);
    }
    this.position += match[0].length;
    return jsonNumber(match[0]);
  }

  private readKeyword<T extends JsonValue>(word: string, value: T): T {
    if (!this.text.startsWith(word, this.position)) {
      throw new JsonReadError("Unexpected character", this.position);
    }
    this.position += word.length;
    return value;
  }

  private expect(ch: string): void {
    if (this.text[this.position] !== ch) {
      throw new JsonReadError(`Expected '${ch}'`, this.position);
    }
    this.position += 1;
  }

  private tryConsume(ch: string): boolean {
    if (this.text[this.position] !== ch) return false;
    this.position += 1;
    return true;
  }
}
