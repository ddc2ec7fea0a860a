/**
 * RDL scanner.
 *
 * Produces a flat token stream with offsets into the original text. Whitespace and
 * comments are trivia and never surface; newlines do, because they separate
 * statements, properties and array items.
 */

export enum TokenType {
  EOF,
  NewLine,
  Identifier,
  String,
  Integer,
  TrueKeyword,
  FalseKeyword,
  NullKeyword,
  LeftBrace,
  RightBrace,
  LeftSquare,
  RightSquare,
  Colon,
  Comma,
  Assignment,
  Minus,
  UnterminatedString,
  Unrecognized,
}

export interface Token {
  readonly type: TokenType;
  readonly start: number;
  readonly end: number;
  /** Decoded value for strings, raw text for everything else. */
  readonly value: string;
}

const KEYWORDS: ReadonlyMap<string, TokenType> = new Map([
  ["true", TokenType.TrueKeyword],
  ["false", TokenType.FalseKeyword],
  ["null", TokenType.NullKeyword],
]);

const PUNCTUATION: ReadonlyMap<string, TokenType> = new Map([
  ["{", TokenType.LeftBrace],
  ["}", TokenType.RightBrace],
  ["[", TokenType.LeftSquare],
  ["]", TokenType.RightSquare],
  [":", TokenType.Colon],
  [",", TokenType.Comma],
  ["=", TokenType.Assignment],
  ["-", TokenType.Minus],
]);

const STRING_ESCAPES: ReadonlyMap<string, string> = new Map([
  ["\\", "\\"],
  ["'", "'"],
  ["n", "\n"],
  ["r", "\r"],
  ["t", "\t"],
  ["$", "$"],
]);

export function isIdentifierStart(ch: number): boolean {
  return (ch >= 65 && ch <= 90) || (ch >= 97 && ch <= 122) || ch === 95;
}

export function isIdentifierPart(ch: number): boolean {
  return isIdentifierStart(ch) || isDigit(ch);
}

function isDigit(ch: number): boolean {
  return ch >= 48 && ch <= 57;
}

export class Scanner {
  #pos = 0;
  #peeked: Token | null = null;

  constructor(private readonly source: string) {}

  peek(): Token {
    this.#peeked ??= this.#scan();
    return this.#peeked;
  }

  next(): Token {
    const token = this.peek();
    this.#peeked = null;
    return token;
  }

  #scan(): Token {
    this.#skipTrivia();
    const src = this.source;
    const start = this.#pos;
    if (start >= src.length) {
      return { type: TokenType.EOF, start, end: start, value: "" };
    }

    const ch = src.charCodeAt(start);
    if (ch === 10 /* LF */ || ch === 13 /* CR */) {
      this.#pos += ch === 13 && src.charCodeAt(start + 1) === 10 ? 2 : 1;
      return this.#token(TokenType.NewLine, start);
    }

    if (ch === 39 /* ' */) {
      return this.#scanString(start);
    }

    if (isDigit(ch)) {
      while (isDigit(src.charCodeAt(this.#pos))) this.#pos += 1;
      return this.#token(TokenType.Integer, start);
    }

    if (isIdentifierStart(ch)) {
      while (isIdentifierPart(src.charCodeAt(this.#pos))) this.#pos += 1;
      const text = src.slice(start, this.#pos);
      return { type: KEYWORDS.get(text) ?? TokenType.Identifier, start, end: this.#pos, value: text };
    }

    this.#pos += 1;
    return this.#token(PUNCTUATION.get(src.charAt(start)) ?? TokenType.Unrecognized, start);
  }

  #token(type: TokenType, start: number): Token {
    return { type, start, end: this.#pos, value: this.source.slice(start, this.#pos) };
  }

  #skipTrivia(): void {
    const src = this.source;
    while (this.#pos < src.length) {
      const ch = src.charCodeAt(this.#pos);
      if (ch === 32 || ch === 9) {
        this.#pos += 1;
      } else if (ch === 47 /* / */ && src.charCodeAt(this.#pos + 1) === 47) {
        while (this.#pos < src.length && !isLineBreak(src.charCodeAt(this.#pos))) this.#pos += 1;
      } else if (ch === 47 && src.charCodeAt(this.#pos + 1) === 42 /* * */) {
        const close = src.indexOf("*/", this.#pos + 2);
        this.#pos = close < 0 ? src.length : close + 2;
      } else {
        return;
      }
    }
  }

  #scanString(start: number): Token {
    const src = this.source;
    let value = "";
    this.#pos = start + 1;
    while (this.#pos < src.length) {
      const ch = src.charAt(this.#pos);
      if (ch === "'") {
        this.#pos += 1;
        return { type: TokenType.String, start, end: this.#pos, value };
      }
      if (isLineBreak(src.charCodeAt(this.#pos))) break;
      if (ch === "\\") {
        const escaped = STRING_ESCAPES.get(src.charAt(this.#pos + 1));
        if (escaped !== undefined) {
          value += escaped;
          this.#pos += 2;
          continue;
        }
      }
      value += ch;
      this.#pos += 1;
    }
    return { type: TokenType.UnterminatedString, start, end: this.#pos, value };
  }
}

function isLineBreak(ch: number): boolean {
  return ch === 10 || ch === 13;
}
