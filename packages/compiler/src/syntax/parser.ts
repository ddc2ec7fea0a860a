import { spanFromBounds, type TextSpan } from "../model/text.js";
import type { CompilerDiagnostic, DiagnosticCode } from "../model/diagnostics.js";
import { buildDiagnostic } from "../shared/diagnostics.js";
import { debug } from "../shared/debug.js";
import { EXISTING_KEYWORD, RESOURCE_KEYWORD } from "./factory.js";
import { Scanner, TokenType, type Token } from "./scanner.js";
import type {
  ArrayExprSyntax,
  DeclarationSyntax,
  IdentifierSyntax,
  ObjectExprSyntax,
  ObjectPropertySyntax,
  ProgramSyntax,
  PropertyKeySyntax,
  SkippedSyntax,
  StatementSyntax,
  StringLiteralSyntax,
  TokenSyntax,
  ValueSyntax,
} from "./nodes.js";

export interface ParseResult {
  readonly program: ProgramSyntax;
  readonly diagnostics: readonly CompilerDiagnostic[];
}

/**
 * Parse RDL text.
 *
 * Never throws on bad input. A declaration without a name gets an empty
 * identifier plus a diagnostic; any other error turns the remainder of the
 * statement into a Skipped node.
 */
export function parseProgram(text: string): ParseResult {
  const parser = new Parser(text);
  const program = parser.parseProgram();
  debug.parse("program", { length: text.length, statements: program.statements.length, diagnostics: parser.diagnostics.length });
  return { program, diagnostics: parser.diagnostics };
}

/** Thrown inside the parser to unwind to the statement being parsed. */
class ParseFailure {
  constructor(
    readonly code: DiagnosticCode,
    readonly message: string,
    readonly token: Token,
  ) {}
}

class Parser {
  readonly diagnostics: CompilerDiagnostic[] = [];
  readonly #source: string;
  readonly #scanner: Scanner;
  /** Open braces/brackets of the statement being parsed. */
  #depth = 0;
  #lastEnd = 0;

  constructor(source: string) {
    this.#source = source;
    this.#scanner = new Scanner(source);
  }

  parseProgram(): ProgramSyntax {
    const statements: StatementSyntax[] = [];
    for (;;) {
      this.#skipNewLines();
      const first = this.#peek();
      if (first.type === TokenType.EOF) break;
      this.#depth = 0;
      try {
        const declaration = this.#parseDeclaration();
        this.#expectStatementEnd();
        statements.push(declaration);
      } catch (e) {
        if (!(e instanceof ParseFailure)) throw e;
        this.#report(e.code, e.message, spanFromBounds(e.token.start, e.token.end));
        statements.push(this.#recover(first.start));
      }
    }
    return { $kind: "Program", statements, span: spanFromBounds(0, this.#source.length) };
  }

  // ------------------------------------------------------------------------------------------
  // Statements
  // ------------------------------------------------------------------------------------------

  #parseDeclaration(): DeclarationSyntax {
    const first = this.#peek();
    if (first.type !== TokenType.Identifier || first.value !== RESOURCE_KEYWORD) {
      throw this.#fail("rdl/unexpected-token", `Expected a '${RESOURCE_KEYWORD}' declaration`, first);
    }
    const keyword = this.#token(this.#next());
    const name = this.#parseDeclarationName();
    const type = this.#parseString("Expected a resource type string");

    let modifier: TokenSyntax | null = null;
    const maybeModifier = this.#peek();
    if (maybeModifier.type === TokenType.Identifier && maybeModifier.value === EXISTING_KEYWORD) {
      modifier = this.#token(this.#next());
    }

    const assignment = this.#token(this.#expect(TokenType.Assignment, "Expected '='"));
    const body = this.#parseValue();
    return {
      $kind: "Declaration",
      keyword,
      name,
      type,
      modifier,
      assignment,
      body,
      span: spanFromBounds(first.start, this.#lastEnd),
    };
  }

  #parseDeclarationName(): IdentifierSyntax {
    const t = this.#peek();
    if (t.type === TokenType.Identifier) {
      this.#next();
      return { $kind: "Identifier", name: t.value, span: spanFromBounds(t.start, t.end) };
    }
    if (t.type === TokenType.TrueKeyword || t.type === TokenType.FalseKeyword || t.type === TokenType.NullKeyword) {
      this.#next();
      const span = spanFromBounds(t.start, t.end);
      this.#report("rdl/reserved-identifier", `'${t.value}' is reserved and cannot name a resource`, span);
      return { $kind: "Identifier", name: t.value, span };
    }
    if (t.type === TokenType.String) {
      // Name missing: keep going so the rest of the declaration still binds.
      this.#report("rdl/expected-identifier", "Expected a resource identifier", spanFromBounds(t.start, t.start));
      return { $kind: "Identifier", name: "", span: spanFromBounds(t.start, t.start) };
    }
    throw this.#fail("rdl/expected-identifier", "Expected a resource identifier", t);
  }

  #expectStatementEnd(): void {
    const t = this.#peek();
    if (t.type !== TokenType.NewLine && t.type !== TokenType.EOF) {
      throw this.#fail("rdl/unexpected-token", "Expected a new line after the declaration", t);
    }
  }

  #recover(start: number): SkippedSyntax {
    let depth = this.#depth;
    for (;;) {
      const t = this.#peek();
      if (t.type === TokenType.EOF) break;
      if (t.type === TokenType.NewLine && depth === 0) break;
      this.#next();
      if (t.type === TokenType.LeftBrace || t.type === TokenType.LeftSquare) depth += 1;
      if ((t.type === TokenType.RightBrace || t.type === TokenType.RightSquare) && depth > 0) depth -= 1;
    }
    const end = Math.max(start, this.#lastEnd);
    debug.parse("recover", { start, end });
    return { $kind: "Skipped", text: this.#source.slice(start, end), span: spanFromBounds(start, end) };
  }

  // ------------------------------------------------------------------------------------------
  // Values
  // ------------------------------------------------------------------------------------------

  #parseValue(): ValueSyntax {
    const t = this.#peek();
    const span = spanFromBounds(t.start, t.end);
    switch (t.type) {
      case TokenType.LeftBrace:
        return this.#parseObject();
      case TokenType.LeftSquare:
        return this.#parseArray();
      case TokenType.String:
        this.#next();
        return { $kind: "StringLiteral", value: t.value, span };
      case TokenType.Integer:
        this.#next();
        return { $kind: "IntegerLiteral", value: Number(t.value), span };
      case TokenType.Minus: {
        this.#next();
        const digits = this.#expect(TokenType.Integer, "Expected an integer after '-'");
        return { $kind: "IntegerLiteral", value: -Number(digits.value), span: spanFromBounds(t.start, digits.end) };
      }
      case TokenType.TrueKeyword:
      case TokenType.FalseKeyword:
        this.#next();
        return { $kind: "BooleanLiteral", value: t.type === TokenType.TrueKeyword, span };
      case TokenType.NullKeyword:
        this.#next();
        return { $kind: "NullLiteral", span };
      case TokenType.UnterminatedString:
        throw this.#fail("rdl/unterminated-string", "Unterminated string", t);
      default:
        throw this.#fail("rdl/unexpected-token", "Expected a value", t);
    }
  }

  #parseObject(): ObjectExprSyntax {
    const open = this.#next();
    this.#depth += 1;
    const properties: ObjectPropertySyntax[] = [];
    for (;;) {
      const t = this.#peek();
      if (t.type === TokenType.NewLine) {
        this.#next();
        continue;
      }
      if (t.type === TokenType.RightBrace) {
        this.#next();
        break;
      }
      const key = this.#parsePropertyKey();
      this.#expect(TokenType.Colon, "Expected ':'");
      const value = this.#parseValue();
      properties.push({
        $kind: "ObjectProperty",
        key,
        value,
        span: spanFromBounds(t.start, this.#lastEnd),
      });
      this.#expectMemberSeparator(TokenType.RightBrace);
    }
    this.#depth -= 1;
    return { $kind: "ObjectExpr", properties, span: spanFromBounds(open.start, this.#lastEnd) };
  }

  #parsePropertyKey(): PropertyKeySyntax {
    const t = this.#peek();
    const span = spanFromBounds(t.start, t.end);
    switch (t.type) {
      case TokenType.Identifier:
      case TokenType.TrueKeyword:
      case TokenType.FalseKeyword:
      case TokenType.NullKeyword:
        this.#next();
        return { $kind: "Identifier", name: t.value, span };
      case TokenType.String:
        this.#next();
        return { $kind: "StringLiteral", value: t.value, span };
      case TokenType.UnterminatedString:
        throw this.#fail("rdl/unterminated-string", "Unterminated string", t);
      default:
        throw this.#fail("rdl/unexpected-token", "Expected a property name", t);
    }
  }

  #parseArray(): ArrayExprSyntax {
    const open = this.#next();
    this.#depth += 1;
    const items: ValueSyntax[] = [];
    for (;;) {
      const t = this.#peek();
      if (t.type === TokenType.NewLine) {
        this.#next();
        continue;
      }
      if (t.type === TokenType.RightSquare) {
        this.#next();
        break;
      }
      items.push(this.#parseValue());
      this.#expectMemberSeparator(TokenType.RightSquare);
    }
    this.#depth -= 1;
    return { $kind: "ArrayExpr", items, span: spanFromBounds(open.start, this.#lastEnd) };
  }

  #expectMemberSeparator(close: TokenType): void {
    const t = this.#peek();
    if (t.type === TokenType.Comma) {
      this.#next();
      return;
    }
    if (t.type === TokenType.NewLine || t.type === close) return;
    throw this.#fail("rdl/unexpected-token", "Expected ',' or a new line", t);
  }

  #parseString(message: string): StringLiteralSyntax {
    const t = this.#peek();
    if (t.type === TokenType.UnterminatedString) {
      throw this.#fail("rdl/unterminated-string", "Unterminated string", t);
    }
    const token = this.#expect(TokenType.String, message);
    return { $kind: "StringLiteral", value: token.value, span: spanFromBounds(token.start, token.end) };
  }

  // ------------------------------------------------------------------------------------------
  // Token helpers
  // ------------------------------------------------------------------------------------------

  #skipNewLines(): void {
    while (this.#peek().type === TokenType.NewLine) this.#next();
  }

  #peek(): Token {
    return this.#scanner.peek();
  }

  #next(): Token {
    const t = this.#scanner.next();
    this.#lastEnd = t.end;
    return t;
  }

  #expect(type: TokenType, message: string): Token {
    const t = this.#peek();
    if (t.type !== type) {
      throw this.#fail("rdl/unexpected-token", message, t);
    }
    return this.#next();
  }

  #token(t: Token): TokenSyntax {
    return { $kind: "Token", type: t.type, text: t.value, span: spanFromBounds(t.start, t.end) };
  }

  #fail(code: DiagnosticCode, message: string, token: Token): ParseFailure {
    return new ParseFailure(code, message, token);
  }

  #report(code: DiagnosticCode, message: string, span: TextSpan): void {
    this.diagnostics.push(buildDiagnostic({ code, message, stage: "parse", span }));
  }
}
