/* =============================================================================
 * RDL PRETTY PRINTER
 * -----------------------------------------------------------------------------
 * Renders any well-formed syntax tree to canonical text. Pure and deterministic:
 * the output depends only on the tree and the options, never on spans.
 *
 * Layout:
 * - one object property / array item per line, indented one level
 * - empty objects and arrays stay on one line (`{}` / `[]`)
 * - statements separated by a single blank line
 * ============================================================================= */

import { isValidIdentifier } from "../syntax/factory.js";
import type {
  DeclarationSyntax,
  ProgramSyntax,
  PropertyKeySyntax,
  StatementSyntax,
  SyntaxNode,
  ValueSyntax,
} from "../syntax/nodes.js";

export type NewlineOption = "LF" | "CRLF";
export type IndentKindOption = "space" | "tab";

export interface PrintOptions {
  readonly newline: NewlineOption;
  readonly indentKind: IndentKindOption;
  /** Columns per level; ignored for tabs. */
  readonly indentSize: number;
  readonly insertFinalNewline: boolean;
}

/** LF, two spaces, no final newline: the form the normalization loop works on. */
export const CANONICAL_PRINT_OPTIONS: PrintOptions = Object.freeze({
  newline: "LF",
  indentKind: "space",
  indentSize: 2,
  insertFinalNewline: false,
});

export function printSyntax(tree: SyntaxNode, options: PrintOptions = CANONICAL_PRINT_OPTIONS): string {
  const printer = new Printer(options);
  const text = printer.node(tree, 0);
  return options.insertFinalNewline && text.length > 0 ? text + printer.eol : text;
}

/** Quote and escape a string value for RDL source. */
export function formatStringLiteral(value: string): string {
  let out = "'";
  for (let i = 0; i < value.length; i += 1) {
    const ch = value.charAt(i);
    switch (ch) {
      case "\\": out += "\\\\"; break;
      case "'": out += "\\'"; break;
      case "\n": out += "\\n"; break;
      case "\r": out += "\\r"; break;
      case "\t": out += "\\t"; break;
      case "$":
        out += value.charAt(i + 1) === "{" ? "\\$" : "$";
        break;
      default:
        out += ch;
    }
  }
  return out + "'";
}

class Printer {
  readonly eol: string;
  readonly #indentUnit: string;

  constructor(options: PrintOptions) {
    this.eol = options.newline === "CRLF" ? "\r\n" : "\n";
    this.#indentUnit = options.indentKind === "tab" ? "\t" : " ".repeat(Math.max(0, options.indentSize));
  }

  node(node: SyntaxNode, depth: number): string {
    switch (node.$kind) {
      case "Program":
        return this.#program(node);
      case "Declaration":
      case "Skipped":
        return this.#statement(node);
      case "ObjectProperty":
        return `${this.#key(node.key)}: ${this.#value(node.value, depth)}`;
      case "Identifier":
        return node.name;
      case "Token":
        return node.text;
      default:
        return this.#value(node, depth);
    }
  }

  #program(program: ProgramSyntax): string {
    return program.statements.map((s) => this.#statement(s)).join(this.eol + this.eol);
  }

  #statement(statement: StatementSyntax): string {
    return statement.$kind === "Skipped" ? statement.text : this.#declaration(statement);
  }

  #declaration(decl: DeclarationSyntax): string {
    const parts = [decl.keyword.text, decl.name.name, formatStringLiteral(decl.type.value)];
    if (decl.modifier) parts.push(decl.modifier.text);
    parts.push(decl.assignment.text, this.#value(decl.body, 0));
    return parts.join(" ");
  }

  #value(value: ValueSyntax, depth: number): string {
    switch (value.$kind) {
      case "ObjectExpr": {
        if (value.properties.length === 0) return "{}";
        const inner = this.#indent(depth + 1);
        const lines = value.properties.map((p) => `${inner}${this.#key(p.key)}: ${this.#value(p.value, depth + 1)}`);
        return `{${this.eol}${lines.join(this.eol)}${this.eol}${this.#indent(depth)}}`;
      }
      case "ArrayExpr": {
        if (value.items.length === 0) return "[]";
        const inner = this.#indent(depth + 1);
        const lines = value.items.map((item) => `${inner}${this.#value(item, depth + 1)}`);
        return `[${this.eol}${lines.join(this.eol)}${this.eol}${this.#indent(depth)}]`;
      }
      case "StringLiteral":
        return formatStringLiteral(value.value);
      case "IntegerLiteral":
        return String(value.value);
      case "BooleanLiteral":
        return value.value ? "true" : "false";
      case "NullLiteral":
        return "null";
    }
  }

  #key(key: PropertyKeySyntax): string {
    if (key.$kind === "Identifier" && isValidIdentifier(key.name)) return key.name;
    return formatStringLiteral(key.$kind === "Identifier" ? key.name : key.value);
  }

  #indent(depth: number): string {
    return this.#indentUnit.repeat(depth);
  }
}
