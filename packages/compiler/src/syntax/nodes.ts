/* =======================================================================================
 * RDL SYNTAX TREE
 * ---------------------------------------------------------------------------------------
 * Immutable value nodes discriminated by `$kind`. Ownership is strictly hierarchical:
 * no parent pointers, no shared mutable state. Every rewrite builds a new tree and
 * reuses untouched subtrees as-is.
 *
 * `span` is present on parsed nodes only; factory-built nodes have none.
 * ======================================================================================= */

import type { TextSpan } from "../model/text.js";
import type { TokenType } from "./scanner.js";

export type ValueSyntax =
  | ObjectExprSyntax
  | ArrayExprSyntax
  | StringLiteralSyntax
  | IntegerLiteralSyntax
  | BooleanLiteralSyntax
  | NullLiteralSyntax;

export type StatementSyntax = DeclarationSyntax | SkippedSyntax;

export type PropertyKeySyntax = IdentifierSyntax | StringLiteralSyntax;

export type SyntaxNode =
  | ProgramSyntax
  | StatementSyntax
  | ObjectPropertySyntax
  | ValueSyntax
  | IdentifierSyntax
  | TokenSyntax;

export type SyntaxKind = SyntaxNode["$kind"];

export interface ProgramSyntax {
  readonly $kind: "Program";
  readonly statements: readonly StatementSyntax[];
  readonly span?: TextSpan;
}

/**
 * `resource <name> '<type>@<version>' [existing] = <body>`
 */
export interface DeclarationSyntax {
  readonly $kind: "Declaration";
  readonly keyword: TokenSyntax;
  readonly name: IdentifierSyntax;
  readonly type: StringLiteralSyntax;
  readonly modifier: TokenSyntax | null;
  readonly assignment: TokenSyntax;
  readonly body: ValueSyntax;
  readonly span?: TextSpan;
}

/** Text the parser could not make sense of; only ever produced by error recovery. */
export interface SkippedSyntax {
  readonly $kind: "Skipped";
  readonly text: string;
  readonly span?: TextSpan;
}

export interface ObjectExprSyntax {
  readonly $kind: "ObjectExpr";
  readonly properties: readonly ObjectPropertySyntax[];
  readonly span?: TextSpan;
}

export interface ObjectPropertySyntax {
  readonly $kind: "ObjectProperty";
  readonly key: PropertyKeySyntax;
  readonly value: ValueSyntax;
  readonly span?: TextSpan;
}

export interface ArrayExprSyntax {
  readonly $kind: "ArrayExpr";
  readonly items: readonly ValueSyntax[];
  readonly span?: TextSpan;
}

export interface StringLiteralSyntax {
  readonly $kind: "StringLiteral";
  /** Decoded value (escapes already resolved). */
  readonly value: string;
  readonly span?: TextSpan;
}

export interface IntegerLiteralSyntax {
  readonly $kind: "IntegerLiteral";
  readonly value: number;
  readonly span?: TextSpan;
}

export interface BooleanLiteralSyntax {
  readonly $kind: "BooleanLiteral";
  readonly value: boolean;
  readonly span?: TextSpan;
}

export interface NullLiteralSyntax {
  readonly $kind: "NullLiteral";
  readonly span?: TextSpan;
}

export interface IdentifierSyntax {
  readonly $kind: "Identifier";
  readonly name: string;
  readonly span?: TextSpan;
}

export interface TokenSyntax {
  readonly $kind: "Token";
  readonly type: TokenType;
  readonly text: string;
  readonly span?: TextSpan;
}

/** The text a property key stands for, regardless of how it is spelled. */
export function propertyKeyName(key: PropertyKeySyntax): string {
  return key.$kind === "Identifier" ? key.name : key.value;
}

export function isDeclaration(node: StatementSyntax): node is DeclarationSyntax {
  return node.$kind === "Declaration";
}
