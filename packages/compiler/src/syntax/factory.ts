import { isIdentifierPart, isIdentifierStart, TokenType } from "./scanner.js";
import type {
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
  StatementSyntax,
  StringLiteralSyntax,
  TokenSyntax,
  ValueSyntax,
} from "./nodes.js";

export const RESOURCE_KEYWORD = "resource";
export const EXISTING_KEYWORD = "existing";

export function isValidIdentifier(text: string): boolean {
  if (text.length === 0 || !isIdentifierStart(text.charCodeAt(0))) return false;
  for (let i = 1; i < text.length; i += 1) {
    if (!isIdentifierPart(text.charCodeAt(i))) return false;
  }
  return true;
}

export function createToken(type: TokenType, text: string): TokenSyntax {
  return { $kind: "Token", type, text };
}

export function createIdentifier(name: string): IdentifierSyntax {
  return { $kind: "Identifier", name };
}

export function createStringLiteral(value: string): StringLiteralSyntax {
  return { $kind: "StringLiteral", value };
}

export function createIntegerLiteral(value: number): IntegerLiteralSyntax {
  return { $kind: "IntegerLiteral", value };
}

export function createBooleanLiteral(value: boolean): BooleanLiteralSyntax {
  return { $kind: "BooleanLiteral", value };
}

export function createNullLiteral(): NullLiteralSyntax {
  return { $kind: "NullLiteral" };
}

/** Identifier key when `key` spells a valid identifier, quoted string otherwise. */
export function createPropertyKey(key: string): PropertyKeySyntax {
  return isValidIdentifier(key) ? createIdentifier(key) : createStringLiteral(key);
}

export function createObjectProperty(key: string, value: ValueSyntax): ObjectPropertySyntax {
  return { $kind: "ObjectProperty", key: createPropertyKey(key), value };
}

export function createObject(properties: readonly ObjectPropertySyntax[]): ObjectExprSyntax {
  return { $kind: "ObjectExpr", properties };
}

export function createArray(items: readonly ValueSyntax[]): ArrayExprSyntax {
  return { $kind: "ArrayExpr", items };
}

export interface CreateDeclarationInput {
  name: string;
  type: string;
  body: ValueSyntax;
  existing?: boolean;
}

export function createDeclaration(input: CreateDeclarationInput): DeclarationSyntax {
  return {
    $kind: "Declaration",
    keyword: createToken(TokenType.Identifier, RESOURCE_KEYWORD),
    name: createIdentifier(input.name),
    type: createStringLiteral(input.type),
    modifier: input.existing ? createToken(TokenType.Identifier, EXISTING_KEYWORD) : null,
    assignment: createToken(TokenType.Assignment, "="),
    body: input.body,
  };
}

export function createProgram(statements: readonly StatementSyntax[]): ProgramSyntax {
  return { $kind: "Program", statements };
}
