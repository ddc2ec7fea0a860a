import type { SyntaxNode } from "./nodes.js";

/**
 * Structural equality over syntax trees. Spans are formatting metadata and do
 * not take part in the comparison.
 */
export function syntaxEquals(a: SyntaxNode, b: SyntaxNode): boolean {
  if (a === b) return true;
  switch (a.$kind) {
    case "Program":
      return b.$kind === "Program" && listEquals(a.statements, b.statements);
    case "Declaration":
      return (
        b.$kind === "Declaration" &&
        syntaxEquals(a.keyword, b.keyword) &&
        syntaxEquals(a.name, b.name) &&
        syntaxEquals(a.type, b.type) &&
        (a.modifier === null ? b.modifier === null : b.modifier !== null && syntaxEquals(a.modifier, b.modifier)) &&
        syntaxEquals(a.assignment, b.assignment) &&
        syntaxEquals(a.body, b.body)
      );
    case "Skipped":
      return b.$kind === "Skipped" && a.text === b.text;
    case "ObjectExpr":
      return b.$kind === "ObjectExpr" && listEquals(a.properties, b.properties);
    case "ObjectProperty":
      return b.$kind === "ObjectProperty" && syntaxEquals(a.key, b.key) && syntaxEquals(a.value, b.value);
    case "ArrayExpr":
      return b.$kind === "ArrayExpr" && listEquals(a.items, b.items);
    case "StringLiteral":
      return b.$kind === "StringLiteral" && a.value === b.value;
    case "IntegerLiteral":
      return b.$kind === "IntegerLiteral" && a.value === b.value;
    case "BooleanLiteral":
      return b.$kind === "BooleanLiteral" && a.value === b.value;
    case "NullLiteral":
      return b.$kind === "NullLiteral";
    case "Identifier":
      return b.$kind === "Identifier" && a.name === b.name;
    case "Token":
      return b.$kind === "Token" && a.type === b.type && a.text === b.text;
  }
}

function listEquals(a: readonly SyntaxNode[], b: readonly SyntaxNode[]): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i += 1) {
    const left = a[i];
    const right = b[i];
    if (left === undefined || right === undefined || !syntaxEquals(left, right)) return false;
  }
  return true;
}
