import type {
  ArrayExprSyntax,
  DeclarationSyntax,
  ObjectExprSyntax,
  ObjectPropertySyntax,
  ProgramSyntax,
  StatementSyntax,
  ValueSyntax,
} from "./nodes.js";

/**
 * Base class for tree-to-tree rewrites.
 *
 * Subclasses override the hooks they care about. The walk rebuilds a node only
 * when one of its children changed, so untouched subtrees are shared between the
 * input and the output and the input tree is never modified.
 */
export abstract class SyntaxRewriter {
  rewrite(program: ProgramSyntax): ProgramSyntax {
    const statements = mapChanged(program.statements, (s) => this.rewriteStatement(s));
    return statements === program.statements ? program : { ...program, statements };
  }

  protected rewriteStatement(statement: StatementSyntax): StatementSyntax {
    return statement.$kind === "Declaration" ? this.rewriteDeclaration(statement) : statement;
  }

  protected rewriteDeclaration(declaration: DeclarationSyntax): DeclarationSyntax {
    const body = this.rewriteValue(declaration.body);
    return body === declaration.body ? declaration : { ...declaration, body };
  }

  protected rewriteValue(value: ValueSyntax): ValueSyntax {
    switch (value.$kind) {
      case "ObjectExpr":
        return this.rewriteObject(value);
      case "ArrayExpr":
        return this.rewriteArray(value);
      default:
        return value;
    }
  }

  protected rewriteObject(object: ObjectExprSyntax): ObjectExprSyntax {
    const properties: ObjectPropertySyntax[] = [];
    let changed = false;
    for (const property of object.properties) {
      const next = this.rewriteObjectProperty(property);
      if (next !== property) changed = true;
      if (next !== null) properties.push(next);
    }
    return changed ? { ...object, properties } : object;
  }

  /** Return `null` to drop the property from its object. */
  protected rewriteObjectProperty(property: ObjectPropertySyntax): ObjectPropertySyntax | null {
    const value = this.rewriteValue(property.value);
    return value === property.value ? property : { ...property, value };
  }

  protected rewriteArray(array: ArrayExprSyntax): ArrayExprSyntax {
    const items = mapChanged(array.items, (item) => this.rewriteValue(item));
    return items === array.items ? array : { ...array, items };
  }
}

function mapChanged<T>(items: readonly T[], fn: (item: T) => T): readonly T[] {
  let out: T[] | null = null;
  items.forEach((item, i) => {
    const next = fn(item);
    if (out === null && next !== item) out = items.slice(0, i);
    out?.push(next);
  });
  return out ?? items;
}
