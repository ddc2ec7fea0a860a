import type { SemanticModel } from "../semantics/semantic-model.js";
import { createPropertyKey } from "../syntax/factory.js";
import type { ObjectPropertySyntax, ProgramSyntax } from "../syntax/nodes.js";
import { propertyKeyName } from "../syntax/nodes.js";
import { SyntaxRewriter } from "../syntax/rewriter.js";

/**
 * Rewrites property keys whose spelling differs from the schema only by case
 * to the schema's canonical spelling.
 *
 * Only keys the model bound as casing mismatches change. Their values stay
 * untouched in this pass: the model could not type them yet.
 */
export class TypeCasingFixerRewriter extends SyntaxRewriter {
  constructor(private readonly model: SemanticModel) {
    super();
  }

  static rewrite(model: SemanticModel, program: ProgramSyntax = model.file.program): ProgramSyntax {
    return new TypeCasingFixerRewriter(model).rewrite(program);
  }

  protected override rewriteObjectProperty(property: ObjectPropertySyntax): ObjectPropertySyntax {
    const binding = this.model.getPropertyBinding(property);
    if (binding?.kind === "casing" && binding.name !== propertyKeyName(property.key)) {
      return { ...property, key: createPropertyKey(binding.name) };
    }
    const value = this.rewriteValue(property.value);
    return value === property.value ? property : { ...property, value };
  }
}
