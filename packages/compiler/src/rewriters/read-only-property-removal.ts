import type { SemanticModel } from "../semantics/semantic-model.js";
import { hasFlag } from "../schema/types.js";
import type { ObjectPropertySyntax, ProgramSyntax } from "../syntax/nodes.js";
import { SyntaxRewriter } from "../syntax/rewriter.js";

/** Drops properties bound to a schema property flagged `readOnly`. */
export class ReadOnlyPropertyRemovalRewriter extends SyntaxRewriter {
  constructor(private readonly model: SemanticModel) {
    super();
  }

  static rewrite(model: SemanticModel, program: ProgramSyntax = model.file.program): ProgramSyntax {
    return new ReadOnlyPropertyRemovalRewriter(model).rewrite(program);
  }

  protected override rewriteObjectProperty(property: ObjectPropertySyntax): ObjectPropertySyntax | null {
    const binding = this.model.getPropertyBinding(property);
    if (binding?.kind === "declared" && hasFlag(binding.property, "readOnly")) {
      return null;
    }
    return super.rewriteObjectProperty(property);
  }
}
