/* =======================================================================================
 * SEMANTIC MODEL
 * ---------------------------------------------------------------------------------------
 * Binds a parsed program against resource type schemas.
 *
 * Binding rules for an object typed with an object schema:
 * - a key that names a schema property exactly is `declared`, and the property's type
 *   flows into its value;
 * - a key that only matches case-insensitively is a `casing` mismatch; it carries the
 *   canonical name, but its value stays untyped until the key is fixed;
 * - a key covered by `additionalProperties` is `additional`, typed by that schema;
 * - anything else is `unknown`.
 *
 * The model is a derived view: it is rebuilt from scratch whenever the tree changes.
 * ======================================================================================= */

import type { CompilerDiagnostic, DiagnosticCode } from "../model/diagnostics.js";
import type { TextSpan } from "../model/text.js";
import { hasFlag, parseTypeReference } from "../schema/types.js";
import type {
  ObjectSchema,
  PropertySchema,
  ResourceSchema,
  SchemaType,
  TypeDescriptor,
} from "../schema/types.js";
import { debug } from "../shared/debug.js";
import { buildDiagnostic } from "../shared/diagnostics.js";
import { SemanticModelError } from "../shared/errors.js";
import { propertyKeyName } from "../syntax/nodes.js";
import type {
  DeclarationSyntax,
  ObjectExprSyntax,
  ObjectPropertySyntax,
  ValueSyntax,
} from "../syntax/nodes.js";
import type { SourceFile } from "../syntax/source-file.js";
import type { Compilation } from "./compilation.js";
import type { AnalyzerConfiguration, DiagnosticLevel } from "./configuration.js";

export type PropertyBinding =
  | { readonly kind: "declared"; readonly name: string; readonly property: PropertySchema; readonly owner: ObjectSchema }
  | { readonly kind: "casing"; readonly name: string; readonly property: PropertySchema; readonly owner: ObjectSchema }
  | { readonly kind: "additional"; readonly type: SchemaType; readonly owner: ObjectSchema }
  | { readonly kind: "unknown"; readonly owner: ObjectSchema };

export interface DeclarationBinding {
  readonly declaration: DeclarationSyntax;
  /** `null` when the type string is not `<type>@<version>`. */
  readonly descriptor: TypeDescriptor | null;
  /** `null` when the catalog has no schema for the descriptor. */
  readonly schema: ResourceSchema | null;
}

export interface SemanticModelInput {
  /** Prior compiled context; supplies the type provider. */
  readonly compilation: Compilation;
  /** The tree to analyze; may differ from the compilation's own file. */
  readonly file: SourceFile;
  readonly configuration: AnalyzerConfiguration;
}

export type SemanticModelFactory = (input: SemanticModelInput) => SemanticModel;

export class SemanticModel {
  readonly file: SourceFile;
  readonly diagnostics: readonly CompilerDiagnostic[];
  readonly #declarations: readonly DeclarationBinding[];
  readonly #properties: ReadonlyMap<ObjectPropertySyntax, PropertyBinding>;
  readonly #valueTypes: ReadonlyMap<ValueSyntax, SchemaType>;

  private constructor(binder: Binder) {
    this.file = binder.file;
    this.diagnostics = binder.diagnostics;
    this.#declarations = binder.declarations;
    this.#properties = binder.properties;
    this.#valueTypes = binder.valueTypes;
  }

  /**
   * Analyze `file`. Throws SemanticModelError when the tree is malformed
   * (it contains text the parser had to skip).
   */
  static create(input: SemanticModelInput): SemanticModel {
    const skipped = input.file.program.statements.find((s) => s.$kind === "Skipped");
    if (skipped) {
      throw new SemanticModelError(`Cannot analyze '${input.file.uri}': the document contains unparsed text`, input.file.uri);
    }
    const binder = new Binder(input);
    binder.bindProgram();
    return new SemanticModel(binder);
  }

  getDeclarations(): readonly DeclarationBinding[] {
    return this.#declarations;
  }

  /** `null` when the property sits in an untyped object. */
  getPropertyBinding(property: ObjectPropertySyntax): PropertyBinding | null {
    return this.#properties.get(property) ?? null;
  }

  /** Declared schema type of a value, or `null` when nothing types it. */
  getDeclaredType(value: ValueSyntax): SchemaType | null {
    return this.#valueTypes.get(value) ?? null;
  }
}

class Binder {
  readonly file: SourceFile;
  readonly diagnostics: CompilerDiagnostic[] = [];
  readonly declarations: DeclarationBinding[] = [];
  readonly properties = new Map<ObjectPropertySyntax, PropertyBinding>();
  readonly valueTypes = new Map<ValueSyntax, SchemaType>();
  readonly #compilation: Compilation;
  readonly #configuration: AnalyzerConfiguration;

  constructor(input: SemanticModelInput) {
    this.file = input.file;
    this.#compilation = input.compilation;
    this.#configuration = input.configuration;
  }

  bindProgram(): void {
    for (const statement of this.file.program.statements) {
      if (statement.$kind === "Declaration") this.#bindDeclaration(statement);
    }
    debug.bind("program", {
      uri: this.file.uri,
      declarations: this.declarations.length,
      properties: this.properties.size,
      diagnostics: this.diagnostics.length,
    });
  }

  #bindDeclaration(declaration: DeclarationSyntax): void {
    const descriptor = parseTypeReference(declaration.type.value);
    const schema = descriptor ? this.#compilation.types.tryGetSchema(descriptor) : null;
    this.declarations.push({ declaration, descriptor, schema });
    if (!schema) {
      this.#report(
        this.#configuration.unknownResourceTypes,
        "rdl/unknown-resource-type",
        `Resource type '${declaration.type.value}' is not available`,
        declaration.type.span,
      );
      return;
    }
    this.#bindValue(declaration.body, schema.body);
  }

  #bindValue(value: ValueSyntax, type: SchemaType): void {
    this.valueTypes.set(value, type);
    if (value.$kind === "ObjectExpr" && type.kind === "object") {
      this.#bindObject(value, type);
    } else if (value.$kind === "ArrayExpr" && type.kind === "array") {
      for (const item of value.items) this.#bindValue(item, type.items);
    }
  }

  #bindObject(object: ObjectExprSyntax, schema: ObjectSchema): void {
    for (const property of object.properties) {
      const binding = bindProperty(propertyKeyName(property.key), schema);
      this.properties.set(property, binding);
      switch (binding.kind) {
        case "declared":
          if (hasFlag(binding.property, "readOnly")) {
            this.#report(
              this.#configuration.readOnlyProperties,
              "rdl/read-only-property",
              `Property '${binding.name}' is read-only on '${schema.name}'`,
              property.key.span,
            );
          }
          this.#bindValue(property.value, binding.property.type);
          break;
        case "casing":
          this.#report(
            this.#configuration.propertyCasing,
            "rdl/property-casing",
            `Property '${propertyKeyName(property.key)}' should be spelled '${binding.name}'`,
            property.key.span,
          );
          break;
        case "additional":
          this.#bindValue(property.value, binding.type);
          break;
        case "unknown":
          this.#report(
            this.#configuration.unknownProperties,
            "rdl/unknown-property",
            `Property '${propertyKeyName(property.key)}' is not defined on '${schema.name}'`,
            property.key.span,
          );
          break;
      }
    }
  }

  #report(level: DiagnosticLevel, code: DiagnosticCode, message: string, span: TextSpan | undefined): void {
    if (level === "off") return;
    this.diagnostics.push(buildDiagnostic({ code, message, stage: "bind", severity: level, span }));
  }
}

function bindProperty(key: string, schema: ObjectSchema): PropertyBinding {
  const exact = Object.hasOwn(schema.properties, key) ? schema.properties[key] : undefined;
  if (exact) return { kind: "declared", name: key, property: exact, owner: schema };

  const lowered = key.toLowerCase();
  for (const [name, property] of Object.entries(schema.properties)) {
    if (name.toLowerCase() === lowered) {
      return { kind: "casing", name, property, owner: schema };
    }
  }

  if (schema.additionalProperties) {
    return { kind: "additional", type: schema.additionalProperties, owner: schema };
  }
  return { kind: "unknown", owner: schema };
}
