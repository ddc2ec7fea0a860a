/* =======================================================================================
 * RESOURCE TYPE SCHEMA
 * ---------------------------------------------------------------------------------------
 * The subset of a provider's type schema needed to drive authoring rewrites: property
 * names in their canonical casing, nested types, and which properties are writable.
 * ======================================================================================= */

/** One (type, api version) pair from the type catalog. Immutable. */
export interface TypeDescriptor {
  readonly fullyQualifiedType: string;
  readonly apiVersion: string;
}

export type PropertyFlag = "readOnly" | "writeOnly" | "required";

export interface PropertySchema {
  readonly type: SchemaType;
  readonly flags: readonly PropertyFlag[];
  readonly description?: string;
}

export interface ObjectSchema {
  readonly kind: "object";
  readonly name: string;
  /** Keyed by canonical property name. */
  readonly properties: Readonly<Record<string, PropertySchema>>;
  readonly additionalProperties?: SchemaType;
}

export interface ArraySchema {
  readonly kind: "array";
  readonly items: SchemaType;
}

export interface PrimitiveSchema {
  readonly kind: "string" | "int" | "bool" | "any";
}

export type SchemaType = ObjectSchema | ArraySchema | PrimitiveSchema;

export interface ResourceSchema {
  readonly descriptor: TypeDescriptor;
  readonly body: ObjectSchema;
}

/** What the semantic model needs from a type catalog. */
export interface ResourceTypeProvider {
  availableTypes(): readonly TypeDescriptor[];
  tryGetSchema(descriptor: TypeDescriptor): ResourceSchema | null;
}

export function hasFlag(property: PropertySchema, flag: PropertyFlag): boolean {
  return property.flags.includes(flag);
}

/** `"<type>@<version>"`, the form used in a declaration's type string. */
export function formatTypeReference(descriptor: TypeDescriptor): string {
  return `${descriptor.fullyQualifiedType}@${descriptor.apiVersion}`;
}

/** Split `"<type>@<version>"`; `null` when either half is missing. */
export function parseTypeReference(text: string): TypeDescriptor | null {
  const at = text.lastIndexOf("@");
  if (at <= 0 || at === text.length - 1) return null;
  return { fullyQualifiedType: text.slice(0, at), apiVersion: text.slice(at + 1) };
}
