import { CatalogError } from "../shared/errors.js";
import type {
  ObjectSchema,
  PropertyFlag,
  PrimitiveSchema,
  PropertySchema,
  ResourceSchema,
  ResourceTypeProvider,
  SchemaType,
  TypeDescriptor,
} from "./types.js";

const PRIMITIVE_KINDS: ReadonlySet<string> = new Set<PrimitiveSchema["kind"]>(["string", "int", "bool", "any"]);
const PROPERTY_FLAGS: ReadonlySet<string> = new Set<PropertyFlag>(["readOnly", "writeOnly", "required"]);

/**
 * In-memory type catalog. Loaded once, read-only afterwards, safe to share
 * between concurrent requests.
 */
export class ResourceTypeCatalog implements ResourceTypeProvider {
  readonly #descriptors: readonly TypeDescriptor[];
  readonly #schemas: ReadonlyMap<string, ResourceSchema>;

  constructor(schemas: readonly ResourceSchema[]) {
    const byKey = new Map<string, ResourceSchema>();
    for (const schema of schemas) {
      const key = catalogKey(schema.descriptor);
      if (!byKey.has(key)) byKey.set(key, schema);
    }
    this.#schemas = byKey;
    this.#descriptors = Object.freeze(schemas.map((s) => s.descriptor));
  }

  /**
   * Build a catalog from a parsed catalog document:
   * `{ "resources": [{ "type", "apiVersion", "body" }] }`.
   */
  static fromDefinitions(document: unknown): ResourceTypeCatalog {
    const resources = isRecord(document) ? document["resources"] : undefined;
    if (!Array.isArray(resources)) {
      throw new CatalogError("expected an object with a 'resources' array", "$");
    }
    const schemas = resources.map((entry: unknown, i) => readResource(entry, `resources[${i}]`));
    return new ResourceTypeCatalog(schemas);
  }

  availableTypes(): readonly TypeDescriptor[] {
    return this.#descriptors;
  }

  tryGetSchema(descriptor: TypeDescriptor): ResourceSchema | null {
    return this.#schemas.get(catalogKey(descriptor)) ?? null;
  }
}

function catalogKey(descriptor: TypeDescriptor): string {
  return `${descriptor.fullyQualifiedType.toLowerCase()}@${descriptor.apiVersion.toLowerCase()}`;
}

// =============================================================================
// Document validation
// =============================================================================

function readResource(entry: unknown, path: string): ResourceSchema {
  if (!isRecord(entry)) throw new CatalogError("expected an object", path);
  const type = readString(entry, "type", path);
  const apiVersion = readString(entry, "apiVersion", path);
  const body = readType(entry["body"], `${path}.body`);
  if (body.kind !== "object") {
    throw new CatalogError("resource body must be an object type", `${path}.body`);
  }
  return { descriptor: Object.freeze({ fullyQualifiedType: type, apiVersion }), body };
}

function readType(def: unknown, path: string): SchemaType {
  if (!isRecord(def)) throw new CatalogError("expected a type definition object", path);
  const kind = def["kind"];
  if (kind === "object") return readObject(def, path);
  if (kind === "array") return { kind: "array", items: readType(def["items"], `${path}.items`) };
  if (typeof kind === "string" && isPrimitiveKind(kind)) return { kind };
  throw new CatalogError(
    `unknown kind ${JSON.stringify(kind)}; expected object, array or one of ${[...PRIMITIVE_KINDS].join(", ")}`,
    `${path}.kind`,
  );
}

function isPrimitiveKind(kind: string): kind is PrimitiveSchema["kind"] {
  return PRIMITIVE_KINDS.has(kind);
}

function readObject(def: Record<string, unknown>, path: string): ObjectSchema {
  const rawName = def["name"];
  const name = typeof rawName === "string" ? rawName : "object";
  const rawProperties = def["properties"] ?? {};
  if (!isRecord(rawProperties)) throw new CatalogError("expected an object", `${path}.properties`);

  const properties: Record<string, PropertySchema> = {};
  for (const [key, value] of Object.entries(rawProperties)) {
    properties[key] = readProperty(value, `${path}.properties.${key}`);
  }

  const additional = def["additionalProperties"];
  return additional === undefined
    ? { kind: "object", name, properties }
    : { kind: "object", name, properties, additionalProperties: readType(additional, `${path}.additionalProperties`) };
}

function readProperty(def: unknown, path: string): PropertySchema {
  if (!isRecord(def)) throw new CatalogError("expected a property definition object", path);
  const type = readType(def["type"], `${path}.type`);
  const rawFlags = def["flags"] ?? [];
  if (!Array.isArray(rawFlags)) throw new CatalogError("expected an array", `${path}.flags`);

  const flags: PropertyFlag[] = [];
  rawFlags.forEach((flag: unknown, i) => {
    if (typeof flag !== "string" || !isPropertyFlag(flag)) {
      throw new CatalogError(`unknown flag ${JSON.stringify(flag)}`, `${path}.flags[${i}]`);
    }
    flags.push(flag);
  });

  const description = def["description"];
  return typeof description === "string" ? { type, flags, description } : { type, flags };
}

function isPropertyFlag(flag: string): flag is PropertyFlag {
  return PROPERTY_FLAGS.has(flag);
}

function readString(record: Record<string, unknown>, key: string, path: string): string {
  const value = record[key];
  if (typeof value !== "string" || value.length === 0) {
    throw new CatalogError("expected a non-empty string", `${path}.${key}`);
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
