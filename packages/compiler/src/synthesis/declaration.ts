import type { JsonValue } from "../model/json.js";
import type { ResourceIdentifier } from "../resources/resource-id.js";
import { formatTypeReference, type TypeDescriptor } from "../schema/types.js";
import { debug } from "../shared/debug.js";
import { createDeclaration } from "../syntax/factory.js";
import type { DeclarationSyntax } from "../syntax/nodes.js";
import { lowerJsonValue } from "./lower.js";

/**
 * Keep ASCII letters only. May return an empty string; the declaration is
 * still built, and re-parsing it reports the missing identifier.
 */
export function sanitizeIdentifier(name: string): string {
  return name.replace(/[^A-Za-z]/g, "");
}

/**
 * Build a new (never `existing`) resource declaration named after the last
 * segment of `identifier`, typed `<type>@<version>`, with `body` lowered.
 */
export function synthesizeDeclaration(
  identifier: ResourceIdentifier,
  descriptor: TypeDescriptor,
  body: JsonValue,
): DeclarationSyntax {
  const last = identifier.nameHierarchy[identifier.nameHierarchy.length - 1] ?? "";
  const name = sanitizeIdentifier(last);
  debug.synthesis("declaration", { source: last, name, type: formatTypeReference(descriptor) });
  return createDeclaration({
    name,
    type: formatTypeReference(descriptor),
    body: lowerJsonValue(body),
  });
}
