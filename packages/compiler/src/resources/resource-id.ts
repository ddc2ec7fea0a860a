/* =======================================================================================
 * RESOURCE IDENTIFIERS
 * ---------------------------------------------------------------------------------------
 * Hierarchical cloud resource ids:
 *
 *   [/subscriptions/{sub}[/resourceGroups/{group}]]/providers/{namespace}/{type}/{name}[/{childType}/{childName}]*
 *
 * Keywords compare case-insensitively. An extension resource repeats the `providers`
 * section; the last one names the resource.
 * ======================================================================================= */

export interface ResourceIdentifier {
  /** The id as given, without a trailing slash. */
  readonly fullyQualifiedId: string;
  /** `namespace/type[/childType]*`. */
  readonly fullyQualifiedType: string;
  /** Resource name followed by each child name. Never empty. */
  readonly nameHierarchy: readonly string[];
  readonly subscriptionId: string | null;
  readonly resourceGroup: string | null;
}

/** `null` when `text` is not a resource id. */
export function parseResourceId(text: string | null | undefined): ResourceIdentifier | null {
  if (!text) return null;
  const trimmed = text.trim().replace(/\/+$/, "");
  if (!trimmed.startsWith("/")) return null;

  const segments = trimmed.slice(1).split("/");
  if (segments.some((s) => s.length === 0)) return null;

  let subscriptionId: string | null = null;
  let resourceGroup: string | null = null;
  let index = 0;

  if (keywordAt(segments, index, "subscriptions")) {
    subscriptionId = segments[index + 1] ?? null;
    if (subscriptionId === null) return null;
    index += 2;
    if (keywordAt(segments, index, "resourceGroups")) {
      resourceGroup = segments[index + 1] ?? null;
      if (resourceGroup === null) return null;
      index += 2;
    }
  }

  const providers = lastProvidersIndex(segments, index);
  if (providers < 0) return null;

  const namespace = segments[providers + 1];
  const rest = segments.slice(providers + 2);
  // type/name pairs
  if (namespace === undefined || rest.length === 0 || rest.length % 2 !== 0) return null;

  const types: string[] = [namespace];
  const names: string[] = [];
  for (let i = 0; i < rest.length; i += 2) {
    const type = rest[i];
    const name = rest[i + 1];
    if (type === undefined || name === undefined) return null;
    types.push(type);
    names.push(name);
  }

  return Object.freeze({
    fullyQualifiedId: trimmed,
    fullyQualifiedType: types.join("/"),
    nameHierarchy: Object.freeze(names),
    subscriptionId,
    resourceGroup,
  });
}

function keywordAt(segments: readonly string[], index: number, keyword: string): boolean {
  return segments[index]?.toLowerCase() === keyword.toLowerCase();
}

function lastProvidersIndex(segments: readonly string[], from: number): number {
  if (!keywordAt(segments, from, "providers")) return -1;
  let found = from;
  for (let i = from + 1; i < segments.length; i += 1) {
    if (keywordAt(segments, i, "providers")) found = i;
  }
  return found;
}
