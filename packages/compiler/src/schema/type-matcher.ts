import { debug } from "../shared/debug.js";
import { compareApiVersions } from "./api-version.js";
import type { TypeDescriptor } from "./types.js";

/**
 * Pick the descriptor for `fullyQualifiedType` with the highest API version.
 *
 * Type names compare case-insensitively. Among equal-ranking versions the first
 * one in catalog order wins. `null` means the type is unknown; callers treat
 * that as "nothing to do", not as a failure.
 */
export function matchResourceType(
  catalog: readonly TypeDescriptor[],
  fullyQualifiedType: string,
): TypeDescriptor | null {
  const wanted = fullyQualifiedType.toLowerCase();
  let best: TypeDescriptor | null = null;
  let candidates = 0;
  for (const descriptor of catalog) {
    if (descriptor.fullyQualifiedType.toLowerCase() !== wanted) continue;
    candidates += 1;
    if (best === null || compareApiVersions(descriptor.apiVersion, best.apiVersion) > 0) {
      best = descriptor;
    }
  }
  debug.synthesis("type.match", { type: fullyQualifiedType, candidates, selected: best?.apiVersion ?? null });
  return best;
}
