import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { ResourceTypeCatalog } from "@resource-ls/compiler";

const CATALOG_FILE = path.join("data", "resource-types.json");

/**
 * The catalog shipped with the server. Searched upwards from this module so it
 * is found from both `src/` and `dist/`.
 */
export function bundledCatalogPath(): string {
  let dir = path.dirname(fileURLToPath(import.meta.url));
  for (;;) {
    const candidate = path.join(dir, CATALOG_FILE);
    if (fs.existsSync(candidate)) return candidate;
    const parent = path.dirname(dir);
    if (parent === dir) throw new Error(`Bundled type catalog '${CATALOG_FILE}' not found`);
    dir = parent;
  }
}

/** Read and validate a catalog file; throws CatalogError on a malformed document. */
export function loadTypeCatalog(catalogPath: string | null = null): ResourceTypeCatalog {
  const file = catalogPath ?? bundledCatalogPath();
  const document: unknown = JSON.parse(fs.readFileSync(file, "utf8"));
  return ResourceTypeCatalog.fromDefinitions(document);
}
