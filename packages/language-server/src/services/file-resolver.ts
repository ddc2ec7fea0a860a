import fs from "node:fs";
import { URI } from "vscode-uri";

/** Reads documents the editor does not have open. */
export interface FileResolver {
  /** Text of `uri`, or `null` when no such file exists. */
  tryRead(uri: string): string | null;
}

const MISSING_FILE_CODES: ReadonlySet<string> = new Set(["ENOENT", "ENOTDIR", "EISDIR"]);

/** Resolves `file:` URIs against the local file system; other schemes never resolve. */
export class NodeFileResolver implements FileResolver {
  tryRead(uri: string): string | null {
    const parsed = URI.parse(uri);
    if (parsed.scheme !== "file") return null;
    try {
      return fs.readFileSync(parsed.fsPath, "utf8");
    } catch (e) {
      if (isMissingFileError(e)) return null;
      throw e;
    }
  }
}

/** In-memory resolver keyed by URI. */
export class MapFileResolver implements FileResolver {
  readonly #files: ReadonlyMap<string, string>;

  constructor(files: Iterable<readonly [string, string]>) {
    this.#files = new Map(files);
  }

  tryRead(uri: string): string | null {
    return this.#files.get(uri) ?? null;
  }
}

function isMissingFileError(e: unknown): boolean {
  return e instanceof Error && "code" in e && typeof e.code === "string" && MISSING_FILE_CODES.has(e.code);
}
