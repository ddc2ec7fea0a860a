/**
 * Retrieval of live resource state from the cloud management endpoint.
 */
import {
  debug,
  readJson,
  type JsonValue,
  type ResourceIdentifier,
  type TypeDescriptor,
} from "@resource-ls/compiler";
import type { CancellationToken } from "vscode-languageserver/node.js";
import type { CloudConfiguration } from "./configuration.js";

export interface ResourceFetchRequest {
  readonly identifier: ResourceIdentifier;
  readonly descriptor: TypeDescriptor;
  readonly cancellation?: CancellationToken | undefined;
}

export interface ResourceFetcher {
  /** Current resource state, or `null` when the endpoint has none. */
  fetch(request: ResourceFetchRequest): Promise<JsonValue | null>;
}

export class ResourceFetchError extends Error {
  constructor(
    message: string,
    /** HTTP status, when a response arrived. */
    public readonly status: number | null,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ResourceFetchError";
  }
}

export interface HttpResourceFetcherOptions {
  readonly cloud: CloudConfiguration;
  /** Environment the token variable is read from. */
  readonly env?: Readonly<Record<string, string | undefined>>;
  readonly timeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * GET `{endpoint}{id}?api-version={version}` with a bearer token taken from the
 * configured environment variable. No retries.
 */
export class HttpResourceFetcher implements ResourceFetcher {
  readonly #cloud: CloudConfiguration;
  readonly #env: Readonly<Record<string, string | undefined>>;
  readonly #timeoutMs: number;

  constructor(options: HttpResourceFetcherOptions) {
    this.#cloud = options.cloud;
    this.#env = options.env ?? process.env;
    this.#timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  requestUrl(identifier: ResourceIdentifier, descriptor: TypeDescriptor): URL {
    const base = this.#cloud.endpoint.replace(/\/+$/, "");
    const url = new URL(`${base}${identifier.fullyQualifiedId}`);
    url.searchParams.set("api-version", descriptor.apiVersion);
    return url;
  }

  async fetch(request: ResourceFetchRequest): Promise<JsonValue | null> {
    const token = this.#env[this.#cloud.tokenVariable];
    if (!token) {
      throw new ResourceFetchError(`No access token: set the ${this.#cloud.tokenVariable} environment variable`, null);
    }
    const url = this.requestUrl(request.identifier, request.descriptor);

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.#timeoutMs);
    const subscription = request.cancellation?.onCancellationRequested(() => controller.abort());
    try {
      debug.server("resource.fetch", { url: url.toString() });
      const res = await fetch(url, {
        signal: controller.signal,
        headers: { authorization: `Bearer ${token}`, accept: "application/json" },
      });
      if (res.status === 404) return null;
      if (!res.ok) {
        throw new ResourceFetchError(`GET ${url.pathname} failed: HTTP ${res.status}`, res.status);
      }
      const text = await res.text();
      if (text.trim().length === 0) return null;
      return readJson(text);
    } catch (error) {
      if (error instanceof ResourceFetchError) throw error;
      throw new ResourceFetchError(`GET ${url.pathname} failed: ${describe(error)}`, null, { cause: error });
    } finally {
      clearTimeout(timer);
      subscription?.dispose();
    }
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
