/**
 * Debug Channels
 *
 * Targeted debug logging for the data that flows through the parser, binder and
 * synthesis pipeline. Complementary to CompileTrace (timing), debug channels
 * show *what* was decided and *why*.
 *
 * Enable via environment variable:
 * ```bash
 * RESOURCE_LS_DEBUG=normalize npm test        # Just the normalization loop
 * RESOURCE_LS_DEBUG=bind,synthesis npm test   # Multiple channels
 * RESOURCE_LS_DEBUG=* npm test                # Everything
 * RESOURCE_LS_DEBUG=trace resource-ls         # Span timings of each insertResource request
 * ```
 *
 * In code (always present, no-op when disabled):
 * ```typescript
 * debug.normalize("iteration.start", { iteration, textLength: text.length });
 * ```
 */

export type DebugData = Record<string, unknown>;

/** A debug channel function - logs when enabled, no-op when disabled */
export type DebugChannel = (point: string, data?: DebugData) => void;

export interface DebugConfig {
  /** Format output as JSON (machine-readable) or pretty (human-readable) */
  format: "json" | "pretty";
  timestamps: boolean;
  /** Defaults to console.error so stdio LSP transports stay clean. */
  output: (message: string) => void;
}

const DEFAULT_CONFIG: DebugConfig = {
  format: "pretty",
  timestamps: false,
  output: console.error,
};

let config: DebugConfig = { ...DEFAULT_CONFIG };

function parseDebugEnv(): Set<string> {
  const env = process.env["RESOURCE_LS_DEBUG"] ?? "";
  if (!env || env === "0" || env === "false") return new Set();
  if (env === "*" || env === "1" || env === "true") {
    return new Set(["*"]);
  }
  return new Set(env.split(",").map((s) => s.trim().toLowerCase()));
}

let enabledChannels = parseDebugEnv();

function isEnabled(channel: string): boolean {
  return enabledChannels.has("*") || enabledChannels.has(channel.toLowerCase());
}

function formatMessage(channel: string, point: string, data: DebugData | undefined): string {
  const prefix = config.timestamps ? `[${new Date().toISOString()}] ` : "";

  if (config.format === "json") {
    return JSON.stringify({
      channel,
      point,
      ...(data && { data }),
      ...(config.timestamps && { timestamp: Date.now() }),
    });
  }

  const label = `[${channel}.${point}]`;
  if (!data || Object.keys(data).length === 0) {
    return `${prefix}${label}`;
  }
  return `${prefix}${label} ${formatData(data)}`;
}

function formatData(data: DebugData): string {
  const parts = Object.entries(data).map(([key, value]) => `${key}=${formatValue(value)}`);
  return `{ ${parts.join(", ")} }`;
}

function formatValue(value: unknown): string {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  if (typeof value === "string") {
    if (value.length > 60) return `"${value.slice(0, 57)}..."`;
    return `"${value}"`;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  if (Array.isArray(value)) {
    if (value.length === 0) return "[]";
    if (value.length <= 3) {
      const inline = `[${value.map((v) => formatValue(v)).join(", ")}]`;
      if (inline.length <= 50) return inline;
    }
    return `[${value.length} items]`;
  }
  if (typeof value === "object") {
    if ("$kind" in value && typeof value.$kind === "string") {
      return `<${value.$kind}>`;
    }
    return "{...}";
  }
  return String(value);
}

function createChannel(name: string): DebugChannel {
  if (!isEnabled(name)) {
    return () => {};
  }
  return (point: string, data?: DebugData) => {
    config.output(formatMessage(name, point, data));
  };
}

/**
 * Re-read RESOURCE_LS_DEBUG and rebuild every channel.
 */
export function refreshDebugChannels(): void {
  enabledChannels = parseDebugEnv();
  debug.parse = createChannel("parse");
  debug.bind = createChannel("bind");
  debug.normalize = createChannel("normalize");
  debug.synthesis = createChannel("synthesis");
  debug.server = createChannel("server");
}

export function configureDebug(options: Partial<DebugConfig>): void {
  config = { ...config, ...options };
}

export function isDebugEnabled(channel?: string): boolean {
  if (channel) return isEnabled(channel);
  return enabledChannels.size > 0;
}

export const debug = {
  /** RDL scanning and parsing */
  parse: createChannel("parse"),

  /** Schema binding in the semantic model */
  bind: createChannel("bind"),

  /** Recase/prune rewrite loop */
  normalize: createChannel("normalize"),

  /** JSON lowering and declaration synthesis */
  synthesis: createChannel("synthesis"),

  /** Language server request plumbing */
  server: createChannel("server"),
};

export type Debug = typeof debug;
