/* =======================================================================================
 * PIPELINE TRACE - Instrumentation primitives for synthesis observability
 * ---------------------------------------------------------------------------------------
 * A hierarchical tracing system for timing and inspecting the insert-resource pipeline.
 *
 * Core concepts:
 * - Span: Unit of work with timing, hierarchy, attributes, and events
 * - CompileTrace: Main API for instrumentation (span, event, setAttribute)
 * - TraceExporter: Pluggable backend for trace data
 * - NOOP_TRACE: Zero-cost no-op when tracing is disabled
 * ======================================================================================= */

// =============================================================================
// Attribute Types
// =============================================================================

/**
 * Values that can be attached to spans and events as structured context.
 * Follows OpenTelemetry attribute value conventions.
 */
export type AttributeValue =
  | string
  | number
  | boolean
  | null
  | readonly AttributeValue[];

export type ReadonlyAttributeMap = ReadonlyMap<string, AttributeValue>;

/**
 * A point-in-time marker within a span.
 *
 * @example
 * trace.event("normalize.iteration", { iteration: 2 });
 */
export interface SpanEvent {
  readonly name: string;
  /** Timestamp in nanoseconds */
  readonly timestamp: bigint;
  readonly attributes: ReadonlyAttributeMap;
}

/**
 * A unit of work with timing, context, and hierarchy.
 */
export interface Span {
  readonly name: string;
  readonly spanId: string;
  readonly traceId: string;
  readonly parent: Span | null;
  readonly children: readonly Span[];
  readonly startTime: bigint;
  readonly endTime: bigint | null;
  readonly duration: bigint | null;
  readonly attributes: ReadonlyAttributeMap;
  readonly events: readonly SpanEvent[];

  end(): void;
  setAttribute(key: string, value: AttributeValue): void;
  setAttributes(attrs: Record<string, AttributeValue>): void;
  addEvent(name: string, attributes?: Record<string, AttributeValue>): void;
}

/** Pluggable backend for receiving trace data. */
export interface TraceExporter {
  onSpanStart(span: Span): void;
  onSpanEnd(span: Span): void;
  onEvent(span: Span, event: SpanEvent): void;
  flush(): Promise<void>;
}

/**
 * Main API for pipeline instrumentation.
 *
 * 1. Wrap synchronous work:
 *    const result = trace.span("normalize", () => normalizeDeclaration(decl, options));
 *
 * 2. Wrap async work:
 *    const payload = await trace.spanAsync("resource.fetch", () => fetcher.fetch(id));
 *
 * 3. Record events:
 *    trace.event("normalize.iteration", { iteration: 1 });
 */
export interface CompileTrace {
  span<T>(name: string, fn: () => T): T;
  spanAsync<T>(name: string, fn: () => Promise<T>): Promise<T>;
  event(name: string, attributes?: Record<string, AttributeValue>): void;
  setAttribute(key: string, value: AttributeValue): void;
  setAttributes(attrs: Record<string, AttributeValue>): void;
  startSpan(name: string): Span;
  currentSpan(): Span | undefined;
  rootSpan(): Span;
  flush(): Promise<void>;
}

/** Standardized attribute keys so traces from different requests line up. */
export const PipelineAttributes = {
  RESOURCE_TYPE: "resource.type",
  API_VERSION: "resource.apiVersion",
  DOCUMENT_URI: "document.uri",
  ITERATIONS: "normalize.iterations",
  OUTPUT_SIZE: "output.size",
} as const;

// =============================================================================
// No-Op Implementation
// =============================================================================

export const NOOP_SPAN: Span = {
  name: "",
  spanId: "",
  traceId: "",
  parent: null,
  children: [],
  startTime: 0n,
  endTime: null,
  duration: null,
  attributes: new Map(),
  events: [],
  end: () => {},
  setAttribute: () => {},
  setAttributes: () => {},
  addEvent: () => {},
};

/**
 * No-op trace that executes functions without instrumentation.
 *
 * @example
 * const trace = options.trace ?? NOOP_TRACE;
 */
export const NOOP_TRACE: CompileTrace = {
  span: <T>(_name: string, fn: () => T): T => fn(),
  spanAsync: <T>(_name: string, fn: () => Promise<T>): Promise<T> => fn(),
  event: () => {},
  setAttribute: () => {},
  setAttributes: () => {},
  startSpan: () => NOOP_SPAN,
  currentSpan: () => undefined,
  rootSpan: () => NOOP_SPAN,
  flush: () => Promise.resolve(),
};

export function nowNanos(): bigint {
  return process.hrtime.bigint();
}

// =============================================================================
// Span Implementation
// =============================================================================

let spanIdCounter = 0;

function generateSpanId(): string {
  return `span_${++spanIdCounter}`;
}

function generateTraceId(): string {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).slice(2, 8);
  return `trace_${timestamp}_${random}`;
}

class SpanImpl implements Span {
  readonly name: string;
  readonly spanId: string;
  readonly traceId: string;
  readonly parent: SpanImpl | null;
  readonly startTime: bigint;

  #endTime: bigint | null = null;
  readonly #children: Span[] = [];
  readonly #attributes = new Map<string, AttributeValue>();
  readonly #events: SpanEvent[] = [];
  readonly #exporter: TraceExporter | null;
  readonly #onEnd: (() => void) | null;

  constructor(
    name: string,
    traceId: string,
    parent: SpanImpl | null,
    exporter: TraceExporter | null,
    onEnd: (() => void) | null = null,
  ) {
    this.name = name;
    this.spanId = generateSpanId();
    this.traceId = traceId;
    this.parent = parent;
    this.startTime = nowNanos();
    this.#exporter = exporter;
    this.#onEnd = onEnd;
    if (parent !== null) parent.#children.push(this);
    this.#exporter?.onSpanStart(this);
  }

  get endTime(): bigint | null {
    return this.#endTime;
  }

  get duration(): bigint | null {
    return this.#endTime !== null ? this.#endTime - this.startTime : null;
  }

  get children(): readonly Span[] {
    return this.#children;
  }

  get attributes(): ReadonlyAttributeMap {
    return this.#attributes;
  }

  get events(): readonly SpanEvent[] {
    return this.#events;
  }

  end(): void {
    if (this.#endTime !== null) return;
    this.#endTime = nowNanos();
    this.#exporter?.onSpanEnd(this);
    this.#onEnd?.();
  }

  setAttribute(key: string, value: AttributeValue): void {
    this.#attributes.set(key, value);
  }

  setAttributes(attrs: Record<string, AttributeValue>): void {
    for (const [key, value] of Object.entries(attrs)) {
      this.#attributes.set(key, value);
    }
  }

  addEvent(name: string, attributes?: Record<string, AttributeValue>): void {
    const event: SpanEvent = {
      name,
      timestamp: nowNanos(),
      attributes: new Map(Object.entries(attributes ?? {})),
    };
    this.#events.push(event);
    this.#exporter?.onEvent(this, event);
  }
}

// =============================================================================
// Compile Trace Implementation
// =============================================================================

export interface CreateTraceOptions {
  /** Name for the root span */
  name?: string;
  exporter?: TraceExporter;
}

class CompileTraceImpl implements CompileTrace {
  readonly #traceId: string;
  readonly #rootSpan: SpanImpl;
  readonly #exporter: TraceExporter | null;
  #currentSpan: SpanImpl;

  constructor(options: CreateTraceOptions = {}) {
    this.#traceId = generateTraceId();
    this.#exporter = options.exporter ?? null;
    this.#rootSpan = new SpanImpl(options.name ?? "trace", this.#traceId, null, this.#exporter);
    this.#currentSpan = this.#rootSpan;
  }

  span<T>(name: string, fn: () => T): T {
    const span = this.startSpan(name);
    try {
      const result = fn();
      span.end();
      return result;
    } catch (error) {
      markFailed(span, error);
      span.end();
      throw error;
    }
  }

  async spanAsync<T>(name: string, fn: () => Promise<T>): Promise<T> {
    const span = this.startSpan(name);
    try {
      const result = await fn();
      span.end();
      return result;
    } catch (error) {
      markFailed(span, error);
      span.end();
      throw error;
    }
  }

  event(name: string, attributes?: Record<string, AttributeValue>): void {
    this.#currentSpan.addEvent(name, attributes);
  }

  setAttribute(key: string, value: AttributeValue): void {
    this.#currentSpan.setAttribute(key, value);
  }

  setAttributes(attrs: Record<string, AttributeValue>): void {
    this.#currentSpan.setAttributes(attrs);
  }

  startSpan(name: string): Span {
    const previous = this.#currentSpan;
    const span: SpanImpl = new SpanImpl(name, this.#traceId, previous, this.#exporter, () => {
      if (this.#currentSpan === span) this.#currentSpan = previous;
    });
    this.#currentSpan = span;
    return span;
  }

  currentSpan(): Span | undefined {
    return this.#currentSpan;
  }

  rootSpan(): Span {
    return this.#rootSpan;
  }

  async flush(): Promise<void> {
    await this.#exporter?.flush();
  }
}

function markFailed(span: Span, error: unknown): void {
  span.setAttribute("error", true);
  span.setAttribute("error.message", error instanceof Error ? error.message : String(error));
}

/**
 * Create a new CompileTrace.
 *
 * @example
 * const trace = createTrace({ name: "insertResource", exporter: createCollectingExporter() });
 */
export function createTrace(options?: CreateTraceOptions): CompileTrace {
  return new CompileTraceImpl(options);
}

// =============================================================================
// Collecting Exporter
// =============================================================================

export interface CollectingExporter extends TraceExporter {
  /** Names of ended spans, in end order. */
  readonly ended: readonly string[];
  /** `${span}:${event}` for every recorded event, in order. */
  readonly events: readonly string[];
}

/** Keeps span and event names in memory; useful for tests and one-off dumps. */
export function createCollectingExporter(): CollectingExporter {
  const ended: string[] = [];
  const events: string[] = [];
  return {
    ended,
    events,
    onSpanStart: () => {},
    onSpanEnd: (span) => {
      ended.push(span.name);
    },
    onEvent: (span, event) => {
      events.push(`${span.name}:${event.name}`);
    },
    flush: () => Promise.resolve(),
  };
}

// =============================================================================
// Log Exporter
// =============================================================================

/**
 * Writes one line per ended span, indented by depth:
 * `  normalize 1.25ms {normalize.iterations=5}`.
 */
export function createLogExporter(log: (line: string) => void): TraceExporter {
  return {
    onSpanStart: () => {},
    onSpanEnd: (span) => {
      let depth = 0;
      for (let p = span.parent; p; p = p.parent) depth += 1;
      const duration = span.duration === null ? "?" : `${(Number(span.duration) / 1e6).toFixed(2)}ms`;
      const attrs = [...span.attributes].map(([key, value]) => `${key}=${String(value)}`);
      const suffix = attrs.length > 0 ? ` {${attrs.join(", ")}}` : "";
      log(`${"  ".repeat(depth)}${span.name} ${duration}${suffix}`);
    },
    onEvent: () => {},
    flush: () => Promise.resolve(),
  };
}
