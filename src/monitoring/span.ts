export type SpanType =
  | 'agent_invoke'
  | 'llm_call'
  | 'tool_call'
  | 'memory_flush'
  | 'skill_activation'
  | 'context_compression'
  | 'error'
  | 'custom';

export type SpanStatus = 'success' | 'error' | 'cancelled' | 'unknown';

export type SpanAttributes = Record<string, unknown>;

export interface SpanEvent {
  timestamp: number;
  name: string;
  attributes: SpanAttributes;
}

/** Plain, JSON-serializable span node. `endTime`/`durationMs` stay null while the span is open. */
export interface Span {
  traceId: string;
  spanId: string;
  parentSpanId: string | null;
  name: string;
  spanType: SpanType;
  startTime: number;
  endTime: number | null;
  durationMs: number | null;
  status: SpanStatus;
  attributes: SpanAttributes;
  events: SpanEvent[];
  children: Span[];
}

export function* iterBreadthFirst(root: Span): Generator<Span> {
  const queue: Span[] = [root];
  while (queue.length > 0) {
    const span = queue.shift();
    if (span === undefined) return;
    yield span;
    queue.push(...span.children);
  }
}

export function* iterDepthFirst(root: Span): Generator<Span> {
  yield root;
  for (const child of root.children) {
    yield* iterDepthFirst(child);
  }
}

export function findSpanById(root: Span, spanId: string): Span | undefined {
  for (const span of iterDepthFirst(root)) {
    if (span.spanId === spanId) return span;
  }
  return undefined;
}

export interface FlattenedSpan {
  spanId: string;
  parentSpanId: string | null;
  name: string;
  spanType: SpanType;
  startTime: number;
  durationMs: number | null;
  status: SpanStatus;
  depth: number;
  eventCount: number;
  attributes: SpanAttributes;
}

export function flattenSpans(root: Span): FlattenedSpan[] {
  const out: FlattenedSpan[] = [];
  const visit = (span: Span, depth: number): void => {
    out.push({
      spanId: span.spanId,
      parentSpanId: span.parentSpanId,
      name: span.name,
      spanType: span.spanType,
      startTime: span.startTime,
      durationMs: span.durationMs,
      status: span.status,
      depth,
      eventCount: span.events.length,
      attributes: span.attributes,
    });
    span.children.forEach((child) => { visit(child, depth + 1); });
  };
  visit(root, 0);
  return out;
}
