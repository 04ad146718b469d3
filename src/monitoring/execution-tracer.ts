import crypto from 'node:crypto';

import type { AgentMetrics } from './metrics-collector.js';

import { systemClock, type Clock } from '../types.js';

import {
  findSpanById,
  iterBreadthFirst,
  iterDepthFirst,
  type Span,
  type SpanAttributes,
  type SpanStatus,
  type SpanType,
} from './span.js';
import { renderAsciiTree, renderMermaid } from './trace-render.js';

export interface Trace {
  traceId: string;
  conversationId: string;
  sessionId: string;
  startTime: number;
  endTime: number | null;
  totalDurationMs: number | null;
  status: SpanStatus;
  rootSpan: Span;
  metrics?: AgentMetrics;
  attributes: SpanAttributes;
}

export interface CreateSpanOptions {
  /** Defaults to the active span. */
  parent?: Span;
  attributes?: SpanAttributes;
  /** Leave the active span unchanged. */
  detached?: boolean;
}

export interface ExecutionTracerOptions {
  conversationId: string;
  sessionId: string;
  enabled?: boolean;
  clock?: Clock;
}

const randomHex = (chars: number): string => crypto.randomBytes(Math.ceil(chars / 2)).toString('hex').slice(0, chars);

/**
 * Span tree for one conversation turn. Spans are pushed on a stack as they open;
 * `createSpan` parents to the top of the stack unless told otherwise. A detached span
 * is linked into the tree but never pushed. Ending a
 * span pops it only when it is on top, so out-of-order closes leave the stack alone.
 * A disabled tracer returns null from every creation call.
 */
export class ExecutionTracer {
  readonly conversationId: string;
  readonly sessionId: string;
  readonly enabled: boolean;
  readonly traceId: string;
  private readonly clock: Clock;
  private readonly stack: Span[] = [];
  private readonly index = new Map<string, Span>();
  private readonly attributes: SpanAttributes = {};
  private root: Span | null = null;

  constructor(opts: ExecutionTracerOptions) {
    this.conversationId = opts.conversationId;
    this.sessionId = opts.sessionId;
    this.enabled = opts.enabled ?? true;
    this.clock = opts.clock ?? systemClock;
    this.traceId = `trace_${randomHex(16)}_${String(Math.floor(this.clock() / 1000))}`;
  }

  get rootSpan(): Span | null {
    return this.root;
  }

  get activeSpan(): Span | null {
    return this.stack.length > 0 ? this.stack[this.stack.length - 1] : null;
  }

  createRootSpan(name: string, spanType: SpanType = 'agent_invoke', attributes: SpanAttributes = {}): Span | null {
    if (!this.enabled) return null;
    const span = this.newSpan(`span_root_${this.traceId}`, null, name, spanType, attributes);
    this.root = span;
    this.stack.length = 0;
    this.index.clear();
    this.index.set(span.spanId, span);
    this.stack.push(span);
    return span;
  }

  createSpan(name: string, spanType: SpanType, opts: CreateSpanOptions = {}): Span | null {
    if (!this.enabled || this.root === null) return null;
    const parent = opts.parent ?? this.activeSpan ?? this.root;
    const span = this.newSpan(`span_${spanType}_${randomHex(8)}`, parent.spanId, name, spanType, opts.attributes ?? {});
    parent.children.push(span);
    this.index.set(span.spanId, span);
    if (opts.detached !== true) this.stack.push(span);
    return span;
  }

  endSpan(span: Span | null, status: SpanStatus = 'success'): void {
    if (!this.enabled || span === null) return;
    if (span.endTime === null) {
      const endTime = this.clock();
      span.endTime = endTime;
      span.durationMs = endTime - span.startTime;
      span.status = status;
    }
    if (this.activeSpan === span) this.stack.pop();
  }

  endActiveSpan(status: SpanStatus = 'success'): Span | null {
    const span = this.activeSpan;
    if (span === null) return null;
    this.endSpan(span, status);
    return span;
  }

  addEvent(name: string, attributes: SpanAttributes = {}, span?: Span | null): void {
    if (!this.enabled) return;
    const target = span ?? this.activeSpan;
    if (target === null) return;
    target.events.push({ timestamp: this.clock(), name, attributes: { ...attributes } });
  }

  setSpanAttributes(span: Span | null, attributes: SpanAttributes): void {
    if (!this.enabled || span === null) return;
    Object.assign(span.attributes, attributes);
  }

  setTraceAttribute(key: string, value: unknown): void {
    if (!this.enabled) return;
    this.attributes[key] = value;
  }

  /** Live view of the current tree; null until a root span exists. */
  getTrace(): Trace | null {
    if (!this.enabled || this.root === null) return null;
    return {
      traceId: this.traceId,
      conversationId: this.conversationId,
      sessionId: this.sessionId,
      startTime: this.root.startTime,
      endTime: this.root.endTime,
      totalDurationMs: this.root.durationMs,
      status: this.root.status,
      rootSpan: this.root,
      attributes: { ...this.attributes },
    };
  }

  getSpanById(spanId: string): Span | undefined {
    const indexed = this.index.get(spanId);
    if (indexed !== undefined) return indexed;
    return this.root !== null ? findSpanById(this.root, spanId) : undefined;
  }

  getAllSpans(): Span[] {
    return this.root !== null ? [...iterDepthFirst(this.root)] : [];
  }

  *spansBreadthFirst(): Generator<Span> {
    if (this.root !== null) yield* iterBreadthFirst(this.root);
  }

  *spansDepthFirst(): Generator<Span> {
    if (this.root !== null) yield* iterDepthFirst(this.root);
  }

  /**
   * Closes whatever is still open (innermost first) with status `unknown`, except the
   * root which closes as `success`, and attaches the metrics. Returns null when nothing was traced.
   */
  finalize(metrics?: AgentMetrics): Trace | null {
    if (!this.enabled || this.root === null) return null;
    // reversed pre-order closes children before their parents
    for (const span of [...iterDepthFirst(this.root)].reverse()) {
      if (span.endTime === null) this.endSpan(span, span === this.root ? 'success' : 'unknown');
    }
    this.stack.length = 0;
    const trace = this.getTrace();
    if (trace === null) return null;
    return metrics !== undefined ? { ...trace, metrics } : trace;
  }

  toMermaid(): string | null {
    return this.root !== null ? renderMermaid(this.root) : null;
  }

  toAsciiTree(): string | null {
    return this.root !== null ? renderAsciiTree(this.root) : null;
  }

  private newSpan(spanId: string, parentSpanId: string | null, name: string, spanType: SpanType, attributes: SpanAttributes): Span {
    return {
      traceId: this.traceId,
      spanId,
      parentSpanId,
      name,
      spanType,
      startTime: this.clock(),
      endTime: null,
      durationMs: null,
      status: 'unknown',
      attributes: { ...attributes },
      events: [],
      children: [],
    };
  }
}
