import { metrics as otelMetrics, trace as otelTrace, SpanStatusCode } from '@opentelemetry/api';

import type { Attributes, Counter, Histogram, Span, SpanKind } from '@opentelemetry/api';

// Mirrors pipeline activity onto @opentelemetry/api. Without a registered SDK every call is a no-op.

const TRACER_NAME = 'toolrun';
const METER_NAME = 'toolrun';

export interface RunWithSpanOptions {
  kind?: SpanKind;
  attributes?: Attributes;
}

export interface ToolMetricsRecord {
  toolName: string;
  status: 'success' | 'error';
  latencyMs: number;
  outputBytes?: number;
  cacheHit?: boolean;
  errorType?: string;
}

interface ToolInstruments {
  invocations: Counter;
  errors: Counter;
  cacheHits: Counter;
  latency: Histogram;
  bytesOut: Counter;
}

let instruments: ToolInstruments | undefined;

// Looked up on first record, after any meter provider is registered
function toolInstruments(): ToolInstruments {
  if (instruments !== undefined) return instruments;
  const meter = otelMetrics.getMeter(METER_NAME);
  instruments = {
    invocations: meter.createCounter('toolrun_tool_invocations_total', { description: 'Tool invocations by status' }),
    errors: meter.createCounter('toolrun_tool_errors_total', { description: 'Failed tool invocations by error type' }),
    cacheHits: meter.createCounter('toolrun_tool_cache_hits_total', { description: 'Tool invocations served from the idempotency cache' }),
    latency: meter.createHistogram('toolrun_tool_latency_ms', { description: 'Tool invocation latency (milliseconds)' }),
    bytesOut: meter.createCounter('toolrun_tool_output_bytes_total', { description: 'Serialized tool output size (bytes)' }),
  };
  return instruments;
}

export function recordToolMetrics(record: ToolMetricsRecord): void {
  const set = toolInstruments();
  const labels: Attributes = {
    tool: record.toolName,
    status: record.status,
    cache: record.cacheHit === true ? 'hit' : 'miss',
  };
  const latency = Number.isFinite(record.latencyMs) ? Math.max(0, record.latencyMs) : 0;
  set.latency.record(latency, labels);
  set.invocations.add(1, labels);
  if (record.cacheHit === true) set.cacheHits.add(1, { tool: record.toolName });
  if (record.outputBytes !== undefined && record.outputBytes > 0) set.bytesOut.add(record.outputBytes, labels);
  if (record.status === 'error') {
    set.errors.add(1, { ...labels, error_type: record.errorType ?? 'unknown' });
  }
}

/** Runs `fn` inside an active OTel span; a thrown error is recorded on the span and rethrown. */
export async function runWithSpan<T>(name: string, options: RunWithSpanOptions, fn: (span: Span) => Promise<T>): Promise<T> {
  return await otelTrace.getTracer(TRACER_NAME).startActiveSpan(name, { kind: options.kind, attributes: options.attributes }, async (span) => {
    try {
      return await fn(span);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      if (error instanceof Error) span.recordException(error);
      span.setStatus({ code: SpanStatusCode.ERROR, message });
      throw error;
    } finally {
      span.end();
    }
  });
}

export function addSpanAttributes(attributes: Attributes): void {
  const span = otelTrace.getActiveSpan();
  if (span === undefined) return;
  span.setAttributes(attributes);
}

export function markSpanError(message: string): void {
  const span = otelTrace.getActiveSpan();
  if (span === undefined) return;
  span.setStatus({ code: SpanStatusCode.ERROR, message });
}
