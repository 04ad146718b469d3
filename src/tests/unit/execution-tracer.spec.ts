import { describe, expect, it } from 'vitest';

import type { Span } from '../../monitoring/span.js';

import { ExecutionTracer } from '../../monitoring/execution-tracer.js';
import { flattenSpans } from '../../monitoring/span.js';

const manualClock = (start: number) => {
  let now = start;
  return { now: () => now, set: (value: number) => { now = value; } };
};

const requireSpan = (span: Span | null): Span => {
  if (span === null) throw new Error('expected a span');
  return span;
};

const buildTurn = () => {
  const clock = manualClock(1000);
  const tracer = new ExecutionTracer({ conversationId: 'conv-1', sessionId: 'sess-1', clock: clock.now });
  const root = requireSpan(tracer.createRootSpan('turn'));
  clock.set(1100);
  const llm = requireSpan(tracer.createSpan('llm', 'llm_call', { attributes: { model: 'gpt-4o' } }));
  clock.set(1350);
  tracer.endSpan(llm);
  clock.set(1400);
  const tool = requireSpan(tracer.createSpan('tool:q', 'tool_call'));
  clock.set(1500);
  const nested = requireSpan(tracer.createSpan('nested', 'custom'));
  clock.set(1520);
  tracer.endSpan(nested);
  clock.set(1600);
  tracer.endSpan(tool, 'error');
  clock.set(2000);
  return { tracer, clock, root, llm, tool, nested };
};

describe('ExecutionTracer', () => {
  it('builds ids from the trace id and span type', () => {
    const { tracer, root, llm } = buildTurn();
    expect(tracer.traceId).toMatch(/^trace_[0-9a-f]{16}_1$/);
    expect(root.spanId).toBe(`span_root_${tracer.traceId}`);
    expect(llm.spanId).toMatch(/^span_llm_call_[0-9a-f]{8}$/);
  });

  it('parents spans to the innermost open span', () => {
    const { root, llm, tool, nested } = buildTurn();
    expect(llm.parentSpanId).toBe(root.spanId);
    expect(tool.parentSpanId).toBe(root.spanId);
    expect(nested.parentSpanId).toBe(tool.spanId);
    expect(root.children.map((child) => child.name)).toEqual(['llm', 'tool:q']);
  });

  it('records durations from the clock', () => {
    const { llm, tool, nested } = buildTurn();
    expect(llm.durationMs).toBe(250);
    expect(nested.durationMs).toBe(20);
    expect(tool.durationMs).toBe(200);
    expect(tool.status).toBe('error');
  });

  it('closes the root on finalize and keeps the trace attributes', () => {
    const { tracer } = buildTurn();
    tracer.setTraceAttribute('agent', 'support');
    const trace = tracer.finalize();
    expect(trace?.status).toBe('success');
    expect(trace?.totalDurationMs).toBe(1000);
    expect(trace?.endTime).toBe(2000);
    expect(trace?.attributes).toEqual({ agent: 'support' });
  });

  it('closes spans left open as unknown, innermost first', () => {
    const clock = manualClock(0);
    const tracer = new ExecutionTracer({ conversationId: 'c', sessionId: 's', clock: clock.now });
    tracer.createRootSpan('turn');
    const outer = requireSpan(tracer.createSpan('outer', 'custom'));
    const inner = requireSpan(tracer.createSpan('inner', 'custom'));
    clock.set(50);
    const trace = tracer.finalize();
    expect(inner.status).toBe('unknown');
    expect(outer.status).toBe('unknown');
    expect(trace?.rootSpan.status).toBe('success');
    expect(tracer.activeSpan).toBeNull();
  });

  it('ignores an out-of-order close for the stack', () => {
    const tracer = new ExecutionTracer({ conversationId: 'c', sessionId: 's' });
    tracer.createRootSpan('turn');
    const outer = requireSpan(tracer.createSpan('outer', 'custom'));
    const inner = requireSpan(tracer.createSpan('inner', 'custom'));
    tracer.endSpan(outer);
    expect(tracer.activeSpan).toBe(inner);
    tracer.endSpan(inner);
    expect(tracer.activeSpan).toBe(outer);
    tracer.endActiveSpan();
    expect(tracer.activeSpan?.name).toBe('turn');
  });

  it('links detached spans without moving the active span', () => {
    const clock = manualClock(0);
    const tracer = new ExecutionTracer({ conversationId: 'c', sessionId: 's', clock: clock.now });
    const root = requireSpan(tracer.createRootSpan('turn'));
    const first = requireSpan(tracer.createSpan('first', 'tool_call', { detached: true }));
    const second = requireSpan(tracer.createSpan('second', 'tool_call', { detached: true }));
    expect(tracer.activeSpan).toBe(root);
    expect(second.parentSpanId).toBe(root.spanId);
    expect(root.children).toEqual([first, second]);

    tracer.endSpan(first);
    clock.set(40);
    tracer.finalize();
    expect(first.status).toBe('success');
    expect(second.status).toBe('unknown');
    expect(second.endTime).toBe(40);
    expect(root.status).toBe('success');
  });

  it('attaches events to the active or given span', () => {
    const { tracer, tool, clock } = buildTurn();
    clock.set(2100);
    tracer.addEvent('cache_hit', { key: 'k' }, tool);
    expect(tool.events).toEqual([{ timestamp: 2100, name: 'cache_hit', attributes: { key: 'k' } }]);
  });

  it('returns null from every call when disabled', () => {
    const tracer = new ExecutionTracer({ conversationId: 'c', sessionId: 's', enabled: false });
    expect(tracer.createRootSpan('turn')).toBeNull();
    expect(tracer.createSpan('x', 'custom')).toBeNull();
    expect(tracer.getTrace()).toBeNull();
    expect(tracer.finalize()).toBeNull();
  });

  it('needs a root before child spans', () => {
    const tracer = new ExecutionTracer({ conversationId: 'c', sessionId: 's' });
    expect(tracer.createSpan('x', 'custom')).toBeNull();
  });

  it('walks spans both ways and finds them by id', () => {
    const { tracer, nested } = buildTurn();
    expect([...tracer.spansBreadthFirst()].map((s) => s.name)).toEqual(['turn', 'llm', 'tool:q', 'nested']);
    expect([...tracer.spansDepthFirst()].map((s) => s.name)).toEqual(['turn', 'llm', 'tool:q', 'nested']);
    expect(tracer.getSpanById(nested.spanId)).toBe(nested);
    expect(tracer.getAllSpans()).toHaveLength(4);
  });

  it('flattens spans with depth', () => {
    const { root } = buildTurn();
    expect(flattenSpans(root).map((s) => [s.name, s.depth])).toEqual([
      ['turn', 0], ['llm', 1], ['tool:q', 1], ['nested', 2],
    ]);
  });
});

describe('trace rendering', () => {
  it('renders a Mermaid graph in breadth-first order', () => {
    const { tracer, root, llm, tool, nested } = buildTurn();
    tracer.finalize();
    expect(tracer.toMermaid()?.split('\n')).toEqual([
      'graph TD',
      `    ${root.spanId}["turn\\n1000ms ✓"]`,
      `    ${llm.spanId}["llm_call: llm\\n250ms ✓"]`,
      `    ${root.spanId} --> ${llm.spanId}`,
      `    ${tool.spanId}["tool_call: tool:q\\n200ms ✗"]`,
      `    ${root.spanId} --> ${tool.spanId}`,
      `    ${nested.spanId}["custom: nested\\n20ms ✓"]`,
      `    ${tool.spanId} --> ${nested.spanId}`,
    ]);
  });

  it('marks open spans as running and escapes quotes', () => {
    const tracer = new ExecutionTracer({ conversationId: 'c', sessionId: 's' });
    const root = requireSpan(tracer.createRootSpan('say "hi"'));
    expect(tracer.toMermaid()).toBe(`graph TD\n    ${root.spanId}["say #quot;hi#quot;\\nrunning ○"]`);
  });

  it('renders an indented tree', () => {
    const { tracer } = buildTurn();
    tracer.finalize();
    expect(tracer.toAsciiTree()).toBe([
      '[agent_invoke] turn 1000ms success',
      '├─ [llm_call] llm 250ms success',
      '├─ [tool_call] tool:q 200ms error',
      '│  ├─ [custom] nested 20ms success',
    ].join('\n'));
  });
});
