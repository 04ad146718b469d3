import { iterBreadthFirst, iterDepthFirst, type Span, type SpanStatus } from './span.js';

export type TraceRenderFormat = 'mermaid' | 'tree';

const STATUS_ICON: Record<SpanStatus, string> = {
  success: '✓',
  error: '✗',
  cancelled: '○',
  unknown: '○',
};

const mermaidNodeId = (spanId: string): string => spanId.replace(/[-:]/g, '_');

const formatDuration = (span: Span): string => (
  span.durationMs !== null ? `${String(Math.round(span.durationMs))}ms` : 'running'
);

export function renderMermaid(root: Span): string {
  const lines = ['graph TD'];
  for (const span of iterBreadthFirst(root)) {
    const nodeId = mermaidNodeId(span.spanId);
    let label = `${span.name}\\n${formatDuration(span)} ${STATUS_ICON[span.status]}`;
    if (span.spanType !== 'agent_invoke') label = `${span.spanType}: ${label}`;
    lines.push(`    ${nodeId}["${label.replace(/"/g, '#quot;')}"]`);
    if (span.parentSpanId !== null) {
      lines.push(`    ${mermaidNodeId(span.parentSpanId)} --> ${nodeId}`);
    }
  }
  return lines.join('\n');
}

export function renderAsciiTree(root: Span): string {
  const depthOf = new Map<string, number>();
  const lines: string[] = [];
  for (const span of iterDepthFirst(root)) {
    const depth = span.parentSpanId !== null ? (depthOf.get(span.parentSpanId) ?? 0) + 1 : 0;
    depthOf.set(span.spanId, depth);
    const indent = depth === 0 ? '' : `${'│  '.repeat(depth - 1)}├─ `;
    const events = span.events.length > 0 ? ` events=${String(span.events.length)}` : '';
    lines.push(`${indent}[${span.spanType}] ${span.name} ${formatDuration(span)} ${span.status}${events}`);
  }
  return lines.join('\n');
}

export function renderTrace(root: Span, format: TraceRenderFormat): string {
  return format === 'mermaid' ? renderMermaid(root) : renderAsciiTree(root);
}
