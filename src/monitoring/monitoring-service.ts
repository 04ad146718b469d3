import type { Trace } from './execution-tracer.js';
import type { AgentMetrics } from './metrics-collector.js';
import type { AggregatedMetrics, MetricsStore } from './metrics-store.js';
import type { ConversationSummary, TraceStore } from './trace-store.js';

import { systemClock, type Clock } from '../types.js';

import { flattenSpans, iterDepthFirst, type FlattenedSpan } from './span.js';
import { renderTrace, type TraceRenderFormat } from './trace-render.js';

export interface PerformanceSummary {
  conversationId: string;
  traceId: string;
  totalDurationMs: number;
  llmDurationMs: number;
  toolDurationMs: number;
  otherDurationMs: number;
  llmPercentage: number;
  toolPercentage: number;
  otherPercentage: number;
  totalTokens: number;
  toolCallsCount: number;
  estimatedCostUsd: number;
}

export type MetricsReport =
  | { scope: 'conversation'; conversationId: string; turns: AgentMetrics[] }
  | ({ scope: 'aggregate'; sessionId?: string } & AggregatedMetrics);

export interface MetricsReportQuery {
  conversationId?: string;
  sessionId?: string;
  startTime?: number;
  endTime?: number;
}

export interface RecentActivity {
  windowHours: number;
  traceCount: number;
  conversations: number;
  totalTokens: number;
  totalToolCalls: number;
  errorTraces: number;
}

const percentage = (part: number, total: number): number => (
  total > 0 ? Math.round((part / total) * 10_000) / 100 : 0
);

function durationsFromSpans(trace: Trace): { llm: number; tool: number; toolCalls: number } {
  let llm = 0;
  let tool = 0;
  let toolCalls = 0;
  for (const span of iterDepthFirst(trace.rootSpan)) {
    if (span.spanType === 'llm_call') llm += span.durationMs ?? 0;
    if (span.spanType === 'tool_call') {
      tool += span.durationMs ?? 0;
      toolCalls += 1;
    }
  }
  return { llm, tool, toolCalls };
}

export function summarizePerformance(trace: Trace): PerformanceSummary {
  const metrics = trace.metrics;
  const fallback = metrics === undefined ? durationsFromSpans(trace) : undefined;
  const total = metrics?.totalDurationMs ?? trace.totalDurationMs ?? 0;
  const llm = metrics?.llmDurationMs ?? fallback?.llm ?? 0;
  const tool = metrics?.toolDurationMs ?? fallback?.tool ?? 0;
  const other = metrics?.otherDurationMs ?? Math.max(0, total - llm - tool);
  return {
    conversationId: trace.conversationId,
    traceId: trace.traceId,
    totalDurationMs: total,
    llmDurationMs: llm,
    toolDurationMs: tool,
    otherDurationMs: other,
    llmPercentage: percentage(llm, total),
    toolPercentage: percentage(tool, total),
    otherPercentage: percentage(other, total),
    totalTokens: metrics?.totalTokens ?? 0,
    toolCallsCount: metrics?.toolCallsCount ?? fallback?.toolCalls ?? 0,
    estimatedCostUsd: metrics?.estimatedCostUsd ?? 0,
  };
}

export interface MonitoringServiceOptions {
  traces: TraceStore;
  metrics: MetricsStore;
  clock?: Clock;
}

/** Read API consumed by dashboards and the CLI. */
export class MonitoringService {
  private readonly traces: TraceStore;
  private readonly metrics: MetricsStore;
  private readonly clock: Clock;

  constructor(opts: MonitoringServiceOptions) {
    this.traces = opts.traces;
    this.metrics = opts.metrics;
    this.clock = opts.clock ?? systemClock;
  }

  listConversations(sessionId?: string, limit = 50): ConversationSummary[] {
    return this.traces.listConversations(sessionId, limit);
  }

  async loadTrace(conversationId: string): Promise<Trace | undefined> {
    return await this.traces.loadTrace(conversationId);
  }

  async getMetrics(query: MetricsReportQuery = {}): Promise<MetricsReport> {
    if (typeof query.conversationId === 'string' && query.conversationId.length > 0) {
      const turns = await this.metrics.getMetrics(query.conversationId, query.startTime, query.endTime);
      return { scope: 'conversation', conversationId: query.conversationId, turns };
    }
    const aggregate = this.metrics.getAggregatedMetrics({
      sessionId: query.sessionId,
      startTime: query.startTime,
      endTime: query.endTime,
    });
    return { scope: 'aggregate', sessionId: query.sessionId, ...aggregate };
  }

  async getPerformanceSummary(conversationId: string): Promise<PerformanceSummary | undefined> {
    const trace = await this.traces.loadTrace(conversationId);
    return trace !== undefined ? summarizePerformance(trace) : undefined;
  }

  async getSpans(conversationId: string): Promise<FlattenedSpan[] | undefined> {
    const trace = await this.traces.loadTrace(conversationId);
    return trace !== undefined ? flattenSpans(trace.rootSpan) : undefined;
  }

  async renderTrace(conversationId: string, format: TraceRenderFormat = 'mermaid'): Promise<string | undefined> {
    const trace = await this.traces.loadTrace(conversationId);
    return trace !== undefined ? renderTrace(trace.rootSpan, format) : undefined;
  }

  recentActivity(hours = 24): RecentActivity {
    const now = this.clock();
    const records = this.traces.byTimeRange(now - hours * 3600 * 1000, now, 10_000);
    return {
      windowHours: hours,
      traceCount: records.length,
      conversations: new Set(records.map((record) => record.conversationId)).size,
      totalTokens: records.reduce((sum, record) => sum + record.totalTokens, 0),
      totalToolCalls: records.reduce((sum, record) => sum + record.toolCallsCount, 0),
      errorTraces: records.filter((record) => record.status === 'error').length,
    };
  }
}
