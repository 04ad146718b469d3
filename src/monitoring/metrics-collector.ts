import { systemClock, type Clock } from '../types.js';

import { DEFAULT_PRICE_TABLE, estimateCostUsd, type PriceTable } from './pricing.js';

export interface ToolCallStats {
  toolName: string;
  callCount: number;
  successCount: number;
  errorCount: number;
  totalDurationMs: number;
  totalInputTokens: number;
  totalOutputTokens: number;
  avgDurationMs: number;
  successRate: number;
}

export interface ModelTokenUsage {
  input: number;
  output: number;
  calls: number;
}

export interface MemoryFlushRecord {
  timestamp: number;
  durationMs: number;
  messagesCount: number;
  tokensSaved: number;
}

export interface ErrorRecord {
  timestamp: number;
  errorType: string;
  message: string;
  context?: Record<string, unknown>;
}

export interface MetricsMetadata {
  memoryFlushes?: MemoryFlushRecord[];
  errors?: ErrorRecord[];
  [key: string]: unknown;
}

export interface AgentMetrics {
  conversationId: string;
  sessionId: string;
  timestamp: number;
  totalInputTokens: number;
  totalOutputTokens: number;
  totalTokens: number;
  tokensByModel: Record<string, ModelTokenUsage>;
  totalDurationMs: number;
  llmDurationMs: number;
  toolDurationMs: number;
  otherDurationMs: number;
  toolCallsCount: number;
  toolErrors: number;
  toolCallsByName: Record<string, ToolCallStats>;
  estimatedCostUsd: number;
  primaryModel: string | null;
  modelsUsed: string[];
  metadata: MetricsMetadata;
}

type RawToolStats = Omit<ToolCallStats, 'avgDurationMs' | 'successRate'>;

export interface MetricsCollectorOptions {
  conversationId: string;
  sessionId: string;
  enabled?: boolean;
  prices?: PriceTable;
  clock?: Clock;
}

/**
 * Per-turn token, duration and tool statistics. Cached LLM calls count toward totals and
 * `calls` but not toward the per-model usage that cost is computed from.
 */
export class MetricsCollector {
  readonly enabled: boolean;
  private readonly clock: Clock;
  private readonly prices: PriceTable;
  private readonly startedAt: number;
  private readonly state: Omit<AgentMetrics, 'toolCallsByName' | 'metadata'>;
  private readonly toolStats = new Map<string, RawToolStats>();
  private readonly memoryFlushes: MemoryFlushRecord[] = [];
  private readonly errors: ErrorRecord[] = [];
  private readonly extraMetadata: Record<string, unknown> = {};
  private finalized = false;

  constructor(opts: MetricsCollectorOptions) {
    this.enabled = opts.enabled ?? true;
    this.clock = opts.clock ?? systemClock;
    this.prices = opts.prices ?? DEFAULT_PRICE_TABLE;
    this.startedAt = this.clock();
    this.state = {
      conversationId: opts.conversationId,
      sessionId: opts.sessionId,
      timestamp: this.startedAt,
      totalInputTokens: 0,
      totalOutputTokens: 0,
      totalTokens: 0,
      tokensByModel: {},
      totalDurationMs: 0,
      llmDurationMs: 0,
      toolDurationMs: 0,
      otherDurationMs: 0,
      toolCallsCount: 0,
      toolErrors: 0,
      estimatedCostUsd: 0,
      primaryModel: null,
      modelsUsed: [],
    };
  }

  get isFinalized(): boolean {
    return this.finalized;
  }

  recordLLMCall(model: string, inputTokens: number, outputTokens: number, durationMs: number, cached = false): void {
    if (!this.enabled) return;
    const s = this.state;
    s.totalInputTokens += inputTokens;
    s.totalOutputTokens += outputTokens;
    s.totalTokens = s.totalInputTokens + s.totalOutputTokens;
    s.llmDurationMs += durationMs;

    const usage = s.tokensByModel[model] ?? { input: 0, output: 0, calls: 0 };
    if (!cached) {
      usage.input += inputTokens;
      usage.output += outputTokens;
    }
    usage.calls += 1;
    s.tokensByModel[model] = usage;

    if (!s.modelsUsed.includes(model)) s.modelsUsed.push(model);
    if (s.primaryModel === null) s.primaryModel = model;
  }

  recordToolCall(toolName: string, durationMs: number, success: boolean, inputTokens = 0, outputTokens = 0): void {
    if (!this.enabled) return;
    const stats = this.toolStats.get(toolName) ?? {
      toolName,
      callCount: 0,
      successCount: 0,
      errorCount: 0,
      totalDurationMs: 0,
      totalInputTokens: 0,
      totalOutputTokens: 0,
    };
    stats.callCount += 1;
    if (success) stats.successCount += 1;
    else stats.errorCount += 1;
    stats.totalDurationMs += durationMs;
    stats.totalInputTokens += inputTokens;
    stats.totalOutputTokens += outputTokens;
    this.toolStats.set(toolName, stats);

    this.state.toolDurationMs += durationMs;
    this.state.toolCallsCount += 1;
    if (!success) this.state.toolErrors += 1;
  }

  recordMemoryFlush(durationMs: number, messagesCount: number, tokensSaved: number): void {
    if (!this.enabled) return;
    this.state.otherDurationMs += durationMs;
    this.memoryFlushes.push({ timestamp: this.clock(), durationMs, messagesCount, tokensSaved });
  }

  recordError(errorType: string, message: string, context?: Record<string, unknown>): void {
    if (!this.enabled) return;
    this.errors.push({ timestamp: this.clock(), errorType, message, context });
  }

  setMetadata(key: string, value: unknown): void {
    if (!this.enabled) return;
    this.extraMetadata[key] = value;
  }

  /** Stamps total/other duration and cost. Safe to call again; later calls recompute. */
  finalize(): AgentMetrics {
    if (this.enabled) {
      const s = this.state;
      s.totalDurationMs = Math.max(0, this.clock() - this.startedAt);
      s.otherDurationMs = Math.max(0, s.totalDurationMs - s.llmDurationMs - s.toolDurationMs);
      s.estimatedCostUsd = Object.entries(s.tokensByModel).reduce(
        (sum, [model, usage]) => sum + estimateCostUsd(model, usage.input, usage.output, this.prices),
        0,
      );
      this.finalized = true;
    }
    return this.getMetrics();
  }

  getMetrics(): AgentMetrics {
    const metadata: MetricsMetadata = { ...this.extraMetadata };
    if (this.memoryFlushes.length > 0) metadata.memoryFlushes = this.memoryFlushes.map((entry) => ({ ...entry }));
    if (this.errors.length > 0) metadata.errors = this.errors.map((entry) => ({ ...entry }));
    const toolCallsByName = Object.fromEntries([...this.toolStats.entries()].map(([name, stats]) => [name, {
      ...stats,
      avgDurationMs: stats.callCount > 0 ? stats.totalDurationMs / stats.callCount : 0,
      successRate: stats.callCount > 0 ? stats.successCount / stats.callCount : 0,
    }]));
    const tokensByModel = Object.fromEntries(
      Object.entries(this.state.tokensByModel).map(([model, usage]) => [model, { ...usage }])
    );
    return {
      ...this.state,
      tokensByModel,
      modelsUsed: [...this.state.modelsUsed],
      toolCallsByName,
      metadata,
    };
  }
}
