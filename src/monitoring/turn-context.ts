import type { MetricsStore } from './metrics-store.js';
import type { PriceTable } from './pricing.js';
import type { TraceStore } from './trace-store.js';

import { systemClock, type Clock } from '../types.js';
import { errorMessage, warn } from '../utils.js';

import { ExecutionTracer, type Trace } from './execution-tracer.js';
import { MetricsCollector, type AgentMetrics } from './metrics-collector.js';

export interface TurnContextOptions {
  conversationId: string;
  sessionId: string;
  enabled?: boolean;
  prices?: PriceTable;
  clock?: Clock;
}

export interface TurnStores {
  traces?: TraceStore;
  metrics?: MetricsStore;
}

export interface CompletedTurn {
  trace: Trace | null;
  metrics: AgentMetrics;
  persisted: { trace: boolean; metrics: boolean };
}

/** Tracer and collector for one conversation turn, passed explicitly to whatever runs the turn. */
export class TurnContext {
  readonly conversationId: string;
  readonly sessionId: string;
  readonly tracer: ExecutionTracer;
  readonly collector: MetricsCollector;
  private completed?: CompletedTurn;

  constructor(opts: TurnContextOptions) {
    this.conversationId = opts.conversationId;
    this.sessionId = opts.sessionId;
    const clock = opts.clock ?? systemClock;
    this.tracer = new ExecutionTracer({ ...opts, clock });
    this.collector = new MetricsCollector({ ...opts, clock });
  }

  get isCompleted(): boolean {
    return this.completed !== undefined;
  }

  /**
   * Finalizes metrics and trace, then persists both. Persistence failures are reported
   * through warn() and never thrown. A second call returns the first outcome.
   */
  async complete(stores: TurnStores = {}): Promise<CompletedTurn> {
    if (this.completed !== undefined) return this.completed;
    const metrics = this.collector.finalize();
    const trace = this.tracer.finalize(metrics);
    const persisted = { trace: false, metrics: false };
    if (trace !== null && stores.traces !== undefined) {
      try {
        await stores.traces.saveTrace(trace);
        persisted.trace = true;
      } catch (error: unknown) {
        warn(`trace persistence failed for ${this.conversationId}: ${errorMessage(error)}`);
      }
    }
    if (this.collector.enabled && stores.metrics !== undefined) {
      try {
        await stores.metrics.saveMetrics(metrics);
        persisted.metrics = true;
      } catch (error: unknown) {
        warn(`metrics persistence failed for ${this.conversationId}: ${errorMessage(error)}`);
      }
    }
    this.completed = { trace, metrics, persisted };
    return this.completed;
  }
}

/**
 * Process-wide registry of in-flight turns keyed by conversation id. Entries live from
 * `open` until `remove` (or `completeAndRemove`); nothing is evicted implicitly.
 */
export class TurnRegistry {
  private readonly turns = new Map<string, TurnContext>();

  get size(): number {
    return this.turns.size;
  }

  open(opts: TurnContextOptions): TurnContext {
    const existing = this.turns.get(opts.conversationId);
    if (existing !== undefined && !existing.isCompleted) return existing;
    const turn = new TurnContext(opts);
    this.turns.set(opts.conversationId, turn);
    return turn;
  }

  get(conversationId: string): TurnContext | undefined {
    return this.turns.get(conversationId);
  }

  remove(conversationId: string): boolean {
    return this.turns.delete(conversationId);
  }

  async completeAndRemove(conversationId: string, stores: TurnStores = {}): Promise<CompletedTurn | undefined> {
    const turn = this.turns.get(conversationId);
    if (turn === undefined) return undefined;
    try {
      return await turn.complete(stores);
    } finally {
      this.turns.delete(conversationId);
    }
  }
}
