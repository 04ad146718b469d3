import type { Configuration, StorageLayout } from './config.js';
import type { CompletedTurn, TurnContext } from './monitoring/turn-context.js';

import { ArtifactStore } from './artifacts/artifact-store.js';
import { IdempotencyCache } from './cache/idempotency-cache.js';
import { resolveStorageLayout } from './config.js';
import { MetricsStore } from './monitoring/metrics-store.js';
import { MonitoringService } from './monitoring/monitoring-service.js';
import { mergePriceTable, type PriceTable } from './monitoring/pricing.js';
import { TraceStore } from './monitoring/trace-store.js';
import { TurnRegistry } from './monitoring/turn-context.js';
import { ToolPolicyRegistry } from './pipeline/cache-policy.js';
import { ToolPipeline } from './pipeline/executor.js';
import { systemClock, type Clock, type LogCallback } from './types.js';

const DAY_MS = 86_400_000;
const HOUR_MS = 3_600_000;

export interface RuntimeOptions {
  env?: NodeJS.ProcessEnv;
  clock?: Clock;
  onLog?: LogCallback;
}

export interface CleanupRequest {
  traceDays?: number;
  metricsDays?: number;
  artifactHours?: number;
}

export interface CleanupReport {
  traces: number;
  metrics: number;
  artifacts: number;
}

/**
 * Pipeline, stores and turn registry built from one configuration. The stores hold
 * SQLite handles; call `close()` when done.
 */
export class ToolRuntime {
  readonly config: Configuration;
  readonly layout: StorageLayout;
  readonly pipeline: ToolPipeline;
  readonly artifacts: ArtifactStore;
  readonly traces: TraceStore;
  readonly metrics: MetricsStore;
  readonly monitoring: MonitoringService;
  readonly turns = new TurnRegistry();
  private readonly prices: PriceTable;
  private readonly clock: Clock;
  private closed = false;

  constructor(config: Configuration, opts: RuntimeOptions = {}) {
    this.config = config;
    this.clock = opts.clock ?? systemClock;
    this.layout = resolveStorageLayout(config, opts.env);
    this.prices = mergePriceTable(config.pricing);
    this.artifacts = new ArtifactStore({ dir: this.layout.artifactsDir, clock: this.clock, onLog: opts.onLog });
    this.traces = new TraceStore({
      dir: this.layout.tracesDir,
      retentionDays: config.monitoring.traceRetention / DAY_MS,
      clock: this.clock,
      onLog: opts.onLog,
    });
    this.metrics = new MetricsStore({
      dir: this.layout.metricsDir,
      retentionDays: config.monitoring.metricsRetention / DAY_MS,
      clock: this.clock,
    });
    this.monitoring = new MonitoringService({ traces: this.traces, metrics: this.metrics, clock: this.clock });
    this.pipeline = new ToolPipeline({
      cache: new IdempotencyCache({ maxSize: config.cache.maxEntries, clock: this.clock, onLog: opts.onLog }),
      policies: new ToolPolicyRegistry(config.toolPolicies),
      requestDefaults: {
        timeoutMs: config.timeouts.defaultMs,
        maxRetries: config.timeouts.maxRetries,
        retryOnTimeout: config.timeouts.retryOnTimeout,
      },
      artifactStore: this.artifacts,
      artifactThresholdBytes: config.artifacts.inlineThresholdBytes,
      clock: this.clock,
      onLog: opts.onLog,
    });
  }

  /** Returns the in-flight turn for the conversation, or opens one. */
  openTurn(conversationId: string, sessionId: string): TurnContext {
    return this.turns.open({
      conversationId,
      sessionId,
      enabled: this.config.monitoring.enabled,
      prices: this.prices,
      clock: this.clock,
    });
  }

  async completeTurn(conversationId: string): Promise<CompletedTurn | undefined> {
    return await this.turns.completeAndRemove(conversationId, { traces: this.traces, metrics: this.metrics });
  }

  // Omitted limits fall back to the configured retention
  async cleanup(request: CleanupRequest = {}): Promise<CleanupReport> {
    return {
      traces: await this.traces.cleanupOldTraces(request.traceDays),
      metrics: await this.metrics.cleanupOldMetrics(request.metricsDays),
      artifacts: await this.artifacts.cleanup(request.artifactHours ?? this.config.artifacts.maxAge / HOUR_MS),
    };
  }

  get isClosed(): boolean {
    return this.closed;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.traces.close();
    this.metrics.close();
  }
}
