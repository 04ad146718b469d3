import path from 'node:path';

import type { Span } from '../monitoring/span.js';
import type { TurnContext } from '../monitoring/turn-context.js';

import { ArtifactStore } from '../artifacts/artifact-store.js';
import { IdempotencyCache } from '../cache/idempotency-cache.js';
import { addSpanAttributes, markSpanError, recordToolMetrics, runWithSpan } from '../telemetry/index.js';
import { executeWithTimeout, type LateSettlement } from '../timeout/isolator.js';
import { systemClock, type Clock, type LogCallback, type LogEntry } from '../types.js';
import { errorMessage, warn } from '../utils.js';

import { ToolPolicyRegistry } from './cache-policy.js';
import { TimeoutError, toPipelineError, type ValidationError } from './errors.js';
import { createToolInvocationRequest, nextAttempt, shouldRetry, type ToolInvocationInput, type ToolInvocationRequest } from './request.js';
import {
  createErrorResult,
  createResultFromError,
  createTimeoutResult,
  rebindToolCall,
  type ToolExecutionResult,
} from './result.js';
import { buildResultFromRawData } from './shaping.js';

export type ToolFunction = (parameters: Readonly<Record<string, unknown>>, signal: AbortSignal) => Promise<unknown> | unknown;

export type RequestDefaults = Pick<ToolInvocationInput, 'timeoutMs' | 'maxRetries' | 'retryOnTimeout'>;

export interface ToolPipelineOptions {
  /** Omit to run every call uncached. */
  cache?: IdempotencyCache;
  policies?: ToolPolicyRegistry;
  /** Applied where an invocation leaves these fields unset. */
  requestDefaults?: RequestDefaults;
  /** Used when a request carries no storageDir of its own. */
  artifactStore?: ArtifactStore;
  artifactThresholdBytes?: number;
  clock?: Clock;
  onLog?: LogCallback;
}

/**
 * Request → cache → timeout isolator → shaping → cache, with a `tool_call` span around
 * every invocation when a turn context is supplied. `invoke` never rejects.
 */
export class ToolPipeline {
  readonly cache?: IdempotencyCache;
  readonly policies: ToolPolicyRegistry;
  private readonly requestDefaults: RequestDefaults;
  private readonly defaultArtifacts?: ArtifactStore;
  private readonly artifactsByDir = new Map<string, ArtifactStore>();
  private readonly artifactThresholdBytes?: number;
  private readonly clock: Clock;
  private readonly onLog?: LogCallback;

  constructor(opts: ToolPipelineOptions = {}) {
    this.cache = opts.cache;
    this.policies = opts.policies ?? new ToolPolicyRegistry();
    this.requestDefaults = opts.requestDefaults ?? {};
    this.defaultArtifacts = opts.artifactStore;
    // one instance per directory, or metadata writes from two instances overwrite each other
    if (opts.artifactStore !== undefined) this.artifactsByDir.set(opts.artifactStore.root, opts.artifactStore);
    this.artifactThresholdBytes = opts.artifactThresholdBytes;
    this.clock = opts.clock ?? systemClock;
    this.onLog = opts.onLog;
  }

  async invoke(input: ToolInvocationInput, execute: ToolFunction, turn?: TurnContext): Promise<ToolExecutionResult> {
    const built = createToolInvocationRequest(this.withDefaults(input), { policies: this.policies });
    if (!built.ok) return this.rejectInvalid(input, built.error, turn);
    const request = built.value;

    try {
      return await runWithSpan('tool.invoke', {
        attributes: {
          'tool.name': request.toolName,
          'tool.call_id': request.toolCallId,
          'tool.cache_policy': request.cachePolicy,
        },
      }, async () => await this.invokeTraced(request, execute, turn));
    } catch (error: unknown) {
      // invokeTraced resolves to a result on every path; this guards the telemetry wrapper itself
      const pipelineError = toPipelineError(error);
      this.log('ERR', request, `pipeline failure: ${pipelineError.message}`);
      return createResultFromError(pipelineError, {
        toolCallId: request.toolCallId,
        toolName: request.toolName,
        cachePolicy: request.cachePolicy,
        clock: this.clock,
      });
    }
  }

  /** Fetches an artifact for a follow-up call; rejections and misses come back as error results. */
  async resolveArtifact(toolCallId: string, artifactId: string, storageDir?: string): Promise<ToolExecutionResult> {
    const toolName = 'artifact_retrieve';
    const store = storageDir !== undefined ? this.artifactStoreFor(storageDir) : this.defaultArtifacts;
    if (store === undefined) {
      return createErrorResult({ toolCallId, toolName, errorMessage: 'No artifact storage configured', errorType: 'validation', errorCode: 'VALIDATION', clock: this.clock });
    }
    try {
      const outcome = await store.retrieve(artifactId);
      if (!outcome.ok) return createResultFromError(outcome.error, { toolCallId, toolName, clock: this.clock });
      if (outcome.value === undefined) {
        return createErrorResult({ toolCallId, toolName, errorMessage: `Artifact not found: ${artifactId}`, errorType: 'not_found', errorCode: 'NOT_FOUND', clock: this.clock });
      }
      return await buildResultFromRawData({ toolCallId, toolName, raw: outcome.value, outputLevel: 'standard', clock: this.clock });
    } catch (error: unknown) {
      return createResultFromError(toPipelineError(error), { toolCallId, toolName, clock: this.clock });
    }
  }

  private async invokeTraced(request: ToolInvocationRequest, execute: ToolFunction, turn?: TurnContext): Promise<ToolExecutionResult> {
    const tracer = turn?.tracer;
    // Tool calls of one response may run in parallel; each hangs off the span active at entry.
    const parent = tracer?.activeSpan ?? undefined;
    const span = tracer?.createSpan(`tool:${request.toolName}`, 'tool_call', {
      parent,
      detached: true,
      attributes: {
        tool_name: request.toolName,
        tool_call_id: request.toolCallId,
        cache_policy: request.cachePolicy,
        idempotency_key: request.idempotencyKey,
      },
    }) ?? null;
    const startedAt = this.clock();

    const compute = async (): Promise<ToolExecutionResult> => await this.executeWithRetries(request, execute, turn, span);
    const raw = this.cache !== undefined
      ? await this.cache.getOrCompute({ ...request, parameters: { ...request.parameters } }, compute)
      : await compute();
    const cacheHit = raw.metadata.cacheHit === true;
    const result = cacheHit ? rebindToolCall(raw, request.toolCallId) : raw;
    const elapsedMs = this.clock() - startedAt;

    turn?.collector.recordToolCall(request.toolName, cacheHit ? elapsedMs : result.durationMs, result.success);
    if (!result.success) {
      turn?.collector.recordError(result.errorType ?? 'tool_error', result.errorMessage ?? 'unknown error', {
        toolName: request.toolName,
        toolCallId: request.toolCallId,
      });
    }

    if (tracer !== undefined && span !== null) {
      if (cacheHit) tracer.addEvent('cache_hit', { cached_at: result.metadata.cachedAt ?? null }, span);
      tracer.setSpanAttributes(span, {
        success: result.success,
        cache_hit: cacheHit,
        retry_count: result.retryCount,
        data_size_bytes: result.dataSizeBytes,
        ...(result.artifactId !== undefined ? { artifact_id: result.artifactId } : {}),
        ...(result.errorType !== undefined ? { error_type: result.errorType } : {}),
      });
      tracer.endSpan(span, result.success ? 'success' : 'error');
    }

    addSpanAttributes({ 'tool.success': result.success, 'tool.cache_hit': cacheHit, 'tool.retry_count': result.retryCount });
    if (!result.success) markSpanError(result.errorMessage ?? 'tool call failed');
    recordToolMetrics({
      toolName: request.toolName,
      status: result.success ? 'success' : 'error',
      latencyMs: elapsedMs,
      outputBytes: result.dataSizeBytes,
      cacheHit,
      errorType: result.errorType,
    });
    this.log(result.success ? 'FIN' : 'WRN', request, result.success
      ? `completed in ${String(elapsedMs)}ms${cacheHit ? ' (cache hit)' : ''}`
      : `failed: ${result.errorMessage ?? 'unknown error'}`);
    return result;
  }

  private async executeWithRetries(
    first: ToolInvocationRequest,
    execute: ToolFunction,
    turn: TurnContext | undefined,
    span: Span | null,
  ): Promise<ToolExecutionResult> {
    const startedAt = this.clock();
    const base = { toolCallId: first.toolCallId, toolName: first.toolName, cachePolicy: first.cachePolicy, clock: this.clock };
    let request = first;
    for (;;) {
      try {
        const raw = await executeWithTimeout((signal) => execute(request.parameters, signal), request.timeoutMs, {
          label: `${request.toolName} (${request.toolCallId})`,
          onLateSettle: (settlement) => { this.logLate(request, settlement); },
        });
        return await buildResultFromRawData({
          ...base,
          raw,
          outputLevel: request.outputLevel,
          durationMs: this.clock() - startedAt,
          retryCount: request.attempt,
          artifactStore: this.artifactSinkFor(request),
          artifactThresholdBytes: this.artifactThresholdBytes,
        });
      } catch (error: unknown) {
        const durationMs = this.clock() - startedAt;
        if (!(error instanceof TimeoutError)) {
          return createResultFromError(toPipelineError(error), { ...base, durationMs, retryCount: request.attempt });
        }
        if (!shouldRetry(request, error.errorType)) {
          return createTimeoutResult({ ...base, timeoutMs: request.timeoutMs, durationMs, retryCount: request.attempt });
        }
        turn?.tracer.addEvent('retry', { attempt: request.attempt + 1, reason: 'timeout' }, span);
        this.log('WRN', request, `timed out after ${String(request.timeoutMs)}ms; retrying (${String(request.attempt + 1)}/${String(request.maxRetries)})`);
        request = nextAttempt(request);
      }
    }
  }

  private rejectInvalid(input: ToolInvocationInput, error: ValidationError, turn?: TurnContext): ToolExecutionResult {
    turn?.collector.recordError(error.errorType, error.message, { toolName: input.toolName });
    turn?.tracer.addEvent('validation_failed', { tool_name: input.toolName, issues: error.issues.join('; ') });
    this.onLog?.({
      timestamp: this.clock(),
      severity: 'WRN',
      type: 'pipeline',
      remoteIdentifier: `tool:${input.toolName}`,
      toolCallId: input.toolCallId,
      message: error.message,
    });
    return createResultFromError(error, { toolCallId: input.toolCallId, toolName: input.toolName, clock: this.clock });
  }

  private withDefaults(input: ToolInvocationInput): ToolInvocationInput {
    return {
      ...input,
      timeoutMs: input.timeoutMs ?? this.requestDefaults.timeoutMs,
      maxRetries: input.maxRetries ?? this.requestDefaults.maxRetries,
      retryOnTimeout: input.retryOnTimeout ?? this.requestDefaults.retryOnTimeout,
    };
  }

  private artifactSinkFor(request: ToolInvocationRequest): ArtifactStore | undefined {
    if (request.storageDir !== undefined) return this.artifactStoreFor(request.storageDir);
    return this.defaultArtifacts;
  }

  private artifactStoreFor(storageDir: string): ArtifactStore {
    const key = path.resolve(storageDir);
    const existing = this.artifactsByDir.get(key);
    if (existing !== undefined) return existing;
    const store = new ArtifactStore({ dir: key, clock: this.clock, onLog: this.onLog });
    this.artifactsByDir.set(key, store);
    return store;
  }

  private logLate(request: ToolInvocationRequest, settlement: LateSettlement): void {
    const detail = settlement.error !== undefined ? ` (${settlement.error})` : '';
    this.log('WRN', request, `late ${settlement.status} result discarded after ${String(settlement.timeoutMs)}ms deadline${detail}`, 'timeout');
  }

  private log(severity: LogEntry['severity'], request: ToolInvocationRequest, message: string, type: LogEntry['type'] = 'pipeline'): void {
    if (this.onLog === undefined) return;
    try {
      this.onLog({
        timestamp: this.clock(),
        severity,
        type,
        remoteIdentifier: `tool:${request.toolName}`,
        toolCallId: request.toolCallId,
        message,
        details: { attempt: request.attempt, cache_policy: request.cachePolicy },
      });
    } catch (error: unknown) {
      warn(`log sink failed: ${errorMessage(error)}`);
    }
  }
}
