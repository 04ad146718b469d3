import { systemClock, type Clock } from '../types.js';

import { cachePolicyTtlSeconds, type CachePolicy } from './cache-policy.js';
import type { PipelineError } from './errors.js';
import type { OutputLevel } from './output-level.js';

export interface ResultMetadata {
  cacheHit?: boolean;
  cachedAt?: number;
  originalToolCallId?: string;
  [key: string]: unknown;
}

/**
 * Single outcome shape for every tool call. `observation` is the only text the model sees.
 * Results never carry filesystem paths; offloaded payloads are referenced by `artifactId` only.
 */
export interface ToolExecutionResult {
  readonly toolCallId: string;
  readonly toolName: string;
  readonly observation: string;
  readonly outputLevel: OutputLevel;
  readonly success: boolean;
  readonly errorType?: string;
  readonly errorMessage?: string;
  readonly errorCode?: string;
  readonly lastError?: string;
  readonly artifactId?: string;
  readonly dataSizeBytes: number;
  readonly dataHash?: string;
  readonly durationMs: number;
  readonly retryCount: number;
  readonly cachePolicy: CachePolicy;
  readonly createdAt: number;
  /** Epoch ms; absent when the result never expires. */
  readonly expiresAt?: number;
  readonly metadata: Readonly<ResultMetadata>;
}

interface ResultBase {
  toolCallId: string;
  toolName: string;
  durationMs?: number;
  retryCount?: number;
  cachePolicy?: CachePolicy;
  metadata?: ResultMetadata;
  clock?: Clock;
}

export interface SuccessResultInput extends ResultBase {
  observation: string;
  outputLevel?: OutputLevel;
  artifactId?: string;
  dataSizeBytes?: number;
  dataHash?: string;
}

export interface ErrorResultInput extends ResultBase {
  errorMessage: string;
  errorType?: string;
  errorCode?: string;
}

export interface TimeoutResultInput extends ResultBase {
  timeoutMs: number;
}

function stamp(cachePolicy: CachePolicy, clock: Clock): { createdAt: number; expiresAt?: number } {
  const createdAt = clock();
  const ttl = cachePolicyTtlSeconds(cachePolicy);
  return ttl > 0 ? { createdAt, expiresAt: createdAt + ttl * 1000 } : { createdAt };
}

function finish(result: ToolExecutionResult): ToolExecutionResult {
  return Object.freeze(result);
}

export function createSuccessResult(input: SuccessResultInput): ToolExecutionResult {
  const cachePolicy = input.cachePolicy ?? 'no_cache';
  return finish({
    toolCallId: input.toolCallId,
    toolName: input.toolName,
    observation: input.observation,
    outputLevel: input.outputLevel ?? 'standard',
    success: true,
    artifactId: input.artifactId,
    dataSizeBytes: input.dataSizeBytes ?? 0,
    dataHash: input.dataHash,
    durationMs: input.durationMs ?? 0,
    retryCount: input.retryCount ?? 0,
    cachePolicy,
    ...stamp(cachePolicy, input.clock ?? systemClock),
    metadata: { ...input.metadata },
  });
}

export function createErrorResult(input: ErrorResultInput): ToolExecutionResult {
  const cachePolicy = input.cachePolicy ?? 'no_cache';
  return finish({
    toolCallId: input.toolCallId,
    toolName: input.toolName,
    observation: `Error: ${input.errorMessage}`,
    outputLevel: 'brief',
    success: false,
    errorType: input.errorType ?? 'tool_error',
    errorMessage: input.errorMessage,
    errorCode: input.errorCode,
    lastError: input.errorMessage,
    dataSizeBytes: 0,
    durationMs: input.durationMs ?? 0,
    retryCount: input.retryCount ?? 0,
    cachePolicy,
    ...stamp(cachePolicy, input.clock ?? systemClock),
    metadata: { ...input.metadata },
  });
}

export function createTimeoutResult(input: TimeoutResultInput): ToolExecutionResult {
  return createErrorResult({
    ...input,
    durationMs: input.durationMs ?? input.timeoutMs,
    errorMessage: `Tool execution timed out after ${String(input.timeoutMs)}ms`,
    errorType: 'timeout',
    errorCode: 'TIMEOUT',
  });
}

export function createResultFromError(error: PipelineError, base: ResultBase): ToolExecutionResult {
  return createErrorResult({
    ...base,
    errorMessage: error.message,
    errorType: error.errorType,
    errorCode: error.code,
  });
}

export function withMetadata(result: ToolExecutionResult, metadata: ResultMetadata): ToolExecutionResult {
  return finish({ ...result, metadata: { ...result.metadata, ...metadata } });
}

/** Cached results are replayed under the tool call id the model is waiting on. */
export function rebindToolCall(result: ToolExecutionResult, toolCallId: string): ToolExecutionResult {
  if (result.toolCallId === toolCallId) return result;
  return finish({
    ...result,
    toolCallId,
    metadata: { ...result.metadata, originalToolCallId: result.toolCallId },
  });
}

export interface ToolReplyMessage {
  role: 'tool';
  toolCallId: string;
  content: string;
}

export interface ToolResultBlock {
  type: 'tool_result';
  tool_use_id: string;
  content: string;
  is_error: boolean;
}

export function toToolMessage(result: ToolExecutionResult): ToolReplyMessage {
  return { role: 'tool', toolCallId: result.toolCallId, content: result.observation };
}

export function toLlmToolResultBlock(result: ToolExecutionResult): ToolResultBlock {
  return {
    type: 'tool_result',
    tool_use_id: result.toolCallId,
    content: result.observation,
    is_error: !result.success,
  };
}

export function serializeResult(result: ToolExecutionResult): Record<string, unknown> {
  return Object.fromEntries(Object.entries(result).filter(([, value]) => value !== undefined));
}
