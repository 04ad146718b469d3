// Main library exports for programmatic use
export { ToolPipeline } from './pipeline/executor.js';
export { ToolRuntime } from './runtime.js';
export { IdempotencyCache } from './cache/idempotency-cache.js';
export { TtlCache } from './cache/ttl-cache.js';
export { deriveIdempotencyKey } from './cache/idempotency-key.js';
export { ArtifactStore, formatArtifactObservation, summarizeArtifactData } from './artifacts/artifact-store.js';
export { artifactIdFor, isValidArtifactId, validateArtifactId } from './artifacts/artifact-id.js';
export { executeWithTimeout, safeExecute } from './timeout/isolator.js';
export { ExecutionTracer } from './monitoring/execution-tracer.js';
export { MetricsCollector } from './monitoring/metrics-collector.js';
export { TraceStore } from './monitoring/trace-store.js';
export { MetricsStore } from './monitoring/metrics-store.js';
export { MonitoringService, summarizePerformance } from './monitoring/monitoring-service.js';
export { TurnContext, TurnRegistry } from './monitoring/turn-context.js';
export { renderAsciiTree, renderMermaid } from './monitoring/trace-render.js';
export { estimateCostUsd, mergePriceTable } from './monitoring/pricing.js';
export { CACHE_POLICIES, ToolPolicyRegistry, cachePolicyTtlSeconds, isCacheable } from './pipeline/cache-policy.js';
export { OUTPUT_LEVELS, outputLevelFromSize, shouldUseArtifact } from './pipeline/output-level.js';
export { createToolInvocationRequest, shouldRetry } from './pipeline/request.js';
export {
  createErrorResult,
  createSuccessResult,
  createTimeoutResult,
  serializeResult,
  toLlmToolResultBlock,
  toToolMessage,
} from './pipeline/result.js';
export { buildResultFromRawData } from './pipeline/shaping.js';
export { PipelineError, SecurityError, TimeoutError, ToolError, ValidationError, toPipelineError } from './pipeline/errors.js';
export { StructuredLogger, createStructuredLogger } from './logging/structured-logger.js';
export { loadConfiguration, parseConfiguration, resolveStorageDir, resolveStorageLayout } from './config.js';
export { setWarningSink } from './utils.js';

// Type exports
export type { RequestDefaults, ToolFunction, ToolPipelineOptions } from './pipeline/executor.js';
export type { CleanupReport, CleanupRequest, RuntimeOptions } from './runtime.js';
export type { CachePolicy } from './pipeline/cache-policy.js';
export type { OutputLevel } from './pipeline/output-level.js';
export type { ToolInvocationInput, ToolInvocationRequest } from './pipeline/request.js';
export type { ResultMetadata, ToolExecutionResult } from './pipeline/result.js';
export type { ArtifactMetadata, ArtifactStats } from './artifacts/types.js';
export type { Span, SpanEvent, SpanStatus, SpanType } from './monitoring/span.js';
export type { Trace } from './monitoring/execution-tracer.js';
export type { AgentMetrics, ToolCallStats } from './monitoring/metrics-collector.js';
export type { Configuration, ConfigurationInput, StorageLayout } from './config.js';
export type { Clock, LogCallback, LogEntry, Outcome } from './types.js';
