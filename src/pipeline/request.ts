import { z } from 'zod';

import type { Outcome } from '../types.js';

import { deriveIdempotencyKey } from '../cache/idempotency-key.js';
import { fail, ok } from '../types.js';
import { truncate, tryJsonStringify } from '../utils.js';

import { CACHE_POLICIES, DEFAULT_CACHE_POLICY, type CachePolicy, type ToolPolicyRegistry } from './cache-policy.js';
import { ValidationError } from './errors.js';
import { OUTPUT_LEVELS, type OutputLevel } from './output-level.js';

export const MIN_TIMEOUT_MS = 100;
export const MAX_TIMEOUT_MS = 600_000;

const RequestInputSchema = z.object({
  toolCallId: z.string().refine((value) => value.trim().length > 0, { message: 'toolCallId must be a non-empty string' }),
  toolName: z.string().trim().min(1, 'toolName must be a non-empty string'),
  toolVersion: z.string().trim().min(1).default('1.0.0'),
  parameters: z.record(z.string(), z.unknown()).default({}),
  timeoutMs: z.number().int().min(MIN_TIMEOUT_MS).max(MAX_TIMEOUT_MS).default(30_000),
  maxRetries: z.number().int().min(0).max(10).default(3),
  retryOnTimeout: z.boolean().default(true),
  cachePolicy: z.enum(CACHE_POLICIES).optional(),
  outputLevel: z.enum(OUTPUT_LEVELS).optional(),
  callerId: z.string().trim().min(1).default('agent'),
  permissionLevel: z.string().trim().min(1).default('default'),
  storageDir: z.string().min(1).optional(),
  idempotencyKey: z.string().min(1).optional(),
});

export type ToolInvocationInput = z.input<typeof RequestInputSchema>;

export interface ToolInvocationRequest {
  readonly toolCallId: string;
  readonly toolName: string;
  readonly toolVersion: string;
  readonly parameters: Readonly<Record<string, unknown>>;
  readonly timeoutMs: number;
  readonly maxRetries: number;
  readonly retryOnTimeout: boolean;
  readonly cachePolicy: CachePolicy;
  readonly outputLevel?: OutputLevel;
  readonly callerId: string;
  readonly permissionLevel: string;
  readonly storageDir?: string;
  readonly idempotencyKey: string;
  /** 0 for the first try, incremented on every retry. */
  readonly attempt: number;
}

export interface CreateRequestOptions {
  policies?: ToolPolicyRegistry;
}

export function createToolInvocationRequest(
  input: ToolInvocationInput,
  opts: CreateRequestOptions = {}
): Outcome<ToolInvocationRequest, ValidationError> {
  const parsed = RequestInputSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.map((p) => String(p)).join('.')}: ${issue.message}`);
    return fail(new ValidationError(`Invalid tool invocation request: ${issues.join('; ')}`, issues));
  }
  const data = parsed.data;
  const cachePolicy = data.cachePolicy ?? opts.policies?.resolve(data.toolName) ?? DEFAULT_CACHE_POLICY;
  const derivedKey = deriveIdempotencyKey(data);
  if (derivedKey === undefined) {
    const issue = 'parameters: must be JSON-serializable (no cycles or bigint values)';
    return fail(new ValidationError(`Invalid tool invocation request: ${issue}`, [issue]));
  }
  const request: ToolInvocationRequest = {
    toolCallId: data.toolCallId,
    toolName: data.toolName,
    toolVersion: data.toolVersion,
    parameters: Object.freeze({ ...data.parameters }),
    timeoutMs: data.timeoutMs,
    maxRetries: data.maxRetries,
    retryOnTimeout: data.retryOnTimeout,
    cachePolicy,
    outputLevel: data.outputLevel,
    callerId: data.callerId,
    permissionLevel: data.permissionLevel,
    storageDir: data.storageDir,
    idempotencyKey: data.idempotencyKey ?? derivedKey,
    attempt: 0,
  };
  return ok(Object.freeze(request));
}

export function shouldRetry(request: ToolInvocationRequest, errorType: string | undefined): boolean {
  if (!request.retryOnTimeout) return false;
  if (errorType !== 'timeout') return false;
  return request.attempt < request.maxRetries;
}

/** Same call, next attempt: identical idempotency key and tool call id. */
export function nextAttempt(request: ToolInvocationRequest): ToolInvocationRequest {
  return Object.freeze({ ...request, attempt: request.attempt + 1 });
}

export function describeRequest(request: ToolInvocationRequest): Record<string, string | number | boolean> {
  const params = tryJsonStringify(request.parameters) ?? '[unserializable]';
  return {
    toolCallId: request.toolCallId,
    toolName: request.toolName,
    toolVersion: request.toolVersion,
    timeoutMs: request.timeoutMs,
    maxRetries: request.maxRetries,
    attempt: request.attempt,
    cachePolicy: request.cachePolicy,
    callerId: request.callerId,
    permissionLevel: request.permissionLevel,
    idempotencyKey: request.idempotencyKey,
    parameters: truncate(params, 200),
  };
}
