import type { ToolExecutionResult } from '../pipeline/result.js';

import { TimeoutError, toPipelineError } from '../pipeline/errors.js';
import { createResultFromError, createSuccessResult, createTimeoutResult } from '../pipeline/result.js';
import { systemClock, type Clock } from '../types.js';
import { errorMessage, isPlainObject, warn } from '../utils.js';

import type { CachePolicy } from '../pipeline/cache-policy.js';

/**
 * Tool body. The signal aborts at the deadline; I/O that honours it stops early,
 * anything else keeps running and its eventual outcome is only logged.
 */
export type IsolatedFn<T> = (signal: AbortSignal) => Promise<T> | T;

export interface LateSettlement {
  label: string;
  timeoutMs: number;
  status: 'fulfilled' | 'rejected';
  error?: string;
}

export interface ExecuteWithTimeoutOptions {
  label?: string;
  onLateSettle?: (settlement: LateSettlement) => void;
}

const reportLate = (settlement: LateSettlement, opts: ExecuteWithTimeoutOptions): void => {
  if (opts.onLateSettle !== undefined) {
    try {
      opts.onLateSettle(settlement);
    } catch (error: unknown) {
      warn(`late settlement handler failed: ${errorMessage(error)}`);
    }
    return;
  }
  const suffix = settlement.error !== undefined ? `: ${settlement.error}` : '';
  warn(`${settlement.label} settled (${settlement.status}) after its ${String(settlement.timeoutMs)}ms deadline; outcome discarded${suffix}`);
};

/**
 * Resolves with `fn`'s value or rejects with its error, whichever comes first against
 * the deadline; rejects with TimeoutError when the deadline wins.
 */
export async function executeWithTimeout<T>(fn: IsolatedFn<T>, timeoutMs: number, opts: ExecuteWithTimeoutOptions = {}): Promise<T> {
  const label = opts.label ?? 'tool call';
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new RangeError(`timeoutMs must be a positive number, got ${String(timeoutMs)}`);
  }
  const controller = new AbortController();
  const work = Promise.resolve().then(() => fn(controller.signal));
  let timer: ReturnType<typeof setTimeout> | undefined;
  let timedOut = false;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      timedOut = true;
      const error = new TimeoutError(`Tool execution for ${label} timed out after ${String(timeoutMs)}ms`, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([work, deadline]);
  } finally {
    if (timer !== undefined) clearTimeout(timer);
    if (timedOut) {
      void work.then(
        () => { reportLate({ label, timeoutMs, status: 'fulfilled' }, opts); },
        (error: unknown) => { reportLate({ label, timeoutMs, status: 'rejected', error: errorMessage(error) }, opts); },
      );
    }
  }
}

/** One-line success summary for callers that want no output shaping. */
export function formatExecutionValue(value: unknown): string {
  if (value === null || value === undefined) return 'Success (no output)';
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) return `Success: ${String(value.length)} items returned`;
  if (isPlainObject(value)) return `Success: ${String(Object.keys(value).length)} fields returned`;
  return `Success: ${typeof value}`;
}

export interface SafeExecuteOptions extends ExecuteWithTimeoutOptions {
  toolCallId: string;
  toolName: string;
  timeoutMs: number;
  cachePolicy?: CachePolicy;
  clock?: Clock;
}

/** Never rejects: timeouts and thrown errors become error results. */
export async function safeExecute(fn: IsolatedFn<unknown>, opts: SafeExecuteOptions): Promise<ToolExecutionResult> {
  const clock = opts.clock ?? systemClock;
  const startedAt = clock();
  const base = {
    toolCallId: opts.toolCallId,
    toolName: opts.toolName,
    cachePolicy: opts.cachePolicy,
    clock,
  };
  try {
    const value = await executeWithTimeout(fn, opts.timeoutMs, {
      label: opts.label ?? opts.toolCallId,
      onLateSettle: opts.onLateSettle,
    });
    return createSuccessResult({
      ...base,
      observation: formatExecutionValue(value),
      durationMs: clock() - startedAt,
    });
  } catch (error: unknown) {
    const durationMs = clock() - startedAt;
    if (error instanceof TimeoutError) {
      return createTimeoutResult({ ...base, timeoutMs: error.timeoutMs, durationMs });
    }
    return createResultFromError(toPipelineError(error), { ...base, durationMs });
  }
}
