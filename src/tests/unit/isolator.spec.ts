import { afterEach, describe, expect, it } from 'vitest';

import type { LateSettlement } from '../../timeout/isolator.js';

import { TimeoutError } from '../../pipeline/errors.js';
import { executeWithTimeout, formatExecutionValue, safeExecute } from '../../timeout/isolator.js';
import { setWarningSink, sleep } from '../../utils.js';

const delayed = <T>(ms: number, value: T) => async (): Promise<T> => {
  await sleep(ms);
  return value;
};

afterEach(() => {
  setWarningSink(undefined);
});

describe('executeWithTimeout', () => {
  it('returns the value when the function finishes first', async () => {
    await expect(executeWithTimeout(delayed(50, 'done'), 100)).resolves.toBe('done');
  });

  it('rejects with TimeoutError when the deadline passes', async () => {
    const pending = executeWithTimeout(delayed(200, 'late'), 100, { label: 'slow_tool' });
    await expect(pending).rejects.toBeInstanceOf(TimeoutError);
    await expect(pending).rejects.toThrow('Tool execution for slow_tool timed out after 100ms');
  });

  it('gives up close to the deadline on a hung call', async () => {
    const startedAt = Date.now();
    const hung = (signal: AbortSignal) => new Promise<string>((resolve) => {
      signal.addEventListener('abort', () => { resolve('ignored'); });
    });
    await expect(executeWithTimeout(hung, 100)).rejects.toBeInstanceOf(TimeoutError);
    const elapsed = Date.now() - startedAt;
    expect(elapsed).toBeGreaterThanOrEqual(95);
    expect(elapsed).toBeLessThan(180);
  });

  it('propagates errors thrown by the function', async () => {
    await expect(executeWithTimeout(() => { throw new RangeError('bad'); }, 100)).rejects.toThrow('bad');
  });

  it('aborts the signal at the deadline', async () => {
    let seen: AbortSignal | undefined;
    await expect(executeWithTimeout(async (signal) => {
      seen = signal;
      await sleep(200);
    }, 100)).rejects.toBeInstanceOf(TimeoutError);
    expect(seen?.aborted).toBe(true);
  });

  it('reports a late settlement instead of delivering it', async () => {
    const late: LateSettlement[] = [];
    await expect(executeWithTimeout(delayed(150, 'late'), 100, {
      label: 'slow_tool',
      onLateSettle: (settlement) => { late.push(settlement); },
    })).rejects.toBeInstanceOf(TimeoutError);
    await sleep(100);
    expect(late).toEqual([{ label: 'slow_tool', timeoutMs: 100, status: 'fulfilled' }]);
  });

  it('refuses non-positive timeouts', async () => {
    await expect(executeWithTimeout(() => 1, 0)).rejects.toBeInstanceOf(RangeError);
  });
});

describe('safeExecute', () => {
  const clock = (() => {
    let now = 0;
    return () => { now += 10; return now; };
  })();

  it('wraps success in a result', async () => {
    const result = await safeExecute(delayed(10, { rows: 2, cols: 3 }), {
      toolCallId: 'c1', toolName: 'query_database', timeoutMs: 100, clock,
    });
    expect(result.success).toBe(true);
    expect(result.observation).toBe('Success: 2 fields returned');
    expect(result.durationMs).toBe(10);
  });

  it('turns a timeout into a timeout result', async () => {
    const result = await safeExecute(delayed(200, null), { toolCallId: 'c2', toolName: 'web_search', timeoutMs: 100 });
    expect(result.success).toBe(false);
    expect(result.errorType).toBe('timeout');
    expect(result.errorCode).toBe('TIMEOUT');
    expect(result.errorMessage).toBe('Tool execution timed out after 100ms');
    expect(result.observation).toBe('Error: Tool execution timed out after 100ms');
  });

  it('turns a thrown error into an error result named after it', async () => {
    const result = await safeExecute(() => { throw new TypeError('wrong type'); }, {
      toolCallId: 'c3', toolName: 'analyze_data', timeoutMs: 100,
    });
    expect(result.success).toBe(false);
    expect(result.errorType).toBe('TypeError');
    expect(result.errorMessage).toBe('wrong type');
    expect(result.lastError).toBe('wrong type');
    expect(result.outputLevel).toBe('brief');
  });
});

describe('formatExecutionValue', () => {
  it('summarizes by shape', () => {
    expect(formatExecutionValue(undefined)).toBe('Success (no output)');
    expect(formatExecutionValue('text')).toBe('text');
    expect(formatExecutionValue([1, 2])).toBe('Success: 2 items returned');
    expect(formatExecutionValue(7)).toBe('Success: number');
  });
});
