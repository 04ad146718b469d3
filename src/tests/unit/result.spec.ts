import { describe, expect, it } from 'vitest';

import {
  createErrorResult,
  createSuccessResult,
  createTimeoutResult,
  rebindToolCall,
  serializeResult,
  toLlmToolResultBlock,
  toToolMessage,
  withMetadata,
} from '../../pipeline/result.js';

const T0 = 1_700_000_000_000;
const clock = () => T0;

describe('tool results', () => {
  const success = createSuccessResult({
    toolCallId: 'call_1',
    toolName: 'vector_search',
    observation: 'Found 3 matches',
    cachePolicy: 'ttl_medium',
    dataSizeBytes: 42,
    clock,
  });

  it('stamps expiry from the cache policy and freezes the result', () => {
    expect(success.createdAt).toBe(T0);
    expect(success.expiresAt).toBe(T0 + 3_600_000);
    expect(Object.isFrozen(success)).toBe(true);
  });

  it('builds the tool reply message the model reads', () => {
    expect(toToolMessage(success)).toEqual({ role: 'tool', toolCallId: 'call_1', content: 'Found 3 matches' });
  });

  it('builds tool_result blocks flagged by outcome', () => {
    expect(toLlmToolResultBlock(success)).toEqual({
      type: 'tool_result',
      tool_use_id: 'call_1',
      content: 'Found 3 matches',
      is_error: false,
    });
    const failed = createTimeoutResult({ toolCallId: 'call_2', toolName: 'web_search', timeoutMs: 100, clock });
    expect(toLlmToolResultBlock(failed)).toEqual({
      type: 'tool_result',
      tool_use_id: 'call_2',
      content: 'Error: Tool execution timed out after 100ms',
      is_error: true,
    });
  });

  it('replays a result under a new call id and keeps the original', () => {
    const rebound = rebindToolCall(success, 'call_9');
    expect(toToolMessage(rebound).toolCallId).toBe('call_9');
    expect(rebound.metadata.originalToolCallId).toBe('call_1');
    expect(rebindToolCall(success, 'call_1')).toBe(success);
  });

  it('drops unset fields when serialized', () => {
    const failed = withMetadata(
      createErrorResult({ toolCallId: 'call_3', toolName: 'api_post', errorMessage: 'denied', errorType: 'permission', clock }),
      { attempt: 1 },
    );
    expect(serializeResult(failed)).toEqual({
      toolCallId: 'call_3',
      toolName: 'api_post',
      observation: 'Error: denied',
      outputLevel: 'brief',
      success: false,
      errorType: 'permission',
      errorMessage: 'denied',
      lastError: 'denied',
      dataSizeBytes: 0,
      durationMs: 0,
      retryCount: 0,
      cachePolicy: 'no_cache',
      createdAt: T0,
      metadata: { attempt: 1 },
    });
  });
});
