import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { afterEach, describe, expect, it, vi } from 'vitest';

import type { LogEntry } from '../../types.js';

import { ArtifactStore } from '../../artifacts/artifact-store.js';
import { IdempotencyCache } from '../../cache/idempotency-cache.js';
import { TurnContext } from '../../monitoring/turn-context.js';
import { ToolPipeline } from '../../pipeline/executor.js';
import { sleep } from '../../utils.js';

const T0 = 1_700_000_000_000;

const manualClock = () => {
  let now = T0;
  return { now: () => now, advanceSeconds: (seconds: number) => { now += seconds * 1000; } };
};

const tempDirs: string[] = [];
const makeTempDir = (): string => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tool-pipeline-'));
  tempDirs.push(dir);
  return dir;
};

afterEach(() => {
  tempDirs.splice(0).forEach((dir) => { fs.rmSync(dir, { recursive: true, force: true }); });
});

describe('ToolPipeline caching', () => {
  it('serves query_database from cache for five minutes', async () => {
    const clock = manualClock();
    const pipeline = new ToolPipeline({ cache: new IdempotencyCache({ clock: clock.now }), clock: clock.now });
    const execute = vi.fn(() => ({ rows: [1, 2] }));
    const input = { toolName: 'query_database', parameters: { sql: 'SELECT 1' } };

    const first = await pipeline.invoke({ ...input, toolCallId: 'call_1' }, execute);
    expect(first.success).toBe(true);
    expect(first.cachePolicy).toBe('ttl_short');
    expect(first.metadata.cacheHit).toBe(false);
    expect(first.observation).toBe('{\n  "rows": [\n    1,\n    2\n  ]\n}');
    expect(first.expiresAt).toBe(T0 + 300_000);

    clock.advanceSeconds(200);
    const second = await pipeline.invoke({ ...input, toolCallId: 'call_2' }, execute);
    expect(execute).toHaveBeenCalledTimes(1);
    expect(second.metadata.cacheHit).toBe(true);
    expect(second.toolCallId).toBe('call_2');
    expect(second.metadata.originalToolCallId).toBe('call_1');
    expect(second.observation).toBe(first.observation);

    clock.advanceSeconds(101);
    const third = await pipeline.invoke({ ...input, toolCallId: 'call_3' }, execute);
    expect(execute).toHaveBeenCalledTimes(2);
    expect(third.metadata.cacheHit).toBe(false);
  });

  it('executes side-effecting tools every time', async () => {
    const pipeline = new ToolPipeline({ cache: new IdempotencyCache() });
    const execute = vi.fn(() => 'written');
    await pipeline.invoke({ toolCallId: 'a', toolName: 'file_write', parameters: { path: 'x' } }, execute);
    await pipeline.invoke({ toolCallId: 'b', toolName: 'file_write', parameters: { path: 'x' } }, execute);
    expect(execute).toHaveBeenCalledTimes(2);
  });

  it('does not cache failures', async () => {
    const pipeline = new ToolPipeline({ cache: new IdempotencyCache() });
    const execute = vi.fn(() => { throw new Error('db down'); });
    const result = await pipeline.invoke({ toolCallId: 'a', toolName: 'query_database' }, execute);
    await pipeline.invoke({ toolCallId: 'b', toolName: 'query_database' }, execute);
    expect(execute).toHaveBeenCalledTimes(2);
    expect(result.success).toBe(false);
    expect(result.errorType).toBe('Error');
    expect(result.errorCode).toBe('TOOL_ERROR');
    expect(result.observation).toBe('Error: db down');
  });

  it('passes the parameters through to the tool', async () => {
    const pipeline = new ToolPipeline();
    const execute = vi.fn((params: Readonly<Record<string, unknown>>) => params.q);
    const result = await pipeline.invoke({ toolCallId: 'a', toolName: 'web_search', parameters: { q: 'weather' } }, execute);
    expect(result.observation).toBe('weather');
  });
});

describe('ToolPipeline validation and timeouts', () => {
  it('returns a validation result without running the tool', async () => {
    const pipeline = new ToolPipeline();
    const execute = vi.fn(() => 'never');
    const result = await pipeline.invoke({ toolCallId: '', toolName: 'web_search' }, execute);
    expect(execute).not.toHaveBeenCalled();
    expect(result.success).toBe(false);
    expect(result.errorType).toBe('validation');
    expect(result.errorCode).toBe('VALIDATION');
    expect(result.errorMessage).toBe('Invalid tool invocation request: toolCallId: toolCallId must be a non-empty string');
  });

  it('retries a timed-out call and reports the final timeout', async () => {
    const logs: LogEntry[] = [];
    const pipeline = new ToolPipeline({ onLog: (entry) => { logs.push(entry); } });
    const execute = vi.fn(async () => {
      await sleep(250);
      return 'late';
    });
    const result = await pipeline.invoke({ toolCallId: 'slow', toolName: 'web_search', timeoutMs: 100, maxRetries: 1 }, execute);
    expect(execute).toHaveBeenCalledTimes(2);
    expect(result.success).toBe(false);
    expect(result.errorType).toBe('timeout');
    expect(result.errorMessage).toBe('Tool execution timed out after 100ms');
    expect(result.retryCount).toBe(1);
    expect(logs.filter((entry) => entry.message.startsWith('timed out after 100ms; retrying (1/1)'))).toHaveLength(1);
  });

  it('does not retry when retries are disabled', async () => {
    const pipeline = new ToolPipeline();
    const execute = vi.fn(async () => { await sleep(200); });
    const result = await pipeline.invoke({ toolCallId: 'slow', toolName: 'web_search', timeoutMs: 100, retryOnTimeout: false }, execute);
    expect(execute).toHaveBeenCalledTimes(1);
    expect(result.retryCount).toBe(0);
  });

  it('recovers when a retry finishes in time', async () => {
    const pipeline = new ToolPipeline();
    let calls = 0;
    const result = await pipeline.invoke({ toolCallId: 'flaky', toolName: 'web_search', timeoutMs: 100 }, async () => {
      calls += 1;
      if (calls === 1) await sleep(200);
      return 'ok';
    });
    expect(result.success).toBe(true);
    expect(result.observation).toBe('ok');
    expect(result.retryCount).toBe(1);
  });
});

describe('ToolPipeline tracing', () => {
  it('opens a tool_call span per invocation and marks cache hits', async () => {
    const clock = manualClock();
    const turn = new TurnContext({ conversationId: 'conv-1', sessionId: 'sess-1', clock: clock.now });
    const root = turn.tracer.createRootSpan('turn');
    const pipeline = new ToolPipeline({ cache: new IdempotencyCache({ clock: clock.now }), clock: clock.now });
    const execute = () => ({ answer: 42 });

    await pipeline.invoke({ toolCallId: 'c1', toolName: 'vector_search', parameters: { q: 'x' } }, execute, turn);
    await pipeline.invoke({ toolCallId: 'c2', toolName: 'vector_search', parameters: { q: 'x' } }, execute, turn);

    const spans = root?.children ?? [];
    expect(spans.map((span) => [span.name, span.spanType, span.status])).toEqual([
      ['tool:vector_search', 'tool_call', 'success'],
      ['tool:vector_search', 'tool_call', 'success'],
    ]);
    expect(spans[0].attributes.tool_call_id).toBe('c1');
    expect(spans[0].attributes.cache_hit).toBe(false);
    expect(spans[1].attributes.cache_hit).toBe(true);
    expect(spans[1].events.map((event) => event.name)).toEqual(['cache_hit']);
    expect(turn.tracer.activeSpan).toBe(root);

    const metrics = turn.collector.getMetrics();
    expect(metrics.toolCallsCount).toBe(2);
    expect(metrics.toolCallsByName.vector_search.successCount).toBe(2);
  });

  it('keeps parallel tool calls as siblings under the active span', async () => {
    const turn = new TurnContext({ conversationId: 'conv-1', sessionId: 'sess-1' });
    const root = turn.tracer.createRootSpan('turn');
    const pipeline = new ToolPipeline();
    const slowThen = (ms: number, value: string) => async () => { await sleep(ms); return value; };

    await Promise.all([
      pipeline.invoke({ toolCallId: 'a', toolName: 'api_get' }, slowThen(30, 'a'), turn),
      pipeline.invoke({ toolCallId: 'b', toolName: 'api_get' }, slowThen(10, 'b'), turn),
    ]);
    await pipeline.invoke({ toolCallId: 'c', toolName: 'api_get' }, () => 'c', turn);

    const children = root?.children ?? [];
    expect(children.map((span) => span.attributes.tool_call_id)).toEqual(['a', 'b', 'c']);
    expect(children.map((span) => span.children.length)).toEqual([0, 0, 0]);
    expect(children.every((span) => span.parentSpanId === root?.spanId)).toBe(true);
    expect(turn.tracer.activeSpan).toBe(root);
  });

  it('records failed calls as errors on the turn', async () => {
    const turn = new TurnContext({ conversationId: 'conv-1', sessionId: 'sess-1' });
    const root = turn.tracer.createRootSpan('turn');
    const pipeline = new ToolPipeline();
    await pipeline.invoke({ toolCallId: 'c1', toolName: 'api_post' }, () => { throw new TypeError('bad body'); }, turn);
    expect(root?.children[0].status).toBe('error');
    expect(root?.children[0].attributes.error_type).toBe('TypeError');
    const metrics = turn.collector.getMetrics();
    expect(metrics.toolErrors).toBe(1);
    expect(metrics.metadata.errors?.map((error) => [error.errorType, error.message])).toEqual([['TypeError', 'bad body']]);
  });
});

describe('ToolPipeline artifacts', () => {
  it('offloads large output and resolves it by id', async () => {
    const storageDir = makeTempDir();
    const pipeline = new ToolPipeline({ artifactThresholdBytes: 10 });
    const rows = [1, 2, 3, 4, 5];
    const result = await pipeline.invoke({
      toolCallId: 'c1', toolName: 'export_rows', outputLevel: 'full', storageDir,
    }, () => rows);
    expect(result.success).toBe(true);
    expect(result.artifactId).toMatch(/^artifact_[0-9a-f]{16}$/);
    expect(result.observation).toContain(`Data stored as artifact: ${String(result.artifactId)}`);
    expect(result.observation).not.toContain(storageDir);

    const resolved = await pipeline.resolveArtifact('c2', String(result.artifactId), storageDir);
    expect(resolved.success).toBe(true);
    expect(resolved.observation).toBe('List of 5 items\nFirst item: 1');
  });

  it('shares one store between the default and a matching storageDir', async () => {
    const storageDir = makeTempDir();
    const pipeline = new ToolPipeline({ artifactStore: new ArtifactStore({ dir: storageDir }), artifactThresholdBytes: 10 });
    const offload = async (toolCallId: string, rows: number[], dir?: string): Promise<string> => {
      const result = await pipeline.invoke({ toolCallId, toolName: 'export_rows', outputLevel: 'full', storageDir: dir }, () => rows);
      return String(result.artifactId);
    };

    const ids = [
      await offload('c1', [1, 2, 3, 4, 5]),
      await offload('c2', [6, 7, 8, 9, 10], storageDir),
      await offload('c3', [11, 12, 13, 14, 15]),
    ];
    const reopened = new ArtifactStore({ dir: storageDir });
    expect((await reopened.listArtifacts()).map((entry) => entry.artifactId).sort()).toEqual([...ids].sort());
  });

  it('turns bad or unknown ids into error results', async () => {
    const storageDir = makeTempDir();
    const pipeline = new ToolPipeline();
    const traversal = await pipeline.resolveArtifact('c1', '../etc/passwd', storageDir);
    expect(traversal.success).toBe(false);
    expect(traversal.errorType).toBe('security');
    const unknown = await pipeline.resolveArtifact('c2', 'artifact_0000000000000000', storageDir);
    expect(unknown.errorType).toBe('not_found');
    expect(unknown.errorMessage).toBe('Artifact not found: artifact_0000000000000000');
  });

  it('needs a storage location to resolve artifacts', async () => {
    const result = await new ToolPipeline().resolveArtifact('c1', 'artifact_0000000000000000');
    expect(result.errorMessage).toBe('No artifact storage configured');
  });
});
