import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { parseConfiguration } from '../../config.js';
import { ToolRuntime } from '../../runtime.js';
import { sleep } from '../../utils.js';

const T0 = 1_700_000_000_000;

describe('ToolRuntime', () => {
  let dir: string;
  let runtime: ToolRuntime | undefined;

  const build = (overrides: Record<string, unknown> = {}): ToolRuntime => {
    const config = parseConfiguration({
      storageDir: dir,
      toolPolicies: { web_search: 'no_cache' },
      timeouts: { defaultMs: 100, maxRetries: 0 },
      artifacts: { inlineThresholdBytes: 10 },
      pricing: { 'test-model': { input: 1, output: 2 } },
      ...overrides,
    }, 'test', {});
    runtime = new ToolRuntime(config, { env: {}, clock: () => T0 });
    return runtime;
  };

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'toolrun-runtime-'));
  });

  afterEach(() => {
    runtime?.close();
    runtime = undefined;
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('lays the stores out under the storage directory', () => {
    const rt = build();
    expect(rt.layout.tracesDir).toBe(path.join(dir, 'monitoring', 'traces'));
    expect(fs.existsSync(path.join(dir, 'monitoring', 'traces', 'trace_index.db'))).toBe(true);
    expect(fs.existsSync(path.join(dir, 'monitoring', 'metrics', 'metrics_index.db'))).toBe(true);
  });

  it('applies configured tool policies', async () => {
    const rt = build();
    const execute = vi.fn(() => 'results');
    await rt.pipeline.invoke({ toolCallId: 'a', toolName: 'web_search', parameters: { q: 'x' } }, execute);
    await rt.pipeline.invoke({ toolCallId: 'b', toolName: 'web_search', parameters: { q: 'x' } }, execute);
    expect(execute).toHaveBeenCalledTimes(2);
  });

  it('applies configured timeouts to invocations that set none', async () => {
    const rt = build();
    const execute = vi.fn(async () => { await sleep(250); });
    const result = await rt.pipeline.invoke({ toolCallId: 'a', toolName: 'api_post' }, execute);
    expect(execute).toHaveBeenCalledTimes(1);
    expect(result.errorMessage).toBe('Tool execution timed out after 100ms');
    expect(result.retryCount).toBe(0);
  });

  it('offloads past the configured threshold into the configured store', async () => {
    const rt = build();
    const result = await rt.pipeline.invoke({ toolCallId: 'a', toolName: 'export_rows', outputLevel: 'full' }, () => [1, 2, 3, 4, 5]);
    expect(result.artifactId).toBeDefined();
    const stored = await rt.artifacts.retrieve(String(result.artifactId));
    expect(stored).toEqual({ ok: true, value: [1, 2, 3, 4, 5] });
  });

  it('persists completed turns with configured prices', async () => {
    const rt = build();
    const turn = rt.openTurn('conv-1', 'sess-1');
    expect(rt.openTurn('conv-1', 'sess-1')).toBe(turn);
    turn.tracer.createRootSpan('turn');
    turn.collector.recordLLMCall('test-model', 1_000_000, 500_000, 10);
    await rt.pipeline.invoke({ toolCallId: 'a', toolName: 'api_post' }, () => ({ success: true }), turn);

    const completed = await rt.completeTurn('conv-1');
    expect(completed?.persisted).toEqual({ trace: true, metrics: true });
    expect(completed?.metrics.estimatedCostUsd).toBe(2);
    expect(rt.turns.size).toBe(0);
    expect(rt.monitoring.listConversations().map((row) => [row.conversationId, row.toolCalls])).toEqual([['conv-1', 1]]);
  });

  it('records nothing when monitoring is disabled', async () => {
    const rt = build({ monitoring: { enabled: false } });
    const turn = rt.openTurn('conv-1', 'sess-1');
    expect(turn.tracer.createRootSpan('turn')).toBeNull();
    const completed = await rt.completeTurn('conv-1');
    expect(completed?.trace).toBeNull();
    expect(completed?.persisted).toEqual({ trace: false, metrics: false });
    expect(rt.monitoring.listConversations()).toEqual([]);
  });

  it('reports zero removals on an empty store', async () => {
    await expect(build().cleanup()).resolves.toEqual({ traces: 0, metrics: 0, artifacts: 0 });
  });
});
