import { describe, expect, it } from 'vitest';

import type { LogEntry } from '../../types.js';

import { encodeLogfmtValue } from '../../logging/logfmt.js';
import { createStructuredLogger } from '../../logging/structured-logger.js';

const T0 = 1_700_000_000_000;

const entry = (overrides: Partial<LogEntry> = {}): LogEntry => ({
  timestamp: T0,
  severity: 'WRN',
  type: 'pipeline',
  remoteIdentifier: 'tool:query_database',
  toolCallId: 'call_1',
  message: 'timed out after 100ms',
  details: { attempt: 1, cache_policy: 'ttl_short' },
  ...overrides,
});

const capture = (): { lines: string[]; write: (line: string) => void } => {
  const lines: string[] = [];
  return { lines, write: (line) => { lines.push(line); } };
};

describe('StructuredLogger', () => {
  it('writes logfmt with details and labels before the message', () => {
    const out = capture();
    const logger = createStructuredLogger({ format: 'logfmt', labels: { host: 'ci' }, logfmtWriter: out.write });
    logger.emit(entry());
    expect(out.lines).toEqual([
      'ts=2023-11-14T22:13:20.000Z level=wrn priority=4 type=pipeline remote=tool:query_database tool=query_database '
        + 'tool_call_id=call_1 attempt=1 cache_policy=ttl_short host=ci message="timed out after 100ms"\n',
    ]);
  });

  it('writes one JSON object per line', () => {
    const out = capture();
    createStructuredLogger({ format: 'json', jsonWriter: out.write }).emit(entry());
    expect(out.lines).toHaveLength(1);
    expect(out.lines[0].endsWith('\n')).toBe(true);
    expect(JSON.parse(out.lines[0])).toEqual({
      ts: '2023-11-14T22:13:20.000Z',
      timestamp: T0,
      severity: 'WRN',
      level: 'wrn',
      priority: 4,
      type: 'pipeline',
      remote: 'tool:query_database',
      tool: 'query_database',
      tool_call_id: 'call_1',
      details: { attempt: '1', cache_policy: 'ttl_short' },
      message: 'timed out after 100ms',
    });
  });

  it('writes console lines, with details when verbose', () => {
    const plain = capture();
    createStructuredLogger({ format: 'console', consoleWriter: plain.write }).emit(entry());
    expect(plain.lines).toEqual(['[WRN] tool:query_database: timed out after 100ms\n']);

    const verbose = capture();
    createStructuredLogger({ format: 'console', verbose: true, consoleWriter: verbose.write }).emit(entry());
    expect(verbose.lines).toEqual(['[WRN] tool:query_database: timed out after 100ms (attempt=1, cache_policy=ttl_short)\n']);
  });

  it('indents the stack of console errors', () => {
    const out = capture();
    createStructuredLogger({ format: 'console', consoleWriter: out.write }).emit(entry({
      severity: 'ERR',
      type: 'store',
      remoteIdentifier: 'store:traces',
      message: 'write failed',
      stack: 'Error: disk full\nat save',
    }));
    expect(out.lines).toEqual(['[ERR] store:traces: write failed\n    Error: disk full\n    at save\n']);
  });

  it('filters by minimum severity', () => {
    const out = capture();
    const logger = createStructuredLogger({ format: 'console', minSeverity: 'WRN', consoleWriter: out.write });
    logger.emit(entry({ severity: 'FIN', message: 'done' }));
    logger.emit(entry({ severity: 'ERR', message: 'broken' }));
    expect(out.lines).toEqual(['[ERR] tool:query_database: broken\n']);
  });

  it('drops trace lines by default and writes nothing for format none', () => {
    const out = capture();
    createStructuredLogger({ format: 'console', consoleWriter: out.write }).emit(entry({ severity: 'TRC' }));
    createStructuredLogger({ format: 'none', consoleWriter: out.write, logfmtWriter: out.write }).emit(entry());
    expect(out.lines).toEqual([]);
  });

  it('routes warn() messages through the logger', () => {
    const out = capture();
    const handler = createStructuredLogger({ format: 'console', consoleWriter: out.write }).warningHandler('artifact');
    handler('artifact payload missing');
    expect(out.lines).toEqual(['[WRN] toolrun: artifact payload missing\n']);
  });
});

describe('encodeLogfmtValue', () => {
  it('quotes only when needed and escapes quotes and newlines', () => {
    expect(encodeLogfmtValue('plain')).toBe('plain');
    expect(encodeLogfmtValue('')).toBe('""');
    expect(encodeLogfmtValue('a=b')).toBe('"a=b"');
    expect(encodeLogfmtValue('say "hi"')).toBe('"say \\"hi\\""');
    expect(encodeLogfmtValue('two\nlines')).toBe('"two\\nlines"');
  });
});
