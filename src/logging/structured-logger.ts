import type { LogEntry } from '../types.js';

import { formatConsole } from './console-format.js';
import { formatLogfmt } from './logfmt.js';
import { buildStructuredLogEvent, type StructuredLogEvent } from './structured-log-event.js';

export type LogFormat = 'logfmt' | 'json' | 'console' | 'none';

export interface StructuredLoggerOptions {
  format?: LogFormat;
  labels?: Record<string, string>;
  color?: boolean;
  verbose?: boolean;
  minSeverity?: LogEntry['severity'];
  logfmtWriter?: (line: string) => void;
  jsonWriter?: (line: string) => void;
  consoleWriter?: (line: string) => void;
}

const SEVERITY_RANK: Record<LogEntry['severity'], number> = {
  ERR: 0,
  WRN: 1,
  FIN: 2,
  VRB: 3,
  TRC: 4,
};

export class StructuredLogger {
  private readonly labels: Record<string, string>;
  private readonly sinks: ((event: StructuredLogEvent) => void)[] = [];
  private readonly maxRank: number;

  constructor(options: StructuredLoggerOptions = {}) {
    this.labels = options.labels ?? {};
    this.maxRank = SEVERITY_RANK[options.minSeverity ?? 'VRB'];
    const color = options.color ?? false;
    const format = options.format ?? 'logfmt';

    if (format === 'logfmt') {
      const writer = options.logfmtWriter ?? defaultWriter;
      this.sinks.push((event) => {
        writer(`${formatLogfmt(event, { color })}\n`);
      });
    }
    if (format === 'json') {
      const writer = options.jsonWriter ?? defaultWriter;
      this.sinks.push((event) => {
        writer(`${JSON.stringify(buildJsonPayload(event))}\n`);
      });
    }
    if (format === 'console') {
      const writer = options.consoleWriter ?? defaultWriter;
      const verbose = options.verbose ?? false;
      this.sinks.push((event) => {
        writer(`${formatConsole(event, { verbose })}\n`);
      });
    }
  }

  emit(entry: LogEntry): void {
    if (SEVERITY_RANK[entry.severity] > this.maxRank) return;
    const event = buildStructuredLogEvent(entry, { labels: this.labels });
    this.sinks.forEach((sink) => {
      sink(event);
    });
  }

  // Adapter for the process-wide warn() sink
  warningHandler(type: LogEntry['type'] = 'pipeline'): (message: string) => void {
    return (message: string) => {
      this.emit({
        timestamp: Date.now(),
        severity: 'WRN',
        type,
        remoteIdentifier: 'toolrun',
        message,
      });
    };
  }
}

export function createStructuredLogger(options: StructuredLoggerOptions): StructuredLogger {
  return new StructuredLogger(options);
}

function defaultWriter(line: string): void {
  try {
    process.stderr.write(line);
  } catch {
    // ignore
  }
}

function buildJsonPayload(event: StructuredLogEvent): Record<string, unknown> {
  const entries: [string, unknown][] = [];
  const push = (key: string, value: unknown): void => {
    if (value === undefined) return;
    entries.push([key, value]);
  };

  push('ts', event.isoTimestamp);
  push('timestamp', event.timestamp);
  push('severity', event.severity);
  push('level', event.severity.toLowerCase());
  push('priority', event.priority);
  push('type', event.type);
  push('remote', event.remoteIdentifier);
  push('tool', event.tool);
  push('tool_call_id', event.toolCallId);
  push('conversation', event.conversationId);
  push('session', event.sessionId);
  if (Object.keys(event.details).length > 0) push('details', event.details);
  if (Object.keys(event.labels).length > 0) push('labels', event.labels);

  entries.push(['message', event.message]);

  return Object.fromEntries(entries);
}
