import type { LogEntry } from '../types.js';

export interface StructuredLogEvent {
  timestamp: number;
  isoTimestamp: string;
  severity: LogEntry['severity'];
  priority: number;
  message: string;
  type: LogEntry['type'];
  remoteIdentifier?: string;
  tool?: string;
  toolCallId?: string;
  conversationId?: string;
  sessionId?: string;
  details: Record<string, string>;
  labels: Record<string, string>;
  stack?: string;
}

const PRIORITY_BY_SEVERITY: Record<LogEntry['severity'], number> = {
  ERR: 3,
  WRN: 4,
  FIN: 5,
  VRB: 6,
  TRC: 7,
};

const RESERVED_LABEL_KEYS = new Set([
  'ts',
  'level',
  'priority',
  'type',
  'remote',
  'tool',
  'tool_call_id',
  'conversation',
  'session',
  'message',
]);

export interface BuildStructuredEventOptions {
  labels?: Record<string, string>;
}

export function buildStructuredLogEvent(
  entry: LogEntry,
  options: BuildStructuredEventOptions = {}
): StructuredLogEvent {
  const labels: Record<string, string> = {};
  Object.entries(options.labels ?? {}).forEach(([key, value]) => {
    if (RESERVED_LABEL_KEYS.has(key)) return;
    labels[key] = value;
  });

  const details: Record<string, string> = {};
  Object.entries(entry.details ?? {}).forEach(([key, value]) => {
    if (RESERVED_LABEL_KEYS.has(key)) return;
    details[key] = String(value);
  });

  const tool = entry.remoteIdentifier.startsWith('tool:')
    ? entry.remoteIdentifier.slice('tool:'.length)
    : undefined;

  return {
    timestamp: entry.timestamp,
    isoTimestamp: new Date(entry.timestamp).toISOString(),
    severity: entry.severity,
    priority: PRIORITY_BY_SEVERITY[entry.severity],
    message: entry.message,
    type: entry.type,
    remoteIdentifier: entry.remoteIdentifier.length > 0 ? entry.remoteIdentifier : undefined,
    tool: tool !== undefined && tool.length > 0 ? tool : undefined,
    toolCallId: entry.toolCallId,
    conversationId: entry.conversationId,
    sessionId: entry.sessionId,
    details,
    labels,
    stack: entry.stack,
  };
}
