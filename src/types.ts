export type LogSeverity = 'ERR' | 'WRN' | 'FIN' | 'VRB' | 'TRC';

export type LogType = 'pipeline' | 'cache' | 'timeout' | 'artifact' | 'trace' | 'metrics' | 'store';

export interface LogEntry {
  timestamp: number;                    // Unix timestamp (ms)
  severity: LogSeverity;
  type: LogType;
  remoteIdentifier: string;             // e.g. 'tool:query_database' or 'store:traces'
  message: string;
  toolCallId?: string;
  conversationId?: string;
  sessionId?: string;
  details?: Record<string, string | number | boolean>;
  stack?: string;
}

export type LogCallback = (entry: LogEntry) => void;

export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export type Outcome<T, E> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export const ok = <T>(value: T): { ok: true; value: T } => ({ ok: true, value });

export const fail = <E>(error: E): { ok: false; error: E } => ({ ok: false, error });
