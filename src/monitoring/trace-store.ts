import fs from 'node:fs';
import path from 'node:path';

import type { Trace } from './execution-tracer.js';
import type { SpanStatus } from './span.js';
import type { Database as SqliteDatabase, Statement as SqliteStatement } from 'better-sqlite3';

import { isMissingFileError, listStaleFiles, unlinkIfPresent, writeFileAtomic } from '../persistence.js';
import { systemClock, type Clock, type LogCallback } from '../types.js';
import { errorMessage, formatFileStamp, isPlainObject, sanitizeFileComponent, warn } from '../utils.js';

import { openIndexDatabase } from './sqlite.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const TRACE_FILE_PATTERN = /^trace_.+\.json$/;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS traces (
    trace_id TEXT PRIMARY KEY,
    conversation_id TEXT NOT NULL,
    session_id TEXT NOT NULL,
    start_time INTEGER NOT NULL,
    end_time INTEGER,
    duration_ms REAL,
    status TEXT NOT NULL,
    file_path TEXT NOT NULL,
    created_at INTEGER NOT NULL,
    model TEXT,
    total_tokens INTEGER NOT NULL DEFAULT 0,
    tool_calls_count INTEGER NOT NULL DEFAULT 0
  );
  CREATE INDEX IF NOT EXISTS idx_traces_conversation ON traces(conversation_id);
  CREATE INDEX IF NOT EXISTS idx_traces_session ON traces(session_id);
  CREATE INDEX IF NOT EXISTS idx_traces_start_time ON traces(start_time);
  CREATE INDEX IF NOT EXISTS idx_traces_created_at ON traces(created_at);
`;

interface TraceRow {
  trace_id: string;
  conversation_id: string;
  session_id: string;
  start_time: number;
  end_time: number | null;
  duration_ms: number | null;
  status: string;
  file_path: string;
  created_at: number;
  model: string | null;
  total_tokens: number;
  tool_calls_count: number;
}

interface ConversationRow {
  conversation_id: string;
  session_id: string;
  start_time: number;
  last_activity: number;
  total_duration_ms: number;
  trace_count: number;
  total_tokens: number;
  tool_calls: number;
}

export interface TraceRecord {
  traceId: string;
  conversationId: string;
  sessionId: string;
  startTime: number;
  endTime: number | null;
  durationMs: number | null;
  status: SpanStatus;
  createdAt: number;
  model: string | null;
  totalTokens: number;
  toolCallsCount: number;
}

export interface ConversationSummary {
  conversationId: string;
  sessionId: string;
  startTime: number;
  lastActivity: number;
  totalDurationMs: number;
  traceCount: number;
  totalTokens: number;
  toolCalls: number;
}

export interface TraceStoreOptions {
  dir: string;
  retentionDays?: number;
  clock?: Clock;
  onLog?: LogCallback;
}

const SPAN_STATUSES: readonly SpanStatus[] = ['success', 'error', 'cancelled', 'unknown'];

const toSpanStatus = (value: string): SpanStatus => SPAN_STATUSES.find((status) => status === value) ?? 'unknown';

const toRecord = (row: TraceRow): TraceRecord => ({
  traceId: row.trace_id,
  conversationId: row.conversation_id,
  sessionId: row.session_id,
  startTime: row.start_time,
  endTime: row.end_time,
  durationMs: row.duration_ms,
  status: toSpanStatus(row.status),
  createdAt: row.created_at,
  model: row.model,
  totalTokens: row.total_tokens,
  toolCallsCount: row.tool_calls_count,
});

export function isTraceDocument(value: unknown): value is Trace {
  if (!isPlainObject(value)) return false;
  const root = value.rootSpan;
  return typeof value.traceId === 'string'
    && typeof value.conversationId === 'string'
    && typeof value.sessionId === 'string'
    && typeof value.startTime === 'number'
    && isPlainObject(root)
    && typeof root.spanId === 'string'
    && Array.isArray(root.children);
}

/**
 * One JSON document per finalized turn plus a SQLite index for lookups by conversation,
 * session and time. File paths stay internal to the store.
 */
export class TraceStore {
  readonly dir: string;
  readonly retentionDays: number;
  private readonly clock: Clock;
  private readonly onLog?: LogCallback;
  private readonly db: SqliteDatabase;
  // Paths chosen by saves still writing; existsSync cannot see them yet
  private readonly reservedPaths = new Set<string>();
  private readonly upsertStmt: SqliteStatement<[Record<string, unknown>]>;
  private readonly byConversationStmt: SqliteStatement<[string, number], TraceRow>;
  private readonly bySessionStmt: SqliteStatement<[string, number], TraceRow>;
  private readonly byTimeRangeStmt: SqliteStatement<[number, number, number], TraceRow>;
  private readonly recentStmt: SqliteStatement<[number], TraceRow>;
  private readonly byIdStmt: SqliteStatement<[string], TraceRow>;
  private readonly olderThanStmt: SqliteStatement<[number], TraceRow>;
  private readonly deleteByIdStmt: SqliteStatement<[string]>;
  private readonly filePathsStmt: SqliteStatement<[], { file_path: string }>;
  private readonly conversationsStmt: SqliteStatement<[number], ConversationRow>;
  private readonly conversationsBySessionStmt: SqliteStatement<[string, number], ConversationRow>;

  constructor(opts: TraceStoreOptions) {
    this.dir = path.resolve(opts.dir);
    this.retentionDays = opts.retentionDays ?? 7;
    this.clock = opts.clock ?? systemClock;
    this.onLog = opts.onLog;
    this.db = openIndexDatabase(path.join(this.dir, 'trace_index.db'), SCHEMA);

    const columns = 'trace_id, conversation_id, session_id, start_time, end_time, duration_ms, status, file_path, created_at, model, total_tokens, tool_calls_count';
    this.upsertStmt = this.db.prepare<[Record<string, unknown>]>(`
      INSERT OR REPLACE INTO traces (${columns})
      VALUES (@trace_id, @conversation_id, @session_id, @start_time, @end_time, @duration_ms, @status, @file_path, @created_at, @model, @total_tokens, @tool_calls_count)
    `);
    this.byConversationStmt = this.db.prepare<[string, number], TraceRow>(
      `SELECT ${columns} FROM traces WHERE conversation_id = ? ORDER BY start_time DESC LIMIT ?`
    );
    this.bySessionStmt = this.db.prepare<[string, number], TraceRow>(
      `SELECT ${columns} FROM traces WHERE session_id = ? ORDER BY start_time DESC LIMIT ?`
    );
    this.byTimeRangeStmt = this.db.prepare<[number, number, number], TraceRow>(
      `SELECT ${columns} FROM traces WHERE start_time >= ? AND start_time <= ? ORDER BY start_time DESC LIMIT ?`
    );
    this.recentStmt = this.db.prepare<[number], TraceRow>(
      `SELECT ${columns} FROM traces ORDER BY start_time DESC LIMIT ?`
    );
    this.byIdStmt = this.db.prepare<[string], TraceRow>(`SELECT ${columns} FROM traces WHERE trace_id = ?`);
    this.olderThanStmt = this.db.prepare<[number], TraceRow>(`SELECT ${columns} FROM traces WHERE created_at < ?`);
    this.deleteByIdStmt = this.db.prepare<[string]>('DELETE FROM traces WHERE trace_id = ?');
    this.filePathsStmt = this.db.prepare<[], { file_path: string }>('SELECT file_path FROM traces');
    const conversationSelect = `
      SELECT conversation_id, session_id,
        MIN(start_time) AS start_time,
        MAX(start_time) AS last_activity,
        SUM(COALESCE(duration_ms, 0)) AS total_duration_ms,
        COUNT(*) AS trace_count,
        SUM(total_tokens) AS total_tokens,
        SUM(tool_calls_count) AS tool_calls
      FROM traces`;
    this.conversationsStmt = this.db.prepare<[number], ConversationRow>(
      `${conversationSelect} GROUP BY conversation_id, session_id ORDER BY last_activity DESC LIMIT ?`
    );
    this.conversationsBySessionStmt = this.db.prepare<[string, number], ConversationRow>(
      `${conversationSelect} WHERE session_id = ? GROUP BY conversation_id, session_id ORDER BY last_activity DESC LIMIT ?`
    );
  }

  async saveTrace(trace: Trace): Promise<TraceRecord> {
    const filePath = this.nextTracePath(trace.conversationId, trace.startTime);
    this.reservedPaths.add(filePath);
    try {
      await writeFileAtomic(filePath, JSON.stringify(trace, null, 2));
    } finally {
      this.reservedPaths.delete(filePath);
    }
    const row: TraceRow = {
      trace_id: trace.traceId,
      conversation_id: trace.conversationId,
      session_id: trace.sessionId,
      start_time: trace.startTime,
      end_time: trace.endTime,
      duration_ms: trace.totalDurationMs,
      status: trace.status,
      file_path: filePath,
      created_at: this.clock(),
      model: trace.metrics?.primaryModel ?? null,
      total_tokens: trace.metrics?.totalTokens ?? 0,
      tool_calls_count: trace.metrics?.toolCallsCount ?? 0,
    };
    this.upsertStmt.run({ ...row });
    this.onLog?.({
      timestamp: this.clock(),
      severity: 'VRB',
      type: 'store',
      remoteIdentifier: 'store:traces',
      conversationId: trace.conversationId,
      sessionId: trace.sessionId,
      message: `saved trace ${trace.traceId}`,
    });
    return toRecord(row);
  }

  /** Most recent trace for the conversation. */
  async loadTrace(conversationId: string): Promise<Trace | undefined> {
    const row = this.byConversationStmt.get(conversationId, 1);
    return row !== undefined ? await this.readTraceFile(row) : undefined;
  }

  async loadTraceById(traceId: string): Promise<Trace | undefined> {
    const row = this.byIdStmt.get(traceId);
    return row !== undefined ? await this.readTraceFile(row) : undefined;
  }

  byConversation(conversationId: string, limit = 100): TraceRecord[] {
    return this.byConversationStmt.all(conversationId, limit).map(toRecord);
  }

  bySession(sessionId: string, limit = 100): TraceRecord[] {
    return this.bySessionStmt.all(sessionId, limit).map(toRecord);
  }

  byTimeRange(startTime: number, endTime: number, limit = 1000): TraceRecord[] {
    return this.byTimeRangeStmt.all(startTime, endTime, limit).map(toRecord);
  }

  recent(limit = 100): TraceRecord[] {
    return this.recentStmt.all(limit).map(toRecord);
  }

  listConversations(sessionId?: string, limit = 50): ConversationSummary[] {
    const rows = typeof sessionId === 'string' && sessionId.length > 0
      ? this.conversationsBySessionStmt.all(sessionId, limit)
      : this.conversationsStmt.all(limit);
    return rows.map((row) => ({
      conversationId: row.conversation_id,
      sessionId: row.session_id,
      startTime: row.start_time,
      lastActivity: row.last_activity,
      totalDurationMs: row.total_duration_ms,
      traceCount: row.trace_count,
      totalTokens: row.total_tokens,
      toolCalls: row.tool_calls,
    }));
  }

  /**
   * Drops index rows created more than `days` ago together with their files, then removes
   * stale trace files no row points at (left behind by earlier partial cleanups).
   */
  async cleanupOldTraces(days = this.retentionDays): Promise<number> {
    const cutoff = this.clock() - days * DAY_MS;
    const expired = this.olderThanStmt.all(cutoff);
    await Promise.all(expired.map(async (row) => {
      try {
        await unlinkIfPresent(row.file_path);
      } catch (error: unknown) {
        warn(`trace file removal failed for ${row.trace_id}: ${errorMessage(error)}`);
      }
    }));
    this.db.transaction(() => {
      expired.forEach((row) => this.deleteByIdStmt.run(row.trace_id));
    })();

    const referenced = new Set(this.filePathsStmt.all().map((row) => row.file_path));
    const stale = await listStaleFiles(this.dir, TRACE_FILE_PATTERN, cutoff);
    await Promise.all(stale.filter((file) => !referenced.has(file)).map(async (file) => {
      try {
        await unlinkIfPresent(file);
      } catch (error: unknown) {
        warn(`orphaned trace file removal failed for ${path.basename(file)}: ${errorMessage(error)}`);
      }
    }));
    return expired.length;
  }

  close(): void {
    this.db.close();
  }

  private nextTracePath(conversationId: string, startTime: number): string {
    const stem = `trace_${sanitizeFileComponent(conversationId)}_${formatFileStamp(startTime)}`;
    let candidate = path.join(this.dir, `${stem}.json`);
    let suffix = 2;
    while (this.reservedPaths.has(candidate) || fs.existsSync(candidate)) {
      candidate = path.join(this.dir, `${stem}_${String(suffix)}.json`);
      suffix += 1;
    }
    return candidate;
  }

  private async readTraceFile(row: TraceRow): Promise<Trace | undefined> {
    try {
      const parsed: unknown = JSON.parse(await fs.promises.readFile(row.file_path, 'utf8'));
      if (isTraceDocument(parsed)) return parsed;
      warn(`trace file for ${row.trace_id} is not a trace document`);
      return undefined;
    } catch (error: unknown) {
      if (!isMissingFileError(error)) warn(`trace file for ${row.trace_id} could not be read: ${errorMessage(error)}`);
      return undefined;
    }
  }
}
