import fs from 'node:fs';
import path from 'node:path';

import type { AgentMetrics } from './metrics-collector.js';
import type { Database as SqliteDatabase, Statement as SqliteStatement } from 'better-sqlite3';

import { appendJsonLine, isMissingFileError, listStaleFiles, unlinkIfPresent } from '../persistence.js';
import { systemClock, type Clock } from '../types.js';
import { errorMessage, formatFileStamp, isPlainObject, sanitizeFileComponent, warn } from '../utils.js';

import { openIndexDatabase } from './sqlite.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const METRICS_FILE_PATTERN = /^metrics_.+\.jsonl$/;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS metrics (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    conversation_id TEXT NOT NULL,
    session_id TEXT NOT NULL,
    timestamp INTEGER NOT NULL,
    total_tokens INTEGER NOT NULL DEFAULT 0,
    total_duration_ms REAL NOT NULL DEFAULT 0,
    tool_calls_count INTEGER NOT NULL DEFAULT 0,
    estimated_cost_usd REAL NOT NULL DEFAULT 0,
    model TEXT,
    file_path TEXT NOT NULL,
    created_at INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_metrics_conversation ON metrics(conversation_id);
  CREATE INDEX IF NOT EXISTS idx_metrics_session ON metrics(session_id);
  CREATE INDEX IF NOT EXISTS idx_metrics_timestamp ON metrics(timestamp);
  CREATE INDEX IF NOT EXISTS idx_metrics_created_at ON metrics(created_at);
`;

interface AggregateRow {
  total_conversations: number;
  total_turns: number;
  total_tokens: number | null;
  total_duration_ms: number | null;
  total_tool_calls: number | null;
  total_cost_usd: number | null;
}

export interface AggregatedMetrics {
  totalConversations: number;
  totalTurns: number;
  totalTokens: number;
  totalDurationMs: number;
  totalToolCalls: number;
  totalCostUsd: number;
  avgTokensPerTurn: number;
  avgDurationMsPerTurn: number;
  avgCostUsdPerTurn: number;
}

export interface MetricsQuery {
  sessionId?: string;
  startTime?: number;
  endTime?: number;
}

export interface MetricsStoreOptions {
  dir: string;
  retentionDays?: number;
  clock?: Clock;
}

export function isAgentMetrics(value: unknown): value is AgentMetrics {
  return isPlainObject(value)
    && typeof value.conversationId === 'string'
    && typeof value.sessionId === 'string'
    && typeof value.timestamp === 'number'
    && typeof value.totalTokens === 'number'
    && isPlainObject(value.tokensByModel)
    && isPlainObject(value.toolCallsByName);
}

const inRange = (timestamp: number, startTime?: number, endTime?: number): boolean => (
  (startTime === undefined || timestamp >= startTime) && (endTime === undefined || timestamp <= endTime)
);

/**
 * Append-only JSON lines, one file per session per UTC day, indexed in SQLite so reads
 * only open the files that hold matching rows.
 */
export class MetricsStore {
  readonly dir: string;
  readonly retentionDays: number;
  private readonly clock: Clock;
  private readonly db: SqliteDatabase;
  private readonly insertStmt: SqliteStatement<[Record<string, unknown>]>;
  private readonly filesForConversationStmt: SqliteStatement<[string, number, number], { file_path: string }>;
  private readonly olderThanStmt: SqliteStatement<[number], { id: number; file_path: string }>;
  private readonly deleteOlderThanStmt: SqliteStatement<[number]>;
  private readonly filePathsStmt: SqliteStatement<[], { file_path: string }>;

  constructor(opts: MetricsStoreOptions) {
    this.dir = path.resolve(opts.dir);
    this.retentionDays = opts.retentionDays ?? 30;
    this.clock = opts.clock ?? systemClock;
    this.db = openIndexDatabase(path.join(this.dir, 'metrics_index.db'), SCHEMA);

    this.insertStmt = this.db.prepare<[Record<string, unknown>]>(`
      INSERT INTO metrics
      (conversation_id, session_id, timestamp, total_tokens, total_duration_ms, tool_calls_count, estimated_cost_usd, model, file_path, created_at)
      VALUES (@conversation_id, @session_id, @timestamp, @total_tokens, @total_duration_ms, @tool_calls_count, @estimated_cost_usd, @model, @file_path, @created_at)
    `);
    this.filesForConversationStmt = this.db.prepare<[string, number, number], { file_path: string }>(`
      SELECT DISTINCT file_path FROM metrics
      WHERE conversation_id = ? AND timestamp >= ? AND timestamp <= ?
    `);
    this.olderThanStmt = this.db.prepare<[number], { id: number; file_path: string }>(
      'SELECT id, file_path FROM metrics WHERE created_at < ?'
    );
    this.deleteOlderThanStmt = this.db.prepare<[number]>('DELETE FROM metrics WHERE created_at < ?');
    this.filePathsStmt = this.db.prepare<[], { file_path: string }>('SELECT DISTINCT file_path FROM metrics');
  }

  async saveMetrics(metrics: AgentMetrics): Promise<void> {
    const filePath = path.join(
      this.dir,
      `metrics_${sanitizeFileComponent(metrics.sessionId)}_${formatFileStamp(metrics.timestamp, false)}.jsonl`
    );
    await appendJsonLine(filePath, metrics);
    this.insertStmt.run({
      conversation_id: metrics.conversationId,
      session_id: metrics.sessionId,
      timestamp: metrics.timestamp,
      total_tokens: metrics.totalTokens,
      total_duration_ms: metrics.totalDurationMs,
      tool_calls_count: metrics.toolCallsCount,
      estimated_cost_usd: metrics.estimatedCostUsd,
      model: metrics.primaryModel,
      file_path: filePath,
      created_at: this.clock(),
    });
  }

  /** Every stored snapshot for the conversation, oldest first. */
  async getMetrics(conversationId: string, startTime?: number, endTime?: number): Promise<AgentMetrics[]> {
    const files = this.filesForConversationStmt.all(
      conversationId,
      startTime ?? Number.MIN_SAFE_INTEGER,
      endTime ?? Number.MAX_SAFE_INTEGER,
    );
    const perFile = await Promise.all(files.map(async ({ file_path: filePath }) => await this.readLines(filePath)));
    return perFile
      .flat()
      .filter((entry) => entry.conversationId === conversationId && inRange(entry.timestamp, startTime, endTime))
      .sort((a, b) => a.timestamp - b.timestamp);
  }

  getAggregatedMetrics(query: MetricsQuery = {}): AggregatedMetrics {
    const clauses: string[] = [];
    const params: (string | number)[] = [];
    if (typeof query.sessionId === 'string' && query.sessionId.length > 0) {
      clauses.push('session_id = ?');
      params.push(query.sessionId);
    }
    if (query.startTime !== undefined) {
      clauses.push('timestamp >= ?');
      params.push(query.startTime);
    }
    if (query.endTime !== undefined) {
      clauses.push('timestamp <= ?');
      params.push(query.endTime);
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    const row = this.db.prepare<(string | number)[], AggregateRow>(`
      SELECT COUNT(DISTINCT conversation_id) AS total_conversations,
        COUNT(*) AS total_turns,
        SUM(total_tokens) AS total_tokens,
        SUM(total_duration_ms) AS total_duration_ms,
        SUM(tool_calls_count) AS total_tool_calls,
        SUM(estimated_cost_usd) AS total_cost_usd
      FROM metrics ${where}
    `).get(...params);
    const turns = row?.total_turns ?? 0;
    const totalTokens = row?.total_tokens ?? 0;
    const totalDurationMs = row?.total_duration_ms ?? 0;
    const totalCostUsd = row?.total_cost_usd ?? 0;
    return {
      totalConversations: row?.total_conversations ?? 0,
      totalTurns: turns,
      totalTokens,
      totalDurationMs,
      totalToolCalls: row?.total_tool_calls ?? 0,
      totalCostUsd,
      avgTokensPerTurn: turns > 0 ? totalTokens / turns : 0,
      avgDurationMsPerTurn: turns > 0 ? totalDurationMs / turns : 0,
      avgCostUsdPerTurn: turns > 0 ? totalCostUsd / turns : 0,
    };
  }

  /** Deletes rows older than `days`, files no remaining row points at, and stale unindexed files. */
  async cleanupOldMetrics(days = this.retentionDays): Promise<number> {
    const cutoff = this.clock() - days * DAY_MS;
    const expired = this.olderThanStmt.all(cutoff);
    this.deleteOlderThanStmt.run(cutoff);
    const referenced = new Set(this.filePathsStmt.all().map((row) => row.file_path));
    const candidates = new Set(expired.map((row) => row.file_path).filter((file) => !referenced.has(file)));
    (await listStaleFiles(this.dir, METRICS_FILE_PATTERN, cutoff))
      .filter((file) => !referenced.has(file))
      .forEach((file) => candidates.add(file));
    await Promise.all([...candidates].map(async (file) => {
      try {
        await unlinkIfPresent(file);
      } catch (error: unknown) {
        warn(`metrics file removal failed for ${path.basename(file)}: ${errorMessage(error)}`);
      }
    }));
    return expired.length;
  }

  close(): void {
    this.db.close();
  }

  private async readLines(filePath: string): Promise<AgentMetrics[]> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(filePath, 'utf8');
    } catch (error: unknown) {
      if (!isMissingFileError(error)) warn(`metrics file ${path.basename(filePath)} could not be read: ${errorMessage(error)}`);
      return [];
    }
    return raw.split('\n').filter((line) => line.trim().length > 0).reduce<AgentMetrics[]>((acc, line) => {
      try {
        const parsed: unknown = JSON.parse(line);
        if (isAgentMetrics(parsed)) acc.push(parsed);
      } catch {
        warn(`skipping malformed metrics line in ${path.basename(filePath)}`);
      }
      return acc;
    }, []);
  }
}
