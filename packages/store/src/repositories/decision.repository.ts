import type Database from 'better-sqlite3';
import { z } from 'zod';
import { executionModeSchema } from '@cairn/shared';
import type { DecisionRecord, ExecutionMode } from '@cairn/shared';

interface DecisionRow {
  attempt_id: string;
  goal_key: string;
  mode: string;
  confidence: number;
  cost: number;
  duration_ms: number;
  success: number;
  match_tier: string;
  degraded: number;
  reasoning: string;
  downgraded_from: string | null;
  error: string | null;
  recorded_at: string;
}

interface SummaryRow {
  mode: string;
  count: number;
  successes: number;
  total_cost: number;
  avg_duration_ms: number;
}

export interface DecisionListOptions {
  goalKey?: string;
  mode?: ExecutionMode;
  limit?: number;
}

export interface ModeSummary {
  mode: ExecutionMode;
  count: number;
  successes: number;
  totalCost: number;
  avgDurationMs: number;
}

const matchTierSchema = z.enum(['exact', 'semantic', 'none']);

export class DecisionRepository {
  private insertStmt: Database.Statement<DecisionRow>;
  private summaryStmt: Database.Statement<[], SummaryRow>;

  constructor(private db: Database.Database) {
    this.insertStmt = db.prepare<DecisionRow>(`
      INSERT OR IGNORE INTO decisions (
        attempt_id, goal_key, mode, confidence, cost, duration_ms, success,
        match_tier, degraded, reasoning, downgraded_from, error, recorded_at
      ) VALUES (
        @attempt_id, @goal_key, @mode, @confidence, @cost, @duration_ms, @success,
        @match_tier, @degraded, @reasoning, @downgraded_from, @error, @recorded_at
      )
    `);
    this.summaryStmt = db.prepare<[], SummaryRow>(`
      SELECT mode,
             COUNT(*)         AS count,
             SUM(success)     AS successes,
             SUM(cost)        AS total_cost,
             AVG(duration_ms) AS avg_duration_ms
      FROM decisions
      GROUP BY mode
      ORDER BY mode ASC
    `);
  }

  /** A record whose attempt id is already stored is ignored. */
  insert(record: DecisionRecord): void {
    this.insertStmt.run({
      attempt_id: record.attemptId,
      goal_key: record.goalKey,
      mode: record.mode,
      confidence: record.confidence,
      cost: record.cost,
      duration_ms: record.durationMs,
      success: record.success ? 1 : 0,
      match_tier: record.matchTier,
      degraded: record.degraded ? 1 : 0,
      reasoning: record.reasoning,
      downgraded_from: record.downgradedFrom ?? null,
      error: record.error ?? null,
      recorded_at: record.timestamp,
    });
  }

  /** Newest first. */
  list(options: DecisionListOptions = {}): DecisionRecord[] {
    const conditions: string[] = [];
    const params: Record<string, string | number> = {};
    if (options.goalKey) {
      conditions.push('goal_key = @goal_key');
      params.goal_key = options.goalKey;
    }
    if (options.mode) {
      conditions.push('mode = @mode');
      params.mode = options.mode;
    }
    params.limit = options.limit ?? 100;

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const rows = this.db
      .prepare<Record<string, string | number>, DecisionRow>(
        `SELECT * FROM decisions ${where} ORDER BY recorded_at DESC, rowid DESC LIMIT @limit`,
      )
      .all(params);
    return rows.map(row => this.fromRow(row));
  }

  summarize(): ModeSummary[] {
    return this.summaryStmt.all().map(row => ({
      mode: executionModeSchema.parse(row.mode),
      count: row.count,
      successes: row.successes,
      totalCost: row.total_cost,
      avgDurationMs: row.avg_duration_ms,
    }));
  }

  private fromRow(row: DecisionRow): DecisionRecord {
    const record: DecisionRecord = {
      attemptId: row.attempt_id,
      goalKey: row.goal_key,
      mode: executionModeSchema.parse(row.mode),
      confidence: row.confidence,
      cost: row.cost,
      durationMs: row.duration_ms,
      success: row.success === 1,
      matchTier: matchTierSchema.parse(row.match_tier),
      degraded: row.degraded === 1,
      reasoning: row.reasoning,
      timestamp: row.recorded_at,
    };
    if (row.downgraded_from !== null) record.downgradedFrom = executionModeSchema.parse(row.downgraded_from);
    if (row.error !== null) record.error = row.error;
    return record;
  }
}
