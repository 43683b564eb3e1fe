import type Database from 'better-sqlite3';
import { z } from 'zod';
import { traceStepSchema } from '@cairn/shared';
import type { Trace } from '@cairn/shared';

export interface TraceRow {
  goal_key: string;
  goal_text: string;
  steps: string;
  confidence: number;
  usage_count: number;
  success_count: number;
  failure_count: number;
  cost_observed: number;
  time_observed_ms: number;
  promoted_routine_ref: string | null;
  origin_mode: string;
  output_summary: string | null;
  created_at: string;
  last_used_at: string | null;
  last_update_id: string | null;
}

const stepsSchema = z.array(traceStepSchema);
const originModeSchema = z.enum(['FRESH', 'COORDINATED']);

export class TraceRepository {
  private upsertStmt: Database.Statement<TraceRow>;
  private getStmt: Database.Statement<[string], TraceRow>;
  private recentStmt: Database.Statement<[number], TraceRow>;
  private allStmt: Database.Statement<[], TraceRow>;

  constructor(db: Database.Database) {
    this.upsertStmt = db.prepare<TraceRow>(`
      INSERT OR REPLACE INTO traces (
        goal_key, goal_text, steps, confidence, usage_count, success_count, failure_count,
        cost_observed, time_observed_ms, promoted_routine_ref, origin_mode, output_summary,
        created_at, last_used_at, last_update_id
      ) VALUES (
        @goal_key, @goal_text, @steps, @confidence, @usage_count, @success_count, @failure_count,
        @cost_observed, @time_observed_ms, @promoted_routine_ref, @origin_mode, @output_summary,
        @created_at, @last_used_at, @last_update_id
      )
    `);
    this.getStmt = db.prepare<[string], TraceRow>('SELECT * FROM traces WHERE goal_key = ?');
    this.recentStmt = db.prepare<[number], TraceRow>(
      'SELECT * FROM traces ORDER BY COALESCE(last_used_at, created_at) DESC, goal_key ASC LIMIT ?',
    );
    this.allStmt = db.prepare<[], TraceRow>('SELECT * FROM traces ORDER BY goal_key ASC');
  }

  /** Insert or fully replace the record for `trace.goalKey`. */
  save(trace: Trace): void {
    this.upsertStmt.run(this.toRow(trace));
  }

  get(goalKey: string): Trace | null {
    const row = this.getStmt.get(goalKey);
    return row ? this.fromRow(row) : null;
  }

  /** Most recently used (or created) first. */
  listRecent(limit: number): Trace[] {
    return this.recentStmt.all(limit).map(row => this.fromRow(row));
  }

  list(): Trace[] {
    return this.allStmt.all().map(row => this.fromRow(row));
  }

  private toRow(trace: Trace): TraceRow {
    return {
      goal_key: trace.goalKey,
      goal_text: trace.goalText,
      steps: JSON.stringify(trace.steps),
      confidence: trace.confidence,
      usage_count: trace.usageCount,
      success_count: trace.successCount,
      failure_count: trace.failureCount,
      cost_observed: trace.costObserved,
      time_observed_ms: trace.timeObservedMs,
      promoted_routine_ref: trace.promotedRoutineRef ?? null,
      origin_mode: trace.originMode,
      output_summary: trace.outputSummary ?? null,
      created_at: trace.createdAt,
      last_used_at: trace.lastUsedAt ?? null,
      last_update_id: trace.lastUpdateId ?? null,
    };
  }

  private fromRow(row: TraceRow): Trace {
    const trace: Trace = {
      goalText: row.goal_text,
      goalKey: row.goal_key,
      steps: stepsSchema.parse(JSON.parse(row.steps)),
      confidence: row.confidence,
      usageCount: row.usage_count,
      successCount: row.success_count,
      failureCount: row.failure_count,
      costObserved: row.cost_observed,
      timeObservedMs: row.time_observed_ms,
      originMode: originModeSchema.parse(row.origin_mode),
      createdAt: row.created_at,
    };
    if (row.promoted_routine_ref !== null) trace.promotedRoutineRef = row.promoted_routine_ref;
    if (row.output_summary !== null) trace.outputSummary = row.output_summary;
    if (row.last_used_at !== null) trace.lastUsedAt = row.last_used_at;
    if (row.last_update_id !== null) trace.lastUpdateId = row.last_update_id;
    return trace;
  }
}
