import type { ExecutionMode } from './mode.js';

/** One recorded action. The core never interprets it, only stores and replays it. */
export interface TraceStep {
  action: string;
  args?: Record<string, unknown>;
  note?: string;
}

/**
 * A recorded solution to a goal, reusable without new reasoning.
 *
 * `goalKey` is derived from `goalText` by {@link goalKeyFor}; the store indexes on it.
 * Once `promotedRoutineRef` is set the trace is crystallized and only the routine
 * (or a verbatim replay) may serve it.
 */
export interface Trace {
  goalText: string;
  goalKey: string;
  steps: TraceStep[];
  confidence: number;
  usageCount: number;
  successCount: number;
  failureCount: number;
  costObserved: number;
  timeObservedMs: number;
  promotedRoutineRef?: string;
  originMode: Extract<ExecutionMode, 'FRESH' | 'COORDINATED'>;
  outputSummary?: string;
  createdAt: string;
  lastUsedAt?: string;
  /** Id of the last attempt applied to this record; repeats of it are ignored */
  lastUpdateId?: string;
}

export interface ReuseOutcome {
  success: boolean;
  cost: number;
  durationMs: number;
  attemptId?: string;
}

export type MatchTier = 'exact' | 'semantic' | 'none';

export interface MatchResult {
  trace: Trace | null;
  confidence: number;
  tier: MatchTier;
  /** True when the similarity scorer could not be consulted */
  degraded: boolean;
  warnings: string[];
  similarity?: number;
}
