import type { ExecutionMode, ModeDecision } from './mode.js';
import type { MatchTier, Trace, TraceStep } from './trace.js';
import type { AgentDescriptor } from './agent.js';

export type DispatchState =
  | 'RECEIVED'
  | 'MATCHED'
  | 'MODE_SELECTED'
  | 'EXECUTING'
  | 'COMPLETED'
  | 'FAILED';

export interface DispatchOptions {
  /** Bypass the strategy and run this mode */
  mode?: ExecutionMode;
  /** Stable id for this attempt; reusing it never applies a trace update twice */
  attemptId?: string;
  timeoutMs?: number;
}

export interface ExecutionRequest {
  goal: string;
  decision: ModeDecision;
  trace: Trace | null;
  delegates?: AgentDescriptor[];
  signal: AbortSignal;
}

export interface ExecutionOutcome {
  success: boolean;
  steps: TraceStep[];
  cost: number;
  durationMs: number;
  output?: string;
  error?: string;
}

/** Emitted once per dispatch, whatever the outcome. */
export interface DecisionRecord {
  attemptId: string;
  goalKey: string;
  mode: ExecutionMode;
  confidence: number;
  cost: number;
  durationMs: number;
  success: boolean;
  matchTier: MatchTier;
  degraded: boolean;
  reasoning: string;
  downgradedFrom?: ExecutionMode;
  error?: string;
  timestamp: string;
}

export interface FallbackSuggestion {
  fallbackMode: ExecutionMode;
  reason: string;
}

export interface DispatchResult {
  attemptId: string;
  goal: string;
  goalKey: string;
  state: Extract<DispatchState, 'COMPLETED' | 'FAILED'>;
  states: DispatchState[];
  success: boolean;
  decision: ModeDecision;
  matchTier: MatchTier;
  degraded: boolean;
  warnings: string[];
  output?: string;
  cost: number;
  durationMs: number;
  /** Trace created or updated by this dispatch */
  trace?: Trace;
  error?: Error;
  suggestion?: FallbackSuggestion;
}
