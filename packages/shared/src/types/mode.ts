import type { MatchResult } from './trace.js';
import type { BudgetSnapshot } from './budget.js';

export const EXECUTION_MODES = ['CRYSTALLIZED', 'REPLAY', 'GUIDED', 'FRESH', 'COORDINATED'] as const;

export type ExecutionMode = typeof EXECUTION_MODES[number];

export type StrategyName =
  | 'balanced'
  | 'auto'
  | 'cost-optimized'
  | 'speed-optimized'
  | 'forced-fresh'
  | 'forced-replay';

export interface ModeContext {
  goal: string;
  match: MatchResult;
  budget: BudgetSnapshot;
  /** Count of structural cues suggesting the goal needs several agents */
  complexity: number;
}

export interface ModeDecision {
  mode: ExecutionMode;
  confidence: number;
  /** goalKey of the trace the decision relies on */
  traceRef?: string;
  reasoning: string;
  estimatedCost: number;
  downgradedFrom?: ExecutionMode;
}

export interface SelectionThresholds {
  replayThreshold: number;
  guidedThreshold: number;
  complexityThreshold: number;
  allowCoordinated: boolean;
}

export type ModeCostTable = Record<ExecutionMode, number>;
