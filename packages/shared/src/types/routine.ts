import type { Trace } from './trace.js';

/**
 * Source of a generated routine. `source` must evaluate to a function
 * `(goal, actions) => Promise<RoutineOutput | string | void>`.
 */
export interface RoutineArtifact {
  source: string;
  language: 'javascript';
  goalKey: string;
  generatedAt: string;
  description?: string;
}

export interface SynthesisResult {
  artifact: RoutineArtifact;
  valid: boolean;
  issues?: string[];
}

export interface RoutineOutput {
  output?: string;
}

export interface ValidationIssue {
  category: 'syntax' | 'shape' | 'denylist';
  message: string;
}

export interface CrystallizationCandidate {
  trace: Trace;
  score: number;
}

export interface PromotionReport {
  goalKey: string;
  promoted: boolean;
  routineRef?: string;
  error?: string;
}
