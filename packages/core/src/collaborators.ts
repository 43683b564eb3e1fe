import type {
  AgentDescriptor,
  DecisionRecord,
  ExecutionMode,
  ExecutionOutcome,
  ExecutionRequest,
  SynthesisResult,
  Trace,
  TraceStep,
} from '@cairn/shared';

/** Scores how well each candidate trace answers `goal`, in [0, 1], index-aligned. */
export interface SimilarityScorer {
  isAvailable(): Promise<boolean>;
  score(goal: string, candidates: Trace[]): Promise<number[]>;
}

export interface ActionSummary {
  name: string;
  description: string;
}

export interface ReasoningRequest {
  goal: string;
  mode: Extract<ExecutionMode, 'FRESH' | 'GUIDED' | 'COORDINATED'>;
  /** Matched trace to adapt (GUIDED) */
  guidance?: Trace;
  delegates?: AgentDescriptor[];
  actions: ActionSummary[];
  signal: AbortSignal;
}

export interface ReasoningExecutor {
  reason(request: ReasoningRequest): Promise<ExecutionOutcome>;
}

export interface ReplayResult {
  success: boolean;
  output?: string;
  error?: string;
  durationMs: number;
}

export interface StepReplayer {
  replay(steps: TraceStep[], context: { goal: string; signal: AbortSignal }): Promise<ReplayResult>;
}

export interface RoutineSynthesizer {
  synthesize(trace: Trace): Promise<SynthesisResult>;
}

export interface TelemetrySink {
  record(record: DecisionRecord): void | Promise<void>;
}

/** Runs one execution mode. The dispatcher holds exactly one per mode. */
export interface ModeExecutor {
  readonly mode: ExecutionMode;
  execute(request: ExecutionRequest): Promise<ExecutionOutcome>;
}
