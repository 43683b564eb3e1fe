import {
  type ExecutionMode,
  type ModeContext,
  type ModeCostTable,
  type ModeDecision,
  type SelectionThresholds,
  type StrategyName,
  DEFAULT_MODE_COSTS,
  STRATEGY_THRESHOLDS,
} from '@cairn/shared';

export interface ModeStrategy {
  readonly name: string;
  /** Pure: same context, same decision. */
  select(context: ModeContext): ModeDecision;
}

/** Modes that can only run against a matched trace. */
export const TRACE_MODES: ReadonlySet<ExecutionMode> = new Set(['CRYSTALLIZED', 'REPLAY', 'GUIDED']);

/**
 * Confidence ladder: promoted → CRYSTALLIZED, ≥ replay → REPLAY,
 * ≥ guided → GUIDED, complex → COORDINATED, else FRESH.
 */
export class ThresholdStrategy implements ModeStrategy {
  constructor(
    readonly name: string,
    private thresholds: SelectionThresholds,
    private costs: ModeCostTable = DEFAULT_MODE_COSTS,
  ) {}

  select({ match, complexity }: ModeContext): ModeDecision {
    const { trace, confidence } = match;
    const t = this.thresholds;

    if (trace?.promotedRoutineRef) {
      return this.decide('CRYSTALLIZED', confidence, trace.goalKey,
        `Trace is crystallized as ${trace.promotedRoutineRef}`);
    }
    if (trace && confidence >= t.replayThreshold) {
      return this.decide('REPLAY', confidence, trace.goalKey,
        `Confidence ${fmt(confidence)} ≥ replay threshold ${fmt(t.replayThreshold)}`);
    }
    if (trace && confidence >= t.guidedThreshold) {
      return this.decide('GUIDED', confidence, trace.goalKey,
        `Confidence ${fmt(confidence)} ≥ guided threshold ${fmt(t.guidedThreshold)}`);
    }
    const basis = trace ? `Confidence ${fmt(confidence)} below guided threshold` : 'No matching trace';
    if (t.allowCoordinated && complexity > t.complexityThreshold) {
      return this.decide('COORDINATED', confidence, undefined,
        `${basis}; complexity ${complexity} > ${t.complexityThreshold}`);
    }
    return this.decide('FRESH', confidence, undefined, `${basis}; reasoning from scratch`);
  }

  private decide(mode: ExecutionMode, confidence: number, traceRef: string | undefined, reasoning: string): ModeDecision {
    return {
      mode,
      confidence,
      reasoning,
      estimatedCost: this.costs[mode],
      ...(traceRef ? { traceRef } : {}),
    };
  }
}

/**
 * Always picks `mode`, except that trace modes without a matched trace fall
 * back to FRESH, and CRYSTALLIZED on an unpromoted trace falls back to REPLAY.
 */
export class ForcedModeStrategy implements ModeStrategy {
  readonly name: string;

  constructor(private mode: ExecutionMode, private costs: ModeCostTable = DEFAULT_MODE_COSTS) {
    this.name = `forced-${mode.toLowerCase()}`;
  }

  select({ match }: ModeContext): ModeDecision {
    const { trace, confidence } = match;
    let mode = this.mode;
    let reasoning = `Mode forced to ${this.mode}`;

    if (TRACE_MODES.has(mode) && !trace) {
      mode = 'FRESH';
      reasoning += '; no matching trace, running FRESH';
    } else if (mode === 'CRYSTALLIZED' && !trace?.promotedRoutineRef) {
      mode = 'REPLAY';
      reasoning += '; trace is not crystallized, replaying its steps';
    }

    const traceRef = TRACE_MODES.has(mode) ? trace?.goalKey : undefined;
    return {
      mode,
      confidence,
      reasoning,
      estimatedCost: this.costs[mode],
      ...(traceRef ? { traceRef } : {}),
    };
  }
}

export interface StrategyOptions {
  /** Overrides for the balanced thresholds */
  thresholds?: Partial<SelectionThresholds>;
  costs?: ModeCostTable;
}

/** Resolve a configured strategy name. `auto` is an alias of `balanced`. */
export function getStrategy(name: StrategyName, options: StrategyOptions = {}): ModeStrategy {
  const costs = options.costs ?? DEFAULT_MODE_COSTS;
  switch (name) {
    case 'balanced':
    case 'auto':
      return new ThresholdStrategy('balanced', { ...STRATEGY_THRESHOLDS.balanced, ...options.thresholds }, costs);
    case 'cost-optimized':
      return new ThresholdStrategy('cost-optimized', STRATEGY_THRESHOLDS['cost-optimized'], costs);
    case 'speed-optimized':
      return new ThresholdStrategy('speed-optimized', STRATEGY_THRESHOLDS['speed-optimized'], costs);
    case 'forced-fresh':
      return new ForcedModeStrategy('FRESH', costs);
    case 'forced-replay':
      return new ForcedModeStrategy('REPLAY', costs);
  }
}

function fmt(n: number): string {
  return n.toFixed(2);
}
