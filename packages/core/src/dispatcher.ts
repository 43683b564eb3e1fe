import {
  type BudgetReservation,
  type DecisionRecord,
  type DispatchOptions,
  type DispatchResult,
  type DispatchState,
  type ExecutionMode,
  type ExecutionOutcome,
  type Logger,
  type MatchResult,
  type ModeCostTable,
  type ModeDecision,
  type Trace,
  DEFAULT_MODE_COSTS,
  ExecutorFailure,
  InsufficientBudgetError,
  InvalidGoalError,
  errorMessage,
  generateId,
  goalKeyFor,
  isoNow,
  monotonicNow,
  silentLogger,
} from '@cairn/shared';
import type { BudgetLedger } from './budget-ledger.js';
import type { TraceStore } from './stores/trace-store.js';
import { createTrace } from './stores/trace-store.js';
import type { TraceMatcher } from './trace-matcher.js';
import { ForcedModeStrategy, TRACE_MODES, type ModeStrategy } from './mode-strategies.js';
import type { ExecutorTable } from './executors.js';
import type { TelemetrySink } from './collaborators.js';
import type { AgentRegistry } from './agent-registry.js';
import { complexitySignal } from './complexity.js';

/** Cheaper modes tried, in order, when the selected one cannot be afforded. */
export const DOWNGRADE_LADDER: readonly ExecutionMode[] = ['COORDINATED', 'FRESH', 'GUIDED', 'REPLAY'];

const ZERO_COST_MODES: ReadonlySet<ExecutionMode> = new Set(['REPLAY', 'CRYSTALLIZED']);

export interface DispatcherOptions {
  store: TraceStore;
  matcher: TraceMatcher;
  ledger: BudgetLedger;
  strategy: ModeStrategy;
  executors: ExecutorTable;
  modeCosts?: ModeCostTable;
  telemetry?: TelemetrySink;
  agents?: AgentRegistry;
  executionTimeoutMs?: number;
  logger?: Logger;
}

/**
 * Drives one goal through RECEIVED → MATCHED → MODE_SELECTED → EXECUTING →
 * COMPLETED | FAILED: match, select, reserve budget, execute, update the trace,
 * settle the ledger, and emit a decision record.
 */
export class Dispatcher {
  private store: TraceStore;
  private matcher: TraceMatcher;
  private ledger: BudgetLedger;
  private strategy: ModeStrategy;
  private executors: ExecutorTable;
  private costs: ModeCostTable;
  private telemetry?: TelemetrySink;
  private agents?: AgentRegistry;
  private timeoutMs: number;
  private logger: Logger;

  constructor(options: DispatcherOptions) {
    this.store = options.store;
    this.matcher = options.matcher;
    this.ledger = options.ledger;
    this.strategy = options.strategy;
    this.executors = options.executors;
    this.costs = options.modeCosts ?? DEFAULT_MODE_COSTS;
    this.telemetry = options.telemetry;
    this.agents = options.agents;
    this.timeoutMs = options.executionTimeoutMs ?? 300_000;
    this.logger = options.logger ?? silentLogger;
  }

  setStrategy(strategy: ModeStrategy): void {
    this.strategy = strategy;
  }

  getStrategy(): ModeStrategy {
    return this.strategy;
  }

  async dispatch(goal: string, options: DispatchOptions = {}): Promise<DispatchResult> {
    const states: DispatchState[] = ['RECEIVED'];
    if (goal.trim().length === 0) {
      throw new InvalidGoalError('goal must be a non-empty string');
    }
    const startTime = monotonicNow();
    const attemptId = options.attemptId ?? generateId('att');
    const goalKey = goalKeyFor(goal);

    // ── Match ──
    const match = await this.matcher.match(goal);
    states.push('MATCHED');

    // ── Select ──
    const strategy = options.mode ? new ForcedModeStrategy(options.mode, this.costs) : this.strategy;
    let decision = this.enforcePromoted(
      strategy.select({ goal, match, budget: this.ledger.snapshot(), complexity: complexitySignal(goal) }),
      match,
    );
    states.push('MODE_SELECTED');

    // ── Reserve ──
    let reservation: BudgetReservation;
    try {
      ({ decision, reservation } = await this.reserve(goal, decision, match));
    } catch (err) {
      if (err instanceof InsufficientBudgetError) {
        this.logger.warn('Dispatch refused: insufficient budget', { goalKey, mode: decision.mode, available: err.available });
        await this.emit(this.buildRecord({
          attemptId, goalKey, decision, match, cost: 0,
          durationMs: monotonicNow() - startTime, success: false, error: err.message,
        }));
      }
      throw err;
    }
    if (decision.downgradedFrom) {
      this.logger.info('Mode downgraded for budget', { goalKey, from: decision.downgradedFrom, to: decision.mode });
    }

    // ── Execute ──
    states.push('EXECUTING');
    const traceForMode = TRACE_MODES.has(decision.mode) ? match.trace : null;
    const outcome = await this.execute(goal, decision, traceForMode, options.timeoutMs);

    // ── Trace update, then settle ──
    const cost = ZERO_COST_MODES.has(decision.mode) ? 0 : outcome.cost;
    let trace: Trace | undefined;
    let persistError: unknown;
    try {
      trace = await this.updateTrace(goal, decision, traceForMode, outcome, cost, attemptId);
    } catch (err) {
      persistError = err;
    }
    const spent = await this.ledger.settle(reservation, cost);
    const debited = spent?.amount ?? 0;

    const success = outcome.success && persistError === undefined;
    const durationMs = monotonicNow() - startTime;
    const failure = outcome.success
      ? undefined
      : new ExecutorFailure(decision.mode, outcome.error ?? 'unknown error');

    await this.emit(this.buildRecord({
      attemptId, goalKey, decision, match, cost: debited, durationMs, success,
      ...(failure ? { error: failure.message } : persistError !== undefined ? { error: errorMessage(persistError) } : {}),
    }));

    if (persistError !== undefined) throw persistError;

    states.push(success ? 'COMPLETED' : 'FAILED');
    const result: DispatchResult = {
      attemptId,
      goal,
      goalKey,
      state: success ? 'COMPLETED' : 'FAILED',
      states,
      success,
      decision,
      matchTier: match.tier,
      degraded: match.degraded,
      warnings: match.warnings,
      cost: debited,
      durationMs,
    };
    if (outcome.output !== undefined) result.output = outcome.output;
    if (trace) result.trace = trace;
    if (failure) {
      result.error = failure;
      if (decision.mode === 'CRYSTALLIZED') {
        result.suggestion = {
          fallbackMode: 'REPLAY',
          reason: 'The routine failed; replaying the recorded steps may still succeed',
        };
      }
    }
    return result;
  }

  /** A crystallized trace never goes back through guided reasoning. */
  private enforcePromoted(decision: ModeDecision, match: MatchResult): ModeDecision {
    if (decision.mode !== 'GUIDED' || !match.trace?.promotedRoutineRef) return decision;
    return {
      ...decision,
      mode: 'REPLAY',
      estimatedCost: this.costs.REPLAY,
      reasoning: `${decision.reasoning}; trace is crystallized, replaying instead of guided reasoning`,
    };
  }

  private async reserve(
    goal: string,
    decision: ModeDecision,
    match: MatchResult,
  ): Promise<{ decision: ModeDecision; reservation: BudgetReservation }> {
    const reason = (mode: ExecutionMode) => `${mode}: ${truncate(goal, 80)}`;
    let refusal: InsufficientBudgetError;
    try {
      const reservation = await this.ledger.reserve(this.costs[decision.mode], reason(decision.mode), decision.mode);
      return { decision, reservation };
    } catch (err) {
      if (!(err instanceof InsufficientBudgetError)) throw err;
      refusal = err;
    }

    const start = DOWNGRADE_LADDER.indexOf(decision.mode);
    const fallbacks = start >= 0 ? DOWNGRADE_LADDER.slice(start + 1) : ['REPLAY' as const];
    for (const mode of fallbacks) {
      if (!this.requirementsHold(mode, match)) continue;
      try {
        const reservation = await this.ledger.reserve(this.costs[mode], reason(mode), mode);
        const downgraded: ModeDecision = {
          mode,
          confidence: decision.confidence,
          estimatedCost: this.costs[mode],
          downgradedFrom: decision.mode,
          reasoning: `${decision.reasoning}; budget cannot cover ${decision.mode}, downgraded to ${mode}`,
        };
        const traceRef = TRACE_MODES.has(mode) ? match.trace?.goalKey : undefined;
        if (traceRef) downgraded.traceRef = traceRef;
        return { decision: downgraded, reservation };
      } catch (err) {
        if (!(err instanceof InsufficientBudgetError)) throw err;
      }
    }
    throw refusal;
  }

  private requirementsHold(mode: ExecutionMode, match: MatchResult): boolean {
    switch (mode) {
      case 'GUIDED':
        return match.trace !== null && !match.trace.promotedRoutineRef;
      case 'REPLAY':
        return match.trace !== null;
      case 'CRYSTALLIZED':
        return Boolean(match.trace?.promotedRoutineRef);
      case 'FRESH':
      case 'COORDINATED':
        return true;
    }
  }

  private async execute(
    goal: string,
    decision: ModeDecision,
    trace: Trace | null,
    timeoutMs?: number,
  ): Promise<ExecutionOutcome> {
    const executor = this.executors[decision.mode];
    const limit = timeoutMs ?? this.timeoutMs;
    const controller = new AbortController();
    const startTime = monotonicNow();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new Error(`timed out after ${limit}ms`));
      }, limit);
    });

    try {
      return await Promise.race([
        executor.execute({
          goal,
          decision,
          trace,
          signal: controller.signal,
          ...(decision.mode === 'COORDINATED' && this.agents ? { delegates: this.agents.list() } : {}),
        }),
        timeout,
      ]);
    } catch (err) {
      this.logger.warn('Executor failed', { mode: decision.mode, error: errorMessage(err) });
      return {
        success: false,
        steps: [],
        cost: 0,
        durationMs: monotonicNow() - startTime,
        error: errorMessage(err),
      };
    } finally {
      clearTimeout(timer);
    }
  }

  private async updateTrace(
    goal: string,
    decision: ModeDecision,
    trace: Trace | null,
    outcome: ExecutionOutcome,
    cost: number,
    attemptId: string,
  ): Promise<Trace | undefined> {
    if (decision.mode === 'FRESH' || decision.mode === 'COORDINATED') {
      if (!outcome.success) return undefined;
      return this.store.recordFresh(createTrace({
        goalText: goal,
        steps: outcome.steps,
        originMode: decision.mode,
        cost,
        durationMs: outcome.durationMs,
        attemptId,
        ...(outcome.output !== undefined ? { outputSummary: truncate(outcome.output, 200) } : {}),
      }));
    }

    if (!trace) return undefined;
    return this.store.recordReuse(trace.goalKey, {
      success: outcome.success,
      cost,
      durationMs: outcome.durationMs,
      attemptId,
    });
  }

  private buildRecord(input: {
    attemptId: string;
    goalKey: string;
    decision: ModeDecision;
    match: MatchResult;
    cost: number;
    durationMs: number;
    success: boolean;
    error?: string;
  }): DecisionRecord {
    const record: DecisionRecord = {
      attemptId: input.attemptId,
      goalKey: input.goalKey,
      mode: input.decision.mode,
      confidence: input.decision.confidence,
      cost: input.cost,
      durationMs: input.durationMs,
      success: input.success,
      matchTier: input.match.tier,
      degraded: input.match.degraded,
      reasoning: input.decision.reasoning,
      timestamp: isoNow(),
    };
    if (input.decision.downgradedFrom) record.downgradedFrom = input.decision.downgradedFrom;
    if (input.error !== undefined) record.error = input.error;
    return record;
  }

  /** Telemetry is best effort. */
  private async emit(record: DecisionRecord): Promise<void> {
    if (!this.telemetry) return;
    try {
      await this.telemetry.record(record);
    } catch (err) {
      this.logger.warn('Telemetry sink failed', { attemptId: record.attemptId, error: errorMessage(err) });
    }
  }
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 1)}…` : text;
}
