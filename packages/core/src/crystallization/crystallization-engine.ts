import {
  type CrystallizationCandidate,
  type Logger,
  type PromotionReport,
  type Trace,
  PromotionValidationError,
  errorMessage,
  silentLogger,
} from '@cairn/shared';
import type { TraceStore } from '../stores/trace-store.js';
import type { RoutineSynthesizer } from '../collaborators.js';
import type { RoutineRegistry } from './routine-registry.js';
import { RoutineValidator } from './routine-validator.js';

export interface CandidateCriteria {
  minUsage?: number;
  minConfidence?: number;
}

export interface CrystallizationEngineOptions {
  store: TraceStore;
  synthesizer: RoutineSynthesizer;
  routines: RoutineRegistry;
  validator?: RoutineValidator;
  minUsage?: number;
  minConfidence?: number;
  logger?: Logger;
}

export function routineRefFor(goalKey: string): string {
  return `routine_${goalKey}`;
}

/**
 * Promotes heavily used, high-confidence traces to deterministic routines.
 * Runs only when asked (or on the scheduler's interval), never on dispatch.
 */
export class CrystallizationEngine {
  private store: TraceStore;
  private synthesizer: RoutineSynthesizer;
  private routines: RoutineRegistry;
  private validator: RoutineValidator;
  private minUsage: number;
  private minConfidence: number;
  private logger: Logger;

  constructor(options: CrystallizationEngineOptions) {
    this.store = options.store;
    this.synthesizer = options.synthesizer;
    this.routines = options.routines;
    this.validator = options.validator ?? new RoutineValidator();
    this.minUsage = options.minUsage ?? 5;
    this.minConfidence = options.minConfidence ?? 0.95;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Unpromoted traces meeting both thresholds, best first. Score is
   * 0.5·usage + 0.3·cost + 0.2·confidence, with usage and cost divided by
   * their maximum among the eligible traces.
   */
  async findCandidates(criteria: CandidateCriteria = {}): Promise<CrystallizationCandidate[]> {
    const minUsage = criteria.minUsage ?? this.minUsage;
    const minConfidence = criteria.minConfidence ?? this.minConfidence;

    const eligible = (await this.store.list()).filter(t =>
      !t.promotedRoutineRef && t.usageCount >= minUsage && t.confidence >= minConfidence,
    );
    if (eligible.length === 0) return [];

    const maxUsage = Math.max(...eligible.map(t => t.usageCount));
    const maxCost = Math.max(...eligible.map(t => t.costObserved));

    return eligible
      .map(trace => ({
        trace,
        score: round(
          0.5 * normalize(trace.usageCount, maxUsage)
          + 0.3 * normalize(trace.costObserved, maxCost)
          + 0.2 * trace.confidence,
        ),
      }))
      .sort((a, b) => b.score - a.score || a.trace.goalKey.localeCompare(b.trace.goalKey));
  }

  /**
   * Synthesize, validate and register a routine, then mark the trace promoted.
   * Returns the routine ref. An already promoted trace returns its existing ref.
   */
  async promote(trace: Trace): Promise<string> {
    const current = (await this.store.get(trace.goalKey)) ?? trace;
    if (current.promotedRoutineRef) {
      if (!this.routines.has(current.promotedRoutineRef)) {
        await this.restore(current);
      }
      return current.promotedRoutineRef;
    }

    const ref = routineRefFor(current.goalKey);
    await this.synthesizeAndRegister(current, ref);

    try {
      await this.store.markPromoted(current.goalKey, ref);
    } catch (err) {
      this.routines.unregister(ref);
      throw err;
    }

    this.logger.info('Trace crystallized', { goalKey: current.goalKey, routineRef: ref });
    return ref;
  }

  /** Promote up to `limit` candidates; one failure does not stop the rest. */
  async crystallizeEligible(options: { limit?: number } & CandidateCriteria = {}): Promise<PromotionReport[]> {
    const candidates = await this.findCandidates(options);
    const batch = options.limit !== undefined ? candidates.slice(0, options.limit) : candidates;

    const reports: PromotionReport[] = [];
    for (const { trace } of batch) {
      try {
        const routineRef = await this.promote(trace);
        reports.push({ goalKey: trace.goalKey, promoted: true, routineRef });
      } catch (err) {
        this.logger.warn('Crystallization failed', { goalKey: trace.goalKey, error: errorMessage(err) });
        reports.push({ goalKey: trace.goalKey, promoted: false, error: errorMessage(err) });
      }
    }
    return reports;
  }

  /**
   * Re-register routines for traces promoted in an earlier process.
   * Returns the refs that could not be restored.
   */
  async restoreAll(): Promise<string[]> {
    const failed: string[] = [];
    for (const trace of await this.store.list()) {
      if (!trace.promotedRoutineRef || this.routines.has(trace.promotedRoutineRef)) continue;
      try {
        await this.restore(trace);
      } catch (err) {
        this.logger.warn('Routine restore failed', { routineRef: trace.promotedRoutineRef, error: errorMessage(err) });
        failed.push(trace.promotedRoutineRef);
      }
    }
    return failed;
  }

  private async restore(trace: Trace): Promise<void> {
    if (!trace.promotedRoutineRef) return;
    await this.synthesizeAndRegister(trace, trace.promotedRoutineRef);
  }

  private async synthesizeAndRegister(trace: Trace, ref: string): Promise<void> {
    const result = await this.synthesizer.synthesize(trace);
    if (!result.valid) {
      throw new PromotionValidationError(trace.goalKey, result.issues ?? ['synthesizer reported an invalid routine']);
    }

    const issues = this.validator.validate(result.artifact);
    if (issues.length > 0) {
      throw new PromotionValidationError(trace.goalKey, issues.map(i => `${i.category}: ${i.message}`));
    }

    try {
      this.routines.register(ref, result.artifact);
    } catch (err) {
      throw new PromotionValidationError(trace.goalKey, [`compile: ${errorMessage(err)}`]);
    }
  }
}

/**
 * Interval trigger for {@link CrystallizationEngine.crystallizeEligible}.
 * A tick that is still running when the next one fires is skipped.
 */
export class CrystallizationScheduler {
  private timer: NodeJS.Timeout | null = null;
  private running = false;

  constructor(
    private engine: CrystallizationEngine,
    private options: { intervalMs: number; batchLimit?: number; logger?: Logger },
  ) {}

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.tick().catch(err => {
        (this.options.logger ?? silentLogger).error('Scheduled crystallization failed', { error: errorMessage(err) });
      });
    }, this.options.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  /** One batch, exposed for callers that drive the schedule themselves. */
  async tick(): Promise<PromotionReport[]> {
    if (this.running) return [];
    this.running = true;
    try {
      const reports = await this.engine.crystallizeEligible(
        this.options.batchLimit !== undefined ? { limit: this.options.batchLimit } : {},
      );
      const promoted = reports.filter(r => r.promoted).length;
      if (promoted > 0) {
        (this.options.logger ?? silentLogger).info('Scheduled crystallization', { promoted });
      }
      return reports;
    } finally {
      this.running = false;
    }
  }
}

function normalize(value: number, max: number): number {
  return max > 0 ? value / max : 0;
}

function round(n: number): number {
  return Math.round(n * 1_000_000) / 1_000_000;
}
