import {
  type ExecutionMode,
  type ReuseOutcome,
  type Trace,
  type TraceStep,
  CONFIDENCE_PRIOR,
  KeyedMutex,
  PersistenceError,
  type PersistenceOperation,
  errorMessage,
  goalKeyFor,
  isoNow,
  nextConfidence,
} from '@cairn/shared';

export const DEFAULT_CANDIDATE_LIMIT = 100;

/** Durable CRUD over traces keyed by goalKey. */
export interface TraceStore {
  save(trace: Trace): Promise<void>;
  findExact(goalText: string): Promise<Trace | null>;
  get(goalKey: string): Promise<Trace | null>;
  /** Most recently used first, capped at `limit`. */
  listCandidates(limit?: number): Promise<Trace[]>;
  list(): Promise<Trace[]>;
  /**
   * Store the trace a fresh run produced. An existing promoted trace under the
   * same key is kept and returned instead.
   */
  recordFresh(trace: Trace): Promise<Trace>;
  updateConfidence(trace: Trace, success: boolean, attemptId?: string): Promise<Trace>;
  recordReuse(goalKey: string, outcome: ReuseOutcome): Promise<Trace>;
  markPromoted(goalKey: string, routineRef: string): Promise<Trace>;
}

export interface NewTraceInput {
  goalText: string;
  steps: TraceStep[];
  originMode: Extract<ExecutionMode, 'FRESH' | 'COORDINATED'>;
  cost: number;
  durationMs: number;
  outputSummary?: string;
  attemptId?: string;
}

export function createTrace(input: NewTraceInput): Trace {
  const trace: Trace = {
    goalText: input.goalText,
    goalKey: goalKeyFor(input.goalText),
    steps: input.steps,
    confidence: CONFIDENCE_PRIOR,
    usageCount: 0,
    successCount: 0,
    failureCount: 0,
    costObserved: input.cost,
    timeObservedMs: input.durationMs,
    originMode: input.originMode,
    createdAt: isoNow(),
  };
  if (input.outputSummary !== undefined) trace.outputSummary = input.outputSummary;
  if (input.attemptId !== undefined) trace.lastUpdateId = input.attemptId;
  return trace;
}

/**
 * Shared read-modify-write logic. Subclasses supply the raw medium; every
 * write for one goalKey runs under that key's lock.
 */
export abstract class BaseTraceStore implements TraceStore {
  private locks = new KeyedMutex();

  constructor(protected candidateLimit: number = DEFAULT_CANDIDATE_LIMIT) {}

  protected abstract read(goalKey: string): Promise<Trace | null>;
  protected abstract write(trace: Trace): Promise<void>;
  protected abstract readRecent(limit: number): Promise<Trace[]>;
  protected abstract readAll(): Promise<Trace[]>;

  save(trace: Trace): Promise<void> {
    return this.locks.runExclusive(trace.goalKey, () => this.guard('write', () => this.write(trace)));
  }

  findExact(goalText: string): Promise<Trace | null> {
    return this.get(goalKeyFor(goalText));
  }

  get(goalKey: string): Promise<Trace | null> {
    return this.guard('read', () => this.read(goalKey));
  }

  listCandidates(limit?: number): Promise<Trace[]> {
    const cap = Math.min(limit ?? this.candidateLimit, this.candidateLimit);
    return this.guard('list', () => this.readRecent(cap));
  }

  list(): Promise<Trace[]> {
    return this.guard('list', () => this.readAll());
  }

  recordFresh(trace: Trace): Promise<Trace> {
    return this.locks.runExclusive(trace.goalKey, () => this.guard('write', async () => {
      const existing = await this.read(trace.goalKey);
      if (existing?.promotedRoutineRef) return existing;
      if (existing && trace.lastUpdateId !== undefined && existing.lastUpdateId === trace.lastUpdateId) return existing;
      await this.write(trace);
      return trace;
    }));
  }

  updateConfidence(trace: Trace, success: boolean, attemptId?: string): Promise<Trace> {
    return this.locks.runExclusive(trace.goalKey, () => this.guard('write', async () => {
      const current = (await this.read(trace.goalKey)) ?? trace;
      if (attemptId !== undefined && current.lastUpdateId === attemptId) return current;

      const updated: Trace = { ...current, confidence: nextConfidence(current.confidence, success) };
      if (attemptId !== undefined) updated.lastUpdateId = attemptId;
      await this.write(updated);
      return updated;
    }));
  }

  recordReuse(goalKey: string, outcome: ReuseOutcome): Promise<Trace> {
    return this.locks.runExclusive(goalKey, () => this.guard('write', async () => {
      const current = await this.read(goalKey);
      if (!current) {
        throw new PersistenceError('write', `No trace for key ${goalKey}`);
      }
      if (outcome.attemptId !== undefined && current.lastUpdateId === outcome.attemptId) return current;

      const updated: Trace = {
        ...current,
        confidence: nextConfidence(current.confidence, outcome.success),
        usageCount: current.usageCount + 1,
        successCount: current.successCount + (outcome.success ? 1 : 0),
        failureCount: current.failureCount + (outcome.success ? 0 : 1),
        costObserved: outcome.cost > 0 ? outcome.cost : current.costObserved,
        timeObservedMs: outcome.durationMs,
        lastUsedAt: isoNow(),
      };
      if (outcome.attemptId !== undefined) updated.lastUpdateId = outcome.attemptId;
      await this.write(updated);
      return updated;
    }));
  }

  markPromoted(goalKey: string, routineRef: string): Promise<Trace> {
    return this.locks.runExclusive(goalKey, () => this.guard('promote', async () => {
      const current = await this.read(goalKey);
      if (!current) {
        throw new PersistenceError('promote', `No trace for key ${goalKey}`);
      }
      if (current.promotedRoutineRef === routineRef) return current;

      const updated: Trace = { ...current, promotedRoutineRef: routineRef };
      await this.write(updated);
      return updated;
    }));
  }

  /** Medium failures surface as PersistenceError; ones already typed pass through. */
  private async guard<T>(operation: PersistenceOperation, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof PersistenceError) throw err;
      throw new PersistenceError(operation, errorMessage(err), err);
    }
  }
}
