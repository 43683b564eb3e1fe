import type { DecisionRecord, ExecutionMode, Logger } from '@cairn/shared';
import { errorMessage, silentLogger } from '@cairn/shared';
import type { TelemetrySink } from './collaborators.js';

/** Where decision records are persisted. `DecisionRepository` from @cairn/store satisfies it. */
export interface DecisionPersistence {
  insert(record: DecisionRecord): void;
}

export interface DecisionSummary {
  total: number;
  successes: number;
  totalCost: number;
  byMode: Record<ExecutionMode, number>;
  degraded: number;
  downgraded: number;
}

/**
 * Default telemetry sink. Keeps the most recent records in memory and, when
 * given a repository, persists every record. Persistence failures are logged.
 */
export class DecisionLogger implements TelemetrySink {
  private records: DecisionRecord[] = [];

  constructor(
    private persistence?: DecisionPersistence,
    private logger: Logger = silentLogger,
    private capacity = 1000,
  ) {}

  record(record: DecisionRecord): void {
    this.records.push(record);
    if (this.records.length > this.capacity) {
      this.records.splice(0, this.records.length - this.capacity);
    }

    this.logger.debug('Decision', {
      goalKey: record.goalKey,
      mode: record.mode,
      success: record.success,
      cost: record.cost,
    });

    if (this.persistence) {
      try {
        this.persistence.insert(record);
      } catch (err) {
        this.logger.warn('Failed to persist decision record', { attemptId: record.attemptId, error: errorMessage(err) });
      }
    }
  }

  /** Newest last. */
  list(limit?: number): DecisionRecord[] {
    return limit === undefined ? [...this.records] : this.records.slice(-limit);
  }

  get(attemptId: string): DecisionRecord | undefined {
    return this.records.find(r => r.attemptId === attemptId);
  }

  summary(): DecisionSummary {
    const byMode: Record<ExecutionMode, number> = {
      CRYSTALLIZED: 0,
      REPLAY: 0,
      GUIDED: 0,
      FRESH: 0,
      COORDINATED: 0,
    };
    let successes = 0;
    let totalCost = 0;
    let degraded = 0;
    let downgraded = 0;
    for (const r of this.records) {
      byMode[r.mode] += 1;
      if (r.success) successes += 1;
      if (r.degraded) degraded += 1;
      if (r.downgradedFrom) downgraded += 1;
      totalCost += r.cost;
    }
    return {
      total: this.records.length,
      successes,
      totalCost: Math.round(totalCost * 1_000_000) / 1_000_000,
      byMode,
      degraded,
      downgraded,
    };
  }

  clear(): void {
    this.records = [];
  }
}
