import { describe, it, expect } from 'vitest';
import type { DecisionRecord } from '@cairn/shared';
import { DecisionLogger } from '../src/decision-logger.js';
import { memoryStore } from './helpers.js';

function record(overrides: Partial<DecisionRecord> = {}): DecisionRecord {
  return {
    attemptId: 'att-1',
    goalKey: 'k1',
    mode: 'FRESH',
    confidence: 0,
    cost: 0.5,
    durationMs: 20,
    success: true,
    matchTier: 'none',
    degraded: false,
    reasoning: 'No matching trace; reasoning from scratch',
    timestamp: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

describe('DecisionLogger', () => {
  it('summarizes recorded decisions', () => {
    const logger = new DecisionLogger();
    logger.record(record());
    logger.record(record({ attemptId: 'att-2', mode: 'REPLAY', cost: 0, degraded: true }));
    logger.record(record({ attemptId: 'att-3', mode: 'GUIDED', cost: 0.25, success: false, downgradedFrom: 'FRESH' }));

    expect(logger.summary()).toEqual({
      total: 3,
      successes: 2,
      totalCost: 0.75,
      byMode: { CRYSTALLIZED: 0, REPLAY: 1, GUIDED: 1, FRESH: 1, COORDINATED: 0 },
      degraded: 1,
      downgraded: 1,
    });
    expect(logger.get('att-2')?.mode).toBe('REPLAY');
  });

  it('keeps only the most recent records', () => {
    const logger = new DecisionLogger(undefined, undefined, 2);
    for (const id of ['a', 'b', 'c']) logger.record(record({ attemptId: id }));
    expect(logger.list().map(r => r.attemptId)).toEqual(['b', 'c']);
    expect(logger.list(1).map(r => r.attemptId)).toEqual(['c']);
  });

  it('persists records through the repository', () => {
    const store = memoryStore();
    const logger = new DecisionLogger(store.decisions);

    logger.record(record({ downgradedFrom: 'COORDINATED', error: 'FRESH execution failed: x' }));

    expect(store.decisions.list()).toEqual([
      record({ downgradedFrom: 'COORDINATED', error: 'FRESH execution failed: x' }),
    ]);
  });

  it('logs instead of throwing when persistence fails', () => {
    const warnings: string[] = [];
    const logger = new DecisionLogger(
      {
        insert: () => {
          throw new Error('disk full');
        },
      },
      { debug: () => {}, info: () => {}, warn: message => warnings.push(message), error: () => {} },
    );

    logger.record(record());

    expect(warnings).toEqual(['Failed to persist decision record']);
    expect(logger.list()).toHaveLength(1);
  });
});
