import { describe, it, expect } from 'vitest';
import { createTestDatabase } from '../src/database.js';
import { runMigrations } from '../src/migrations.js';
import { allMigrations } from '../src/migrations/index.js';
import { storeFor } from '../src/index.js';

describe('store lifecycle', () => {
  it('all repositories work on the same database', () => {
    const db = createTestDatabase();
    runMigrations(db, allMigrations);
    const store = storeFor(db);

    store.traces.save({
      goalText: 'say hello',
      goalKey: 'hello',
      steps: [{ action: 'respond', args: { text: 'hello' } }],
      confidence: 0.75,
      usageCount: 0,
      successCount: 0,
      failureCount: 0,
      costObserved: 0.5,
      timeObservedMs: 5,
      originMode: 'FRESH',
      createdAt: '2024-01-01T00:00:00.000Z',
    });
    store.ledger.recordDebit(9.5, { amount: 0.5, reason: 'FRESH: say hello', mode: 'FRESH', timestamp: '2024-01-01T00:00:00.000Z' });
    store.decisions.insert({
      attemptId: 'att_1',
      goalKey: 'hello',
      mode: 'FRESH',
      confidence: 0,
      cost: 0.5,
      durationMs: 5,
      success: true,
      matchTier: 'none',
      degraded: false,
      reasoning: 'no prior trace',
      timestamp: '2024-01-01T00:00:00.000Z',
    });

    expect(store.traces.list()).toHaveLength(1);
    expect(store.ledger.loadBalance()).toBe(9.5);
    expect(store.decisions.list()).toHaveLength(1);
    db.close();
  });
});
