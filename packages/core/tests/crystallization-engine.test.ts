import { describe, it, expect, beforeEach, vi, afterEach } from 'vitest';
import { type SynthesisResult, type Trace, PromotionValidationError, goalKeyFor } from '@cairn/shared';
import { SqliteTraceStore } from '../src/stores/sqlite-trace-store.js';
import { RoutineRegistry } from '../src/crystallization/routine-registry.js';
import { StepScriptSynthesizer } from '../src/crystallization/step-script-synthesizer.js';
import {
  CrystallizationEngine,
  CrystallizationScheduler,
  routineRefFor,
} from '../src/crystallization/crystallization-engine.js';
import type { RoutineSynthesizer } from '../src/collaborators.js';
import { makeTrace, memoryStore } from './helpers.js';

describe('CrystallizationEngine', () => {
  let store: SqliteTraceStore;
  let routines: RoutineRegistry;
  let engine: CrystallizationEngine;

  beforeEach(() => {
    store = new SqliteTraceStore(memoryStore().traces);
    routines = new RoutineRegistry();
    engine = new CrystallizationEngine({ store, synthesizer: new StepScriptSynthesizer(), routines });
  });

  describe('findCandidates', () => {
    it('keeps only unpromoted traces meeting both thresholds', async () => {
      await store.save(makeTrace('eligible', { usageCount: 5, confidence: 0.95 }));
      await store.save(makeTrace('rarely used', { usageCount: 4, confidence: 1 }));
      await store.save(makeTrace('unsure', { usageCount: 9, confidence: 0.9 }));
      await store.save(makeTrace('done', { usageCount: 9, confidence: 1, promotedRoutineRef: 'routine_x' }));

      const candidates = await engine.findCandidates();
      expect(candidates.map(c => c.trace.goalText)).toEqual(['eligible']);
    });

    it('ranks by weighted usage, cost and confidence', async () => {
      await store.save(makeTrace('busy', { usageCount: 10, costObserved: 0.25, confidence: 1 }));
      await store.save(makeTrace('pricey', { usageCount: 5, costObserved: 1, confidence: 0.95 }));

      const candidates = await engine.findCandidates();

      // busy: 0.5·1 + 0.3·0.25 + 0.2·1 = 0.775; pricey: 0.5·0.5 + 0.3·1 + 0.2·0.95 = 0.74
      expect(candidates.map(c => [c.trace.goalText, c.score])).toEqual([['busy', 0.775], ['pricey', 0.74]]);
    });

    it('accepts criteria overrides', async () => {
      await store.save(makeTrace('young', { usageCount: 2, confidence: 0.8 }));
      expect(await engine.findCandidates({ minUsage: 2, minConfidence: 0.8 })).toHaveLength(1);
    });
  });

  describe('promote', () => {
    it('registers a routine and marks the trace promoted', async () => {
      const trace = makeTrace('eligible', { usageCount: 5, confidence: 0.95 });
      await store.save(trace);

      const ref = await engine.promote(trace);

      expect(ref).toBe(routineRefFor(trace.goalKey));
      expect(ref).toBe(`routine_${goalKeyFor('eligible')}`);
      expect(routines.has(ref)).toBe(true);
      expect((await store.get(trace.goalKey))?.promotedRoutineRef).toBe(ref);
    });

    it('is idempotent', async () => {
      const trace = makeTrace('eligible');
      await store.save(trace);

      const first = await engine.promote(trace);
      const second = await engine.promote(trace);

      expect(second).toBe(first);
      expect(routines.list()).toEqual([first]);
    });

    it('rejects a routine that fails validation and leaves the trace unpromoted', async () => {
      const unsafe: RoutineSynthesizer = {
        synthesize: async (t: Trace): Promise<SynthesisResult> => ({
          valid: true,
          artifact: {
            source: 'async () => require("fs")',
            language: 'javascript',
            goalKey: t.goalKey,
            generatedAt: '2026-01-01T00:00:00.000Z',
          },
        }),
      };
      const strict = new CrystallizationEngine({ store, synthesizer: unsafe, routines });
      const trace = makeTrace('eligible');
      await store.save(trace);

      await expect(strict.promote(trace)).rejects.toBeInstanceOf(PromotionValidationError);
      expect(routines.list()).toEqual([]);
      expect((await store.get(trace.goalKey))?.promotedRoutineRef).toBeUndefined();
    });

    it('removes the routine again when the store cannot mark the trace', async () => {
      const trace = makeTrace('never saved');
      await expect(engine.promote(trace)).rejects.toThrow('Persistence promote failed');
      expect(routines.list()).toEqual([]);
    });
  });

  it('promotes eligible traces in a batch and reports each one', async () => {
    await store.save(makeTrace('a', { usageCount: 6, confidence: 1 }));
    await store.save(makeTrace('b', { usageCount: 5, confidence: 1, steps: [] }));

    const reports = await engine.crystallizeEligible();

    expect(reports).toEqual([
      { goalKey: goalKeyFor('a'), promoted: true, routineRef: routineRefFor(goalKeyFor('a')) },
      {
        goalKey: goalKeyFor('b'),
        promoted: false,
        error: `Routine for ${goalKeyFor('b')} failed validation: Trace has no recorded steps`,
      },
    ]);
  });

  it('restores routines of traces promoted by an earlier process', async () => {
    const trace = makeTrace('eligible', { promotedRoutineRef: routineRefFor(goalKeyFor('eligible')) });
    await store.save(trace);

    expect(await engine.restoreAll()).toEqual([]);
    expect(routines.has(routineRefFor(trace.goalKey))).toBe(true);
  });
});

describe('CrystallizationScheduler', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('runs a batch on each interval until stopped', async () => {
    vi.useFakeTimers();
    const store = new SqliteTraceStore(memoryStore().traces);
    const routines = new RoutineRegistry();
    const engine = new CrystallizationEngine({ store, synthesizer: new StepScriptSynthesizer(), routines });
    await store.save(makeTrace('a', { usageCount: 5, confidence: 1 }));

    const scheduler = new CrystallizationScheduler(engine, { intervalMs: 1000, batchLimit: 1 });
    scheduler.start();
    expect(scheduler.isRunning()).toBe(true);

    await vi.advanceTimersByTimeAsync(1000);
    expect(routines.list()).toEqual([routineRefFor(goalKeyFor('a'))]);

    scheduler.stop();
    expect(scheduler.isRunning()).toBe(false);
  });
});
