import { describe, it, expect } from 'vitest';
import type { MatchResult, ModeContext, Trace } from '@cairn/shared';
import { ForcedModeStrategy, getStrategy } from '../src/mode-strategies.js';
import { makeTrace } from './helpers.js';

const budget = { balance: 10, reserved: 0, available: 10, totalSpent: 0 };

function context(trace: Trace | null, confidence: number, complexity = 0): ModeContext {
  const match: MatchResult = {
    trace,
    confidence,
    tier: trace ? 'exact' : 'none',
    degraded: false,
    warnings: [],
  };
  return { goal: 'goal', match, budget, complexity };
}

describe('balanced strategy', () => {
  const strategy = getStrategy('balanced');
  const trace = makeTrace('goal');

  it('selects by confidence band', () => {
    expect(strategy.select(context(trace, 0.92)).mode).toBe('REPLAY');
    expect(strategy.select(context(trace, 0.91)).mode).toBe('GUIDED');
    expect(strategy.select(context(trace, 0.75)).mode).toBe('GUIDED');
    expect(strategy.select(context(trace, 0.74)).mode).toBe('FRESH');
    expect(strategy.select(context(null, 0)).mode).toBe('FRESH');
  });

  it('prefers the routine of a crystallized trace', () => {
    const promoted = makeTrace('goal', { promotedRoutineRef: 'routine_1' });
    const decision = strategy.select(context(promoted, 0.6));
    expect(decision.mode).toBe('CRYSTALLIZED');
    expect(decision.estimatedCost).toBe(0);
    expect(decision.traceRef).toBe(promoted.goalKey);
  });

  it('coordinates complex goals with no usable trace', () => {
    expect(strategy.select(context(null, 0, 3)).mode).toBe('COORDINATED');
    expect(strategy.select(context(null, 0, 2)).mode).toBe('FRESH');
  });

  it('explains its choice', () => {
    expect(strategy.select(context(trace, 0.95)).reasoning).toBe('Confidence 0.95 ≥ replay threshold 0.92');
    expect(strategy.select(context(null, 0, 3)).reasoning).toBe('No matching trace; complexity 3 > 2');
  });

  it('is deterministic', () => {
    const ctx = context(trace, 0.8, 1);
    expect(strategy.select(ctx)).toEqual(strategy.select(ctx));
  });

  it('takes threshold overrides', () => {
    const strict = getStrategy('auto', { thresholds: { replayThreshold: 0.99 } });
    expect(strict.name).toBe('balanced');
    expect(strict.select(context(trace, 0.95)).mode).toBe('GUIDED');
  });
});

describe('named strategies', () => {
  const trace = makeTrace('goal');

  it('cost-optimized replays earlier and never coordinates', () => {
    const strategy = getStrategy('cost-optimized');
    expect(strategy.select(context(trace, 0.75)).mode).toBe('REPLAY');
    expect(strategy.select(context(trace, 0.5)).mode).toBe('GUIDED');
    expect(strategy.select(context(null, 0, 10)).mode).toBe('FRESH');
  });

  it('speed-optimized replays from 0.85', () => {
    const strategy = getStrategy('speed-optimized');
    expect(strategy.select(context(trace, 0.85)).mode).toBe('REPLAY');
    expect(strategy.select(context(trace, 0.84)).mode).toBe('GUIDED');
  });

  it('forced strategies pin the mode', () => {
    expect(getStrategy('forced-fresh').select(context(trace, 1)).mode).toBe('FRESH');
    expect(getStrategy('forced-replay').select(context(trace, 0.1)).mode).toBe('REPLAY');
  });
});

describe('ForcedModeStrategy', () => {
  it('falls back to REPLAY when CRYSTALLIZED is forced on an unpromoted trace', () => {
    const decision = new ForcedModeStrategy('CRYSTALLIZED').select(context(makeTrace('goal'), 0.9));
    expect(decision.mode).toBe('REPLAY');
    expect(decision.reasoning).toBe('Mode forced to CRYSTALLIZED; trace is not crystallized, replaying its steps');
  });

  it('only references a trace for trace modes', () => {
    const decision = new ForcedModeStrategy('FRESH').select(context(makeTrace('goal'), 0.9));
    expect(decision.traceRef).toBeUndefined();
    expect(decision.estimatedCost).toBe(0.5);
  });
});
