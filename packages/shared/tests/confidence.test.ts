import { describe, it, expect } from 'vitest';
import { nextConfidence } from '../src/utils/confidence.js';
import { CONFIDENCE_PRIOR } from '../src/constants.js';

describe('nextConfidence', () => {
  it('adds 0.1 on success', () => {
    expect(nextConfidence(CONFIDENCE_PRIOR, true)).toBe(0.85);
    expect(nextConfidence(0.85, true)).toBe(0.95);
  });

  it('removes 0.2 on failure', () => {
    expect(nextConfidence(CONFIDENCE_PRIOR, false)).toBe(0.55);
    expect(nextConfidence(0.55, false)).toBe(0.35);
  });

  it('never exceeds 1.0 under repeated success', () => {
    let c = CONFIDENCE_PRIOR;
    for (let i = 0; i < 10; i++) c = nextConfidence(c, true);
    expect(c).toBe(1);
  });

  it('never drops below 0.0 under repeated failure', () => {
    let c = CONFIDENCE_PRIOR;
    for (let i = 0; i < 10; i++) c = nextConfidence(c, false);
    expect(c).toBe(0);
  });

  it('moves monotonically in the direction of the outcome', () => {
    let c = 0.4;
    for (let i = 0; i < 8; i++) {
      const next = nextConfidence(c, true);
      expect(next).toBeGreaterThanOrEqual(c);
      c = next;
    }
  });
});
