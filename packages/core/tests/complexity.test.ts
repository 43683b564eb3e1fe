import { describe, it, expect } from 'vitest';
import { complexitySignal } from '../src/complexity.js';

describe('complexitySignal', () => {
  it('is zero for a single plain instruction', () => {
    expect(complexitySignal('Rename the config file')).toBe(0);
  });

  it('counts "and then" once, not also as "then"', () => {
    expect(complexitySignal('Fetch the data and then plot it')).toBe(1);
  });

  it('counts separators and numbered items', () => {
    expect(complexitySignal('1. fetch 2. clean; 3. plot')).toBe(4);
  });

  it('counts each coordination verb once', () => {
    expect(complexitySignal('Review the draft, review the tests and compare results')).toBe(2);
  });

  it('ignores case and extra whitespace', () => {
    expect(complexitySignal('Build it   AND   THEN ship it')).toBe(1);
  });
});
