import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { type Trace, PersistenceError, goalKeyFor } from '@cairn/shared';
import type { TraceStore } from '../src/stores/trace-store.js';
import { createTrace } from '../src/stores/trace-store.js';
import { SqliteTraceStore } from '../src/stores/sqlite-trace-store.js';
import { MarkdownTraceStore, parseTraceFile, renderTraceFile } from '../src/stores/markdown-trace-store.js';
import { makeTrace, memoryStore } from './helpers.js';

let tempDir = '';

beforeEach(async () => {
  tempDir = await mkdtemp(join(tmpdir(), 'cairn-traces-'));
});

afterEach(async () => {
  await rm(tempDir, { recursive: true, force: true });
});

const backends: Array<[string, () => TraceStore]> = [
  ['sqlite', () => new SqliteTraceStore(memoryStore().traces)],
  ['markdown', () => new MarkdownTraceStore(tempDir)],
];

describe.each(backends)('%s trace store', (_name, createStore) => {
  let store: TraceStore;

  beforeEach(() => {
    store = createStore();
  });

  it('round-trips every field', async () => {
    const trace = makeTrace('Export the monthly invoices', {
      steps: [
        { action: 'query', args: { month: 3, paid: true, tags: ['a', 'b'] }, note: 'fetch rows' },
        { action: 'write_csv' },
      ],
      confidence: 0.85,
      usageCount: 2,
      successCount: 2,
      costObserved: 0.25,
      timeObservedMs: 1234,
      promotedRoutineRef: 'routine_abc',
      originMode: 'COORDINATED',
      outputSummary: 'wrote 12 rows',
      lastUsedAt: '2026-02-01T00:00:00.000Z',
      lastUpdateId: 'att-7',
    });

    await store.save(trace);

    expect(await store.findExact('Export the monthly invoices')).toEqual(trace);
  });

  it('finds a trace regardless of case and spacing', async () => {
    await store.save(makeTrace('Export the monthly invoices'));
    const found = await store.findExact('  export THE monthly   invoices ');
    expect(found?.goalKey).toBe(goalKeyFor('Export the monthly invoices'));
  });

  it('returns null for an unknown goal', async () => {
    expect(await store.findExact('never seen')).toBeNull();
  });

  it('lists candidates most recently used first', async () => {
    await store.save(makeTrace('a', { createdAt: '2026-01-01T00:00:00.000Z' }));
    await store.save(makeTrace('b', { createdAt: '2026-01-02T00:00:00.000Z' }));
    await store.save(makeTrace('c', { createdAt: '2026-01-01T00:00:00.000Z', lastUsedAt: '2026-01-03T00:00:00.000Z' }));

    const recent = await store.listCandidates(2);
    expect(recent.map(t => t.goalText)).toEqual(['c', 'b']);
  });

  it('updates counters and confidence on reuse', async () => {
    await store.save(makeTrace('Tidy the inbox'));
    const key = goalKeyFor('Tidy the inbox');

    await store.recordReuse(key, { success: true, cost: 0.25, durationMs: 40 });
    const updated = await store.recordReuse(key, { success: false, cost: 0, durationMs: 15 });

    expect(updated.confidence).toBe(0.65);
    expect(updated.usageCount).toBe(2);
    expect(updated.successCount).toBe(1);
    expect(updated.failureCount).toBe(1);
    expect(updated.costObserved).toBe(0.25);
    expect(updated.timeObservedMs).toBe(15);
    expect(updated.lastUsedAt).toBeDefined();
  });

  it('applies concurrent reuses without losing any', async () => {
    await store.save(makeTrace('Tidy the inbox'));
    const key = goalKeyFor('Tidy the inbox');

    await Promise.all(
      Array.from({ length: 5 }, () => store.recordReuse(key, { success: true, cost: 0, durationMs: 1 })),
    );

    const trace = await store.get(key);
    expect(trace?.usageCount).toBe(5);
    expect(trace?.confidence).toBe(1);
  });

  it('ignores a repeated attempt id', async () => {
    const trace = makeTrace('Tidy the inbox');
    await store.save(trace);

    await store.updateConfidence(trace, true, 'att-1');
    const again = await store.updateConfidence(trace, true, 'att-1');

    expect(again.confidence).toBe(0.85);
  });

  it('rejects reuse of an unknown key', async () => {
    await expect(store.recordReuse('missing', { success: true, cost: 0, durationMs: 1 }))
      .rejects.toBeInstanceOf(PersistenceError);
  });

  it('keeps a promoted trace when a fresh run records the same goal', async () => {
    await store.save(makeTrace('Tidy the inbox', { promotedRoutineRef: 'routine_1', confidence: 1 }));

    const kept = await store.recordFresh(createTrace({
      goalText: 'Tidy the inbox',
      steps: [],
      originMode: 'FRESH',
      cost: 0.5,
      durationMs: 10,
    }));

    expect(kept.promotedRoutineRef).toBe('routine_1');
    expect(kept.confidence).toBe(1);
  });

  it('marks a trace promoted once', async () => {
    await store.save(makeTrace('Tidy the inbox'));
    const key = goalKeyFor('Tidy the inbox');

    await store.markPromoted(key, 'routine_1');
    const again = await store.markPromoted(key, 'routine_1');

    expect(again.promotedRoutineRef).toBe('routine_1');
    await expect(store.markPromoted('missing', 'routine_2')).rejects.toBeInstanceOf(PersistenceError);
  });
});

describe('trace files', () => {
  it('renders front matter that parses back to the trace', () => {
    const trace: Trace = makeTrace('Tidy the inbox', { outputSummary: 'done: 3 archived' });
    expect(parseTraceFile(renderTraceFile(trace))).toEqual(trace);
  });

  it('writes a readable step list below the front matter', async () => {
    const store = new MarkdownTraceStore(tempDir);
    await store.save(makeTrace('Tidy the inbox', { steps: [{ action: 'archive', args: { older: 30 }, note: 'old mail' }] }));

    const content = await readFile(join(tempDir, `${goalKeyFor('Tidy the inbox')}.md`), 'utf-8');
    expect(content).toContain('# Tidy the inbox\n');
    expect(content).toContain('1. `archive` {"older":30}: old mail\n');
  });

  it('surfaces a corrupt file as a persistence error', async () => {
    const store = new MarkdownTraceStore(tempDir);
    await writeFile(join(tempDir, `${goalKeyFor('broken')}.md`), 'no front matter here', 'utf-8');

    await expect(store.findExact('broken')).rejects.toBeInstanceOf(PersistenceError);
  });
});
