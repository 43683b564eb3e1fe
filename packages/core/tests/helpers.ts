import { z } from 'zod';
import {
  type ExecutionOutcome,
  type Trace,
  DEFAULT_MODE_COSTS,
  goalKeyFor,
} from '@cairn/shared';
import { allMigrations, createTestDatabase, runMigrations, storeFor, type CairnStore } from '@cairn/store';
import { ActionRegistry } from '../src/action-registry.js';
import { ActionStepReplayer } from '../src/step-replayer.js';
import { BudgetLedger } from '../src/budget-ledger.js';
import { SqliteTraceStore } from '../src/stores/sqlite-trace-store.js';
import { TraceMatcher } from '../src/trace-matcher.js';
import { getStrategy, type ModeStrategy } from '../src/mode-strategies.js';
import { createExecutors } from '../src/executors.js';
import { Dispatcher } from '../src/dispatcher.js';
import { DecisionLogger } from '../src/decision-logger.js';
import { RoutineRegistry } from '../src/crystallization/routine-registry.js';
import type { ReasoningExecutor, ReasoningRequest, TelemetrySink } from '../src/collaborators.js';

export function memoryStore(): CairnStore {
  const db = createTestDatabase();
  runMigrations(db, allMigrations);
  return storeFor(db);
}

export function makeTrace(goalText: string, overrides: Partial<Trace> = {}): Trace {
  return {
    goalText,
    goalKey: goalKeyFor(goalText),
    steps: [{ action: 'echo', args: { text: goalText } }],
    confidence: 0.75,
    usageCount: 0,
    successCount: 0,
    failureCount: 0,
    costObserved: 0.5,
    timeObservedMs: 10,
    originMode: 'FRESH',
    createdAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

/** `echo` returns its text; `fail` always throws. */
export function testActions(): ActionRegistry {
  const actions = new ActionRegistry();
  actions.register({
    name: 'echo',
    description: 'Return the given text',
    inputSchema: z.object({ text: z.string() }),
    execute: async ({ text }) => text,
  });
  actions.register({
    name: 'fail',
    description: 'Always fails',
    inputSchema: z.object({}),
    execute: async () => {
      throw new Error('boom');
    },
  });
  return actions;
}

/**
 * Reasoner that "plans" a single echo step and charges the configured
 * estimate for its mode, so ledger arithmetic matches the mode costs.
 */
export class ScriptedReasoner implements ReasoningExecutor {
  readonly calls: ReasoningRequest[] = [];

  constructor(private respond?: (request: ReasoningRequest) => Promise<ExecutionOutcome>) {}

  reason(request: ReasoningRequest): Promise<ExecutionOutcome> {
    this.calls.push(request);
    if (this.respond) return this.respond(request);
    return Promise.resolve({
      success: true,
      steps: [{ action: 'echo', args: { text: request.goal } }],
      cost: DEFAULT_MODE_COSTS[request.mode],
      durationMs: 5,
      output: 'done',
    });
  }
}

export interface Harness {
  dispatcher: Dispatcher;
  store: SqliteTraceStore;
  ledger: BudgetLedger;
  routines: RoutineRegistry;
  actions: ActionRegistry;
  reasoner: ScriptedReasoner;
  decisions: DecisionLogger;
}

export function createHarness(options: {
  balance?: number;
  reasoner?: ScriptedReasoner;
  strategy?: ModeStrategy;
  telemetry?: TelemetrySink;
  timeoutMs?: number;
} = {}): Harness {
  const db = memoryStore();
  const store = new SqliteTraceStore(db.traces);
  const ledger = new BudgetLedger({ initialBalance: options.balance ?? 10, persistence: db.ledger });
  const actions = testActions();
  const routines = new RoutineRegistry();
  const reasoner = options.reasoner ?? new ScriptedReasoner();
  const decisions = new DecisionLogger(db.decisions);
  const replayer = new ActionStepReplayer(actions);

  const dispatcher = new Dispatcher({
    store,
    matcher: new TraceMatcher({ store, semanticEnabled: false }),
    ledger,
    strategy: options.strategy ?? getStrategy('balanced'),
    executors: createExecutors({ reasoner, replayer, routines, actions }),
    telemetry: options.telemetry ?? decisions,
    ...(options.timeoutMs !== undefined ? { executionTimeoutMs: options.timeoutMs } : {}),
  });

  return { dispatcher, store, ledger, routines, actions, reasoner, decisions };
}
