import {
  type ExecutionMode,
  type ExecutionOutcome,
  type ExecutionRequest,
  ExecutorFailure,
  RoutineNotFoundError,
  errorMessage,
  monotonicNow,
} from '@cairn/shared';
import type { ModeExecutor, ReasoningExecutor, StepReplayer } from './collaborators.js';
import type { ActionRegistry } from './action-registry.js';
import type { AgentRegistry } from './agent-registry.js';
import type { RoutineActions, RoutineRegistry } from './crystallization/routine-registry.js';
import { renderOutput } from './step-replayer.js';

function requireTrace(request: ExecutionRequest, mode: ExecutionMode) {
  if (!request.trace) {
    throw new ExecutorFailure(mode, 'no matched trace');
  }
  return request.trace;
}

/** Runs the trace's compiled routine. Never costs anything. */
export class CrystallizedExecutor implements ModeExecutor {
  readonly mode = 'CRYSTALLIZED' as const;

  constructor(private routines: RoutineRegistry, private actions: ActionRegistry) {}

  async execute(request: ExecutionRequest): Promise<ExecutionOutcome> {
    const trace = requireTrace(request, this.mode);
    const ref = trace.promotedRoutineRef;
    if (!ref) throw new ExecutorFailure(this.mode, `trace ${trace.goalKey} is not crystallized`);

    // Snapshot once: a registration racing this dispatch does not affect it
    const routine = this.routines.snapshot().get(ref);
    if (!routine) throw new RoutineNotFoundError(ref);

    const startTime = monotonicNow();
    const bridge: RoutineActions = {
      invoke: async (action, args = {}) => {
        if (request.signal.aborted) throw new Error('Routine aborted');
        const result = await this.actions.invoke({ action, args });
        if (!result.success) throw new Error(`${action} failed: ${result.error ?? 'unknown error'}`);
        return result.output;
      },
    };

    try {
      const output = routineOutput(await routine.run(request.goal, bridge));
      return {
        success: true,
        steps: trace.steps,
        cost: 0,
        durationMs: monotonicNow() - startTime,
        ...(output !== undefined ? { output } : {}),
      };
    } catch (err) {
      return {
        success: false,
        steps: trace.steps,
        cost: 0,
        durationMs: monotonicNow() - startTime,
        error: errorMessage(err),
      };
    }
  }
}

/** Replays the recorded steps verbatim. Never costs anything. */
export class ReplayExecutor implements ModeExecutor {
  readonly mode = 'REPLAY' as const;

  constructor(private replayer: StepReplayer) {}

  async execute(request: ExecutionRequest): Promise<ExecutionOutcome> {
    const trace = requireTrace(request, this.mode);
    const result = await this.replayer.replay(trace.steps, { goal: request.goal, signal: request.signal });
    return {
      success: result.success,
      steps: trace.steps,
      cost: 0,
      durationMs: result.durationMs,
      ...(result.output !== undefined ? { output: result.output } : {}),
      ...(result.error !== undefined ? { error: result.error } : {}),
    };
  }
}

/** FRESH, GUIDED and COORDINATED all go through the reasoning backend. */
export class ReasoningModeExecutor implements ModeExecutor {
  constructor(
    readonly mode: Extract<ExecutionMode, 'FRESH' | 'GUIDED' | 'COORDINATED'>,
    private reasoner: ReasoningExecutor,
    private actions: ActionRegistry,
    private agents?: AgentRegistry,
  ) {}

  execute(request: ExecutionRequest): Promise<ExecutionOutcome> {
    const guidance = this.mode === 'GUIDED' ? requireTrace(request, this.mode) : undefined;
    const delegates = this.mode === 'COORDINATED'
      ? request.delegates ?? this.agents?.list() ?? []
      : undefined;

    return this.reasoner.reason({
      goal: request.goal,
      mode: this.mode,
      actions: this.actions.describe(),
      signal: request.signal,
      ...(guidance ? { guidance } : {}),
      ...(delegates ? { delegates } : {}),
    });
  }
}

export type ExecutorTable = Record<ExecutionMode, ModeExecutor>;

export interface DefaultExecutorDeps {
  reasoner: ReasoningExecutor;
  replayer: StepReplayer;
  routines: RoutineRegistry;
  actions: ActionRegistry;
  agents?: AgentRegistry;
}

export function createExecutors(deps: DefaultExecutorDeps): ExecutorTable {
  return {
    CRYSTALLIZED: new CrystallizedExecutor(deps.routines, deps.actions),
    REPLAY: new ReplayExecutor(deps.replayer),
    GUIDED: new ReasoningModeExecutor('GUIDED', deps.reasoner, deps.actions, deps.agents),
    FRESH: new ReasoningModeExecutor('FRESH', deps.reasoner, deps.actions, deps.agents),
    COORDINATED: new ReasoningModeExecutor('COORDINATED', deps.reasoner, deps.actions, deps.agents),
  };
}

function routineOutput(value: unknown): string | undefined {
  if (typeof value === 'object' && value !== null && 'output' in value) {
    return renderOutput(value.output);
  }
  return renderOutput(value);
}
