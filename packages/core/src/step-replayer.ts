import { type ActionResult, type TraceStep, errorMessage, monotonicNow } from '@cairn/shared';
import type { ActionRegistry } from './action-registry.js';
import type { ReplayResult, StepReplayer } from './collaborators.js';

/** Runs recorded steps in order through the action registry, stopping at the first failure. */
export class ActionStepReplayer implements StepReplayer {
  constructor(private actions: ActionRegistry) {}

  async replay(steps: TraceStep[], context: { goal: string; signal: AbortSignal }): Promise<ReplayResult> {
    const startTime = monotonicNow();
    let lastOutput: unknown;

    for (const [i, step] of steps.entries()) {
      if (context.signal.aborted) {
        return { success: false, error: 'Replay aborted', durationMs: monotonicNow() - startTime };
      }
      let result: ActionResult;
      try {
        result = await this.actions.invoke({ action: step.action, args: step.args ?? {} });
      } catch (err) {
        return { success: false, error: `Step ${i + 1}: ${errorMessage(err)}`, durationMs: monotonicNow() - startTime };
      }
      if (!result.success) {
        return {
          success: false,
          error: `Step ${i + 1} (${step.action}) failed: ${result.error ?? 'unknown error'}`,
          durationMs: monotonicNow() - startTime,
        };
      }
      lastOutput = result.output;
    }

    const output = renderOutput(lastOutput);
    return {
      success: true,
      durationMs: monotonicNow() - startTime,
      ...(output !== undefined ? { output } : {}),
    };
  }
}

export function renderOutput(value: unknown): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'string') return value;
  return JSON.stringify(value);
}
