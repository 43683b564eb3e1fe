import { type SynthesisResult, type Trace, isoNow } from '@cairn/shared';
import type { RoutineSynthesizer } from '../collaborators.js';

/**
 * Turns a trace's recorded steps into a routine that calls the same actions
 * with the same arguments. No model involved: the same trace always yields
 * the same source.
 */
export class StepScriptSynthesizer implements RoutineSynthesizer {
  async synthesize(trace: Trace): Promise<SynthesisResult> {
    const artifact = {
      source: renderRoutineSource(trace),
      language: 'javascript' as const,
      goalKey: trace.goalKey,
      generatedAt: isoNow(),
      description: `Crystallized from ${trace.steps.length} recorded step(s) for "${trace.goalText}"`,
    };

    if (trace.steps.length === 0) {
      return { artifact, valid: false, issues: ['Trace has no recorded steps'] };
    }
    return { artifact, valid: true };
  }
}

export function renderRoutineSource(trace: Trace): string {
  const calls = trace.steps.map(
    step => `  result = await actions.invoke(${JSON.stringify(step.action)}, ${JSON.stringify(step.args ?? {})});`,
  );
  return [
    'async (goal, actions) => {',
    '  let result;',
    ...calls,
    '  return { output: typeof result === "string" ? result : JSON.stringify(result) };',
    '}',
  ].join('\n');
}
