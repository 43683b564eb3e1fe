import type { Trace } from '@cairn/shared';
import type { ReasoningRequest } from '../collaborators.js';

const PLAN_FORMAT = `Respond with ONLY a raw JSON object (no markdown, no code fences):
{"steps": [{"action": "<action name>", "args": {...}, "note": "<why>"}], "answer": "<final answer, optional>"}
Use only the listed actions. An empty "steps" list is valid when the answer needs no actions.`;

export function buildReasoningSystemPrompt(request: ReasoningRequest): string {
  const actions = request.actions.length > 0
    ? request.actions.map(a => `- ${a.name}: ${a.description}`).join('\n')
    : '(none)';

  const sections = [
    'You plan the concrete actions that accomplish a goal.',
    `Available actions:\n${actions}`,
  ];

  if (request.mode === 'GUIDED' && request.guidance) {
    sections.push(
      'A previous, similar goal was solved with the steps below. Reuse them, adapting arguments only where the new goal differs.',
      renderTrace(request.guidance),
    );
  }

  if (request.mode === 'COORDINATED' && request.delegates && request.delegates.length > 0) {
    const delegates = request.delegates
      .map(d => `- ${d.name} [${d.capabilities.join(', ')}]: ${d.prompt}`)
      .join('\n');
    sections.push(
      'The goal has several parts. Split it between these specialists and merge their work into one ordered step list; prefix each step note with the specialist responsible.',
      delegates,
    );
  }

  sections.push(PLAN_FORMAT);
  return sections.join('\n\n');
}

export function buildSimilarityPrompt(goal: string, candidates: Trace[]): { system: string; user: string } {
  const list = candidates.map((c, i) => `${i + 1}. ${c.goalText}`).join('\n');
  return {
    system: `You compare a new goal with previously solved goals. For each numbered goal, give a similarity score in [0, 1]: 1 means the same steps would solve both, 0 means unrelated.
Respond with ONLY a raw JSON object: {"scores": [<one number per goal, in order>]}`,
    user: `New goal: ${goal}\n\nSolved goals:\n${list}`,
  };
}

function renderTrace(trace: Trace): string {
  const steps = trace.steps
    .map((s, i) => `${i + 1}. ${s.action} ${JSON.stringify(s.args ?? {})}${s.note ? ` (${s.note})` : ''}`)
    .join('\n');
  return `Previous goal: ${trace.goalText}\nSteps:\n${steps}`;
}
