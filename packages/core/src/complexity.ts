import { COORDINATION_CUES, SEQUENCING_CUES, normalizeGoal } from '@cairn/shared';

// Longest first, so "and then" is consumed before "then" can count again
const SEQUENCING_PATTERNS = [...SEQUENCING_CUES]
  .sort((a, b) => b.length - a.length)
  .map(cue => new RegExp(`\\b${cue.replace(/ /g, '\\s+')}\\b`, 'g'));

const COORDINATION_PATTERNS = COORDINATION_CUES.map(verb => new RegExp(`\\b${verb}\\w*`));

const NUMBERED_ITEM = /(?:^|\s)\d+[.)](?=\s)/g;

/**
 * Counts structural cues that suggest a goal spans several sub-goals:
 * sequencing phrases, `;` separators, numbered items, and distinct
 * coordination verbs.
 */
export function complexitySignal(goal: string): number {
  let text = normalizeGoal(goal);
  let count = 0;

  for (const pattern of SEQUENCING_PATTERNS) {
    const hits = text.match(pattern);
    if (hits) {
      count += hits.length;
      text = text.replace(pattern, ' ');
    }
  }

  count += (text.match(/;/g) ?? []).length;
  count += (text.match(NUMBERED_ITEM) ?? []).length;

  for (const pattern of COORDINATION_PATTERNS) {
    if (pattern.test(text)) count += 1;
  }

  return count;
}
