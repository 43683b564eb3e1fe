import { createHash } from 'node:crypto';

export function normalizeGoal(goalText: string): string {
  return goalText.trim().toLowerCase().replace(/\s+/g, ' ');
}

/**
 * Fingerprint used for exact trace lookup. Case and whitespace differences
 * map to the same key.
 */
export function goalKeyFor(goalText: string): string {
  return createHash('sha256').update(normalizeGoal(goalText)).digest('hex').slice(0, 16);
}
