import {
  CONFIDENCE_FAILURE_STEP,
  CONFIDENCE_SUCCESS_STEP,
} from '../constants.js';

/**
 * Success adds 0.1 (capped at 1), failure removes 0.2 (floored at 0).
 * Rounded to 6 places so repeated steps land on the same values however they are stored.
 */
export function nextConfidence(current: number, success: boolean): number {
  const raw = success
    ? Math.min(1, current + CONFIDENCE_SUCCESS_STEP)
    : Math.max(0, current - CONFIDENCE_FAILURE_STEP);
  return Math.round(raw * 1_000_000) / 1_000_000;
}
