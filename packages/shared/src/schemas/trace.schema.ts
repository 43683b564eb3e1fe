import { z } from 'zod';

export const executionModeSchema = z.enum(['CRYSTALLIZED', 'REPLAY', 'GUIDED', 'FRESH', 'COORDINATED']);

export const traceStepSchema = z.object({
  action: z.string().min(1),
  args: z.record(z.unknown()).optional(),
  note: z.string().optional(),
});

export const traceSchema = z.object({
  goalText: z.string().min(1),
  goalKey: z.string().min(1),
  steps: z.array(traceStepSchema),
  confidence: z.number().min(0).max(1),
  usageCount: z.number().int().nonnegative(),
  successCount: z.number().int().nonnegative(),
  failureCount: z.number().int().nonnegative(),
  costObserved: z.number().nonnegative(),
  timeObservedMs: z.number().nonnegative(),
  promotedRoutineRef: z.string().optional(),
  originMode: z.enum(['FRESH', 'COORDINATED']),
  outputSummary: z.string().optional(),
  createdAt: z.string(),
  lastUsedAt: z.string().optional(),
  lastUpdateId: z.string().optional(),
});
