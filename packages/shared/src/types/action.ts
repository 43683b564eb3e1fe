import type { z } from 'zod';

export interface ActionDefinition<TInput = unknown, TOutput = unknown> {
  name: string;
  description: string;
  /** Input side is left open so schemas with defaults or preprocessing fit */
  inputSchema: z.ZodType<TInput, z.ZodTypeDef, unknown>;
  execute: (input: TInput) => Promise<TOutput>;
  timeoutMs?: number;
}

export interface ActionInvocation {
  action: string;
  args: Record<string, unknown>;
  timeoutMs?: number;
}

export interface ActionResult {
  action: string;
  success: boolean;
  output?: unknown;
  error?: string;
  durationMs: number;
}
