import { z } from 'zod';
import {
  type ActionDefinition,
  type ActionInvocation,
  type ActionResult,
  ActionNotFoundError,
  errorMessage,
  monotonicNow,
} from '@cairn/shared';
import type { ActionSummary } from './collaborators.js';

interface RegisteredAction {
  definition: ActionDefinition;
  source: 'builtin' | 'programmatic';
}

export class ActionRegistry {
  private actions = new Map<string, RegisteredAction>();

  register<TInput, TOutput>(
    action: ActionDefinition<TInput, TOutput>,
    source: 'builtin' | 'programmatic' = 'programmatic',
  ): void {
    const definition: ActionDefinition = {
      name: action.name,
      description: action.description,
      inputSchema: action.inputSchema,
      // Input is always parsed by inputSchema before execute runs
      execute: input => action.execute(action.inputSchema.parse(input)),
      ...(action.timeoutMs !== undefined ? { timeoutMs: action.timeoutMs } : {}),
    };
    this.actions.set(action.name, { definition, source });
  }

  get(name: string): ActionDefinition | undefined {
    return this.actions.get(name)?.definition;
  }

  has(name: string): boolean {
    return this.actions.has(name);
  }

  list(): ActionDefinition[] {
    return Array.from(this.actions.values()).map(a => a.definition);
  }

  listNames(): string[] {
    return Array.from(this.actions.keys());
  }

  /** Names, descriptions and argument shapes, for model prompts. */
  describe(): ActionSummary[] {
    return this.list().map(a => {
      const args = describeArgs(a.inputSchema);
      return {
        name: a.name,
        description: args ? `${a.description} | Args: ${args}` : a.description,
      };
    });
  }

  /** Unknown actions throw; failures while running are returned in the result. */
  async invoke(invocation: ActionInvocation): Promise<ActionResult> {
    const registered = this.actions.get(invocation.action);
    if (!registered) {
      throw new ActionNotFoundError(invocation.action);
    }

    const action = registered.definition;
    const startTime = monotonicNow();
    const timeoutMs = invocation.timeoutMs ?? action.timeoutMs ?? 30_000;
    let timer: NodeJS.Timeout | undefined;

    try {
      const parsedInput = action.inputSchema.parse(invocation.args);

      const output = await Promise.race([
        action.execute(parsedInput),
        new Promise<never>((_, reject) => {
          timer = setTimeout(() => reject(new Error(`Action timed out after ${timeoutMs}ms`)), timeoutMs);
        }),
      ]);

      return {
        action: invocation.action,
        success: true,
        output,
        durationMs: monotonicNow() - startTime,
      };
    } catch (error) {
      return {
        action: invocation.action,
        success: false,
        error: errorMessage(error),
        durationMs: monotonicNow() - startTime,
      };
    } finally {
      clearTimeout(timer);
    }
  }

  unregister(name: string): boolean {
    return this.actions.delete(name);
  }

  clear(): void {
    this.actions.clear();
  }
}

function describeArgs(schema: z.ZodTypeAny): string {
  if (!(schema instanceof z.ZodObject)) return '';
  const shape: z.ZodRawShape = schema.shape;
  return Object.entries(shape)
    .map(([key, value]) => {
      const type = typeName(value);
      return value.description ? `${key} (${type}): ${value.description}` : `${key} (${type})`;
    })
    .join(', ');
}

function typeName(schema: z.ZodTypeAny): string {
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodDefault) {
    return `${typeName(schema._def.innerType)}?`;
  }
  if (schema instanceof z.ZodString) return 'string';
  if (schema instanceof z.ZodNumber) return 'number';
  if (schema instanceof z.ZodBoolean) return 'boolean';
  if (schema instanceof z.ZodArray) return 'array';
  if (schema instanceof z.ZodObject || schema instanceof z.ZodRecord) return 'object';
  if (schema instanceof z.ZodEnum) return 'enum';
  return 'value';
}
