import { z } from 'zod';
import {
  type ExecutionOutcome,
  type Logger,
  type ModelProviderName,
  ModelTier,
  ProviderNotAvailableError,
  errorMessage,
  monotonicNow,
  silentLogger,
  traceStepSchema,
} from '@cairn/shared';
import type { ModelProviderRegistry } from '@cairn/models';
import type { ReasoningExecutor, ReasoningRequest, StepReplayer } from '../collaborators.js';
import { buildReasoningSystemPrompt } from './prompts.js';
import { extractJson } from './json.js';

const planSchema = z.object({
  steps: z.array(traceStepSchema).default([]),
  answer: z.string().optional(),
});

export interface ModelReasoningExecutorOptions {
  providers: ModelProviderRegistry;
  replayer: StepReplayer;
  priority: ModelProviderName[];
  maxTokens?: number;
  logger?: Logger;
}

/**
 * Asks a model for a JSON plan of actions, then runs the plan. GUIDED goes
 * to the small-model tier; FRESH and COORDINATED prefer the large one.
 */
export class ModelReasoningExecutor implements ReasoningExecutor {
  private providers: ModelProviderRegistry;
  private replayer: StepReplayer;
  private priority: ModelProviderName[];
  private maxTokens: number;
  private logger: Logger;

  constructor(options: ModelReasoningExecutorOptions) {
    this.providers = options.providers;
    this.replayer = options.replayer;
    this.priority = options.priority;
    this.maxTokens = options.maxTokens ?? 2048;
    this.logger = options.logger ?? silentLogger;
  }

  async reason(request: ReasoningRequest): Promise<ExecutionOutcome> {
    const startTime = monotonicNow();
    const preferred = request.mode === 'GUIDED' ? ModelTier.SLM : ModelTier.LLM;

    let tier = preferred;
    let provider = await this.providers.pick(this.priority, tier);
    if (!provider && tier === ModelTier.LLM) {
      tier = ModelTier.SLM;
      provider = await this.providers.pick(this.priority, tier);
    }
    if (!provider) {
      throw new ProviderNotAvailableError(this.priority.join(', '));
    }

    const response = await provider.chat({
      model: provider.modelFor(tier),
      provider: provider.name,
      tier,
      system: buildReasoningSystemPrompt(request),
      messages: [{ role: 'user', content: request.goal }],
      maxTokens: this.maxTokens,
      temperature: 0.1,
      responseFormat: 'json',
      signal: request.signal,
    });
    this.logger.debug('Reasoning response', {
      mode: request.mode,
      provider: response.provider,
      model: response.model,
      costUsd: response.costUsd,
    });

    let plan: z.infer<typeof planSchema>;
    try {
      plan = planSchema.parse(extractJson(response.content));
    } catch (err) {
      return {
        success: false,
        steps: [],
        cost: response.costUsd,
        durationMs: monotonicNow() - startTime,
        error: `Model returned an unusable plan: ${errorMessage(err)}`,
      };
    }

    const replay = await this.replayer.replay(plan.steps, { goal: request.goal, signal: request.signal });
    const output = plan.answer ?? replay.output;
    return {
      success: replay.success,
      steps: plan.steps,
      cost: response.costUsd,
      durationMs: monotonicNow() - startTime,
      ...(output !== undefined ? { output } : {}),
      ...(replay.error !== undefined ? { error: replay.error } : {}),
    };
  }
}
