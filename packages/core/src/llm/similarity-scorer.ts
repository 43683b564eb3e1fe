import { z } from 'zod';
import {
  type ModelProviderName,
  type Trace,
  ModelTier,
  ProviderNotAvailableError,
} from '@cairn/shared';
import type { ModelProvider, ModelProviderRegistry } from '@cairn/models';
import type { SimilarityScorer } from '../collaborators.js';
import { buildSimilarityPrompt } from './prompts.js';
import { extractJson } from './json.js';

const scoresSchema = z.object({ scores: z.array(z.number()) });

/** Small-model similarity judge over candidate goal texts. */
export class ModelSimilarityScorer implements SimilarityScorer {
  constructor(
    private providers: ModelProviderRegistry,
    private priority: ModelProviderName[],
  ) {}

  async isAvailable(): Promise<boolean> {
    return (await this.pickProvider()) !== undefined;
  }

  async score(goal: string, candidates: Trace[]): Promise<number[]> {
    if (candidates.length === 0) return [];
    const provider = await this.pickProvider();
    if (!provider) {
      throw new ProviderNotAvailableError(this.priority.join(', '));
    }

    const prompt = buildSimilarityPrompt(goal, candidates);
    const response = await provider.chat({
      model: provider.modelFor(ModelTier.SLM),
      provider: provider.name,
      tier: ModelTier.SLM,
      system: prompt.system,
      messages: [{ role: 'user', content: prompt.user }],
      maxTokens: 512,
      temperature: 0,
      responseFormat: 'json',
    });

    const { scores } = scoresSchema.parse(extractJson(response.content));
    if (scores.length !== candidates.length) {
      throw new Error(`Expected ${candidates.length} scores, got ${scores.length}`);
    }
    return scores.map(s => Math.min(1, Math.max(0, s)));
  }

  private pickProvider(): Promise<ModelProvider | undefined> {
    return this.providers.pick(this.priority, ModelTier.SLM);
  }
}
