import { describe, it, expect } from 'vitest';
import { ModelTier } from '@cairn/shared';
import type { ModelProviderName, ModelRequest, ModelResponse, ModelInfo } from '@cairn/shared';
import { ModelProvider } from '../src/provider.js';
import { ModelProviderRegistry } from '../src/registry.js';

class StubProvider extends ModelProvider {
  constructor(
    readonly name: ModelProviderName,
    readonly supportedTiers: ModelTier[],
    private available: boolean,
  ) {
    super();
  }

  async isAvailable(): Promise<boolean> {
    return this.available;
  }

  async chat(request: ModelRequest): Promise<ModelResponse> {
    return {
      model: request.model,
      provider: this.name,
      tier: request.tier,
      content: 'ok',
      tokenUsage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
      latencyMs: 0,
      costUsd: 0,
      finishReason: 'stop',
    };
  }

  async listModels(): Promise<ModelInfo[]> {
    return [];
  }

  estimateCost(): number {
    return 0;
  }

  modelFor(): string {
    return `${this.name}-model`;
  }
}

describe('ModelProviderRegistry', () => {
  it('registers and looks up providers by name', () => {
    const registry = new ModelProviderRegistry();
    const ollama = new StubProvider('ollama', [ModelTier.SLM], true);
    registry.register(ollama);

    expect(registry.has('ollama')).toBe(true);
    expect(registry.has('openai')).toBe(false);
    expect(registry.get('ollama')).toBe(ollama);
    expect(registry.listAll()).toEqual([ollama]);
  });

  it('returns only available providers for a tier', async () => {
    const registry = new ModelProviderRegistry();
    registry.register(new StubProvider('ollama', [ModelTier.SLM], true));
    registry.register(new StubProvider('openai', [ModelTier.SLM, ModelTier.LLM], false));
    registry.register(new StubProvider('anthropic', [ModelTier.SLM, ModelTier.LLM], true));

    const llm = await registry.getAvailable(ModelTier.LLM);
    expect(llm.map(p => p.name)).toEqual(['anthropic']);
  });

  it('picks the first available provider in priority order', async () => {
    const registry = new ModelProviderRegistry();
    registry.register(new StubProvider('ollama', [ModelTier.SLM], true));
    registry.register(new StubProvider('openai', [ModelTier.SLM, ModelTier.LLM], false));
    registry.register(new StubProvider('anthropic', [ModelTier.SLM, ModelTier.LLM], true));

    expect((await registry.pick(['openai', 'ollama', 'anthropic'], ModelTier.SLM))?.name).toBe('ollama');
    expect((await registry.pick(['openai', 'ollama', 'anthropic'], ModelTier.LLM))?.name).toBe('anthropic');
    expect(await registry.pick(['openai'], ModelTier.SLM)).toBeUndefined();
  });
});
