import Anthropic from '@anthropic-ai/sdk';
import {
  ModelTier,
  type ModelRequest,
  type ModelResponse,
  type ModelProviderName,
  type ModelInfo,
  MODEL_PRICING,
  calculateCost,
  monotonicNow,
} from '@cairn/shared';
import { ModelProvider } from '../provider.js';

export interface AnthropicProviderConfig {
  apiKey: string;
  slmModel?: string;
  llmModel?: string;
}

export class AnthropicProvider extends ModelProvider {
  readonly name: ModelProviderName = 'anthropic';
  readonly supportedTiers = [ModelTier.SLM, ModelTier.LLM];

  private client: Anthropic;
  private slmModel: string;
  private llmModel: string;

  constructor(config: AnthropicProviderConfig) {
    super();
    this.client = new Anthropic({ apiKey: config.apiKey });
    this.slmModel = config.slmModel ?? 'claude-haiku-4-5-20251001';
    this.llmModel = config.llmModel ?? 'claude-sonnet-4-20250514';
  }

  async isAvailable(): Promise<boolean> {
    return true; // Cloud provider is always "available" if configured
  }

  modelFor(tier: ModelTier): string {
    return tier === ModelTier.LLM ? this.llmModel : this.slmModel;
  }

  async chat(request: ModelRequest): Promise<ModelResponse> {
    const startTime = monotonicNow();

    // System turns are folded into the system prompt; the API takes only user/assistant
    const systemParts = request.system ? [request.system] : [];
    const messages: Anthropic.MessageParam[] = [];
    for (const m of request.messages) {
      if (m.role === 'system') systemParts.push(m.content);
      else messages.push({ role: m.role, content: m.content });
    }

    const response = await this.client.messages.create(
      {
        model: request.model,
        max_tokens: request.maxTokens ?? 1024,
        ...(systemParts.length > 0 ? { system: systemParts.join('\n\n') } : {}),
        ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
        messages,
      },
      request.signal ? { signal: request.signal } : undefined,
    );

    const latencyMs = monotonicNow() - startTime;
    const tokenUsage = {
      promptTokens: response.usage.input_tokens,
      completionTokens: response.usage.output_tokens,
      totalTokens: response.usage.input_tokens + response.usage.output_tokens,
    };

    const content = response.content
      .filter((block): block is Anthropic.TextBlock => block.type === 'text')
      .map(block => block.text)
      .join('');

    return {
      model: request.model,
      provider: 'anthropic',
      tier: request.tier,
      content,
      tokenUsage,
      latencyMs,
      costUsd: calculateCost(request.model, tokenUsage),
      finishReason: response.stop_reason === 'end_turn' ? 'stop' : 'length',
    };
  }

  async listModels(): Promise<ModelInfo[]> {
    return [
      {
        id: this.slmModel,
        name: 'Claude Haiku 4.5',
        tier: ModelTier.SLM,
        contextWindow: 200_000,
        costPerInputToken: (MODEL_PRICING[this.slmModel]?.inputPerMillion ?? 0.80) / 1_000_000,
        costPerOutputToken: (MODEL_PRICING[this.slmModel]?.outputPerMillion ?? 4.00) / 1_000_000,
      },
      {
        id: this.llmModel,
        name: 'Claude Sonnet 4',
        tier: ModelTier.LLM,
        contextWindow: 200_000,
        costPerInputToken: (MODEL_PRICING[this.llmModel]?.inputPerMillion ?? 3.00) / 1_000_000,
        costPerOutputToken: (MODEL_PRICING[this.llmModel]?.outputPerMillion ?? 15.00) / 1_000_000,
      },
    ];
  }

  estimateCost(promptTokens: number, model: string): number {
    const pricing = MODEL_PRICING[model];
    if (!pricing) return 0;
    return (promptTokens * (pricing.inputPerMillion + pricing.outputPerMillion)) / 1_000_000;
  }
}
