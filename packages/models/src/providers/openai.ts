import OpenAI from 'openai';
import {
  ModelTier,
  type ChatMessage,
  type ModelRequest,
  type ModelResponse,
  type ModelProviderName,
  type ModelInfo,
  MODEL_PRICING,
  calculateCost,
  monotonicNow,
} from '@cairn/shared';
import { ModelProvider } from '../provider.js';

export interface OpenAIProviderConfig {
  apiKey: string;
  baseUrl?: string;
  slmModel?: string;
  llmModel?: string;
}

export class OpenAIProvider extends ModelProvider {
  readonly name: ModelProviderName = 'openai';
  readonly supportedTiers = [ModelTier.SLM, ModelTier.LLM];

  private client: OpenAI;
  private slmModel: string;
  private llmModel: string;

  constructor(config: OpenAIProviderConfig) {
    super();
    this.client = new OpenAI({ apiKey: config.apiKey, ...(config.baseUrl ? { baseURL: config.baseUrl } : {}) });
    this.slmModel = config.slmModel ?? 'gpt-4o-mini';
    this.llmModel = config.llmModel ?? 'gpt-4o';
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }

  modelFor(tier: ModelTier): string {
    return tier === ModelTier.LLM ? this.llmModel : this.slmModel;
  }

  async chat(request: ModelRequest): Promise<ModelResponse> {
    const startTime = monotonicNow();

    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
    if (request.system) {
      messages.push({ role: 'system', content: request.system });
    }
    for (const msg of request.messages) {
      messages.push(toMessageParam(msg));
    }

    const response = await this.client.chat.completions.create(
      {
        model: request.model,
        messages,
        max_tokens: request.maxTokens ?? 1024,
        temperature: request.temperature ?? 0.1,
        ...(request.responseFormat === 'json' ? { response_format: { type: 'json_object' as const } } : {}),
      },
      request.signal ? { signal: request.signal } : undefined,
    );

    const latencyMs = monotonicNow() - startTime;
    const choice = response.choices[0];
    const tokenUsage = {
      promptTokens: response.usage?.prompt_tokens ?? 0,
      completionTokens: response.usage?.completion_tokens ?? 0,
      totalTokens: response.usage?.total_tokens ?? 0,
    };

    return {
      model: request.model,
      provider: 'openai',
      tier: request.tier,
      content: choice?.message?.content ?? '',
      tokenUsage,
      latencyMs,
      costUsd: calculateCost(request.model, tokenUsage),
      finishReason: choice?.finish_reason === 'stop' ? 'stop' : 'length',
    };
  }

  async listModels(): Promise<ModelInfo[]> {
    return [
      {
        id: this.slmModel,
        name: 'GPT-4o Mini',
        tier: ModelTier.SLM,
        contextWindow: 128_000,
        costPerInputToken: (MODEL_PRICING[this.slmModel]?.inputPerMillion ?? 0.15) / 1_000_000,
        costPerOutputToken: (MODEL_PRICING[this.slmModel]?.outputPerMillion ?? 0.60) / 1_000_000,
      },
      {
        id: this.llmModel,
        name: 'GPT-4o',
        tier: ModelTier.LLM,
        contextWindow: 128_000,
        costPerInputToken: (MODEL_PRICING[this.llmModel]?.inputPerMillion ?? 2.50) / 1_000_000,
        costPerOutputToken: (MODEL_PRICING[this.llmModel]?.outputPerMillion ?? 10.00) / 1_000_000,
      },
    ];
  }

  estimateCost(promptTokens: number, model: string): number {
    const pricing = MODEL_PRICING[model];
    if (!pricing) return 0;
    return (promptTokens * (pricing.inputPerMillion + pricing.outputPerMillion)) / 1_000_000;
  }
}

function toMessageParam(msg: ChatMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (msg.role) {
    case 'system':
      return { role: 'system', content: msg.content };
    case 'assistant':
      return { role: 'assistant', content: msg.content };
    case 'user':
      return { role: 'user', content: msg.content };
  }
}
