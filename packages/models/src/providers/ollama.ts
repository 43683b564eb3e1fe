import { z } from 'zod';
import {
  ModelTier,
  type ModelRequest,
  type ModelResponse,
  type ModelProviderName,
  type ModelInfo,
  monotonicNow,
} from '@cairn/shared';
import { ModelProvider } from '../provider.js';

const chatResponseSchema = z.object({
  model: z.string(),
  message: z.object({ role: z.string(), content: z.string() }).optional(),
  done: z.boolean(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});

export interface OllamaProviderConfig {
  baseUrl?: string;
  model?: string;
}

export class OllamaProvider extends ModelProvider {
  readonly name: ModelProviderName = 'ollama';
  readonly supportedTiers = [ModelTier.SLM];

  private baseUrl: string;
  private modelId: string;

  constructor(config: OllamaProviderConfig) {
    super();
    this.baseUrl = config.baseUrl ?? 'http://localhost:11434';
    this.modelId = config.model ?? 'llama3.2:3b';
  }

  /** Probes the local server; an unreachable server means unavailable. */
  async isAvailable(): Promise<boolean> {
    try {
      const res = await fetch(`${this.baseUrl}/api/tags`, {
        signal: AbortSignal.timeout(3000),
      });
      return res.ok;
    } catch {
      return false;
    }
  }

  modelFor(): string {
    return this.modelId;
  }

  async chat(request: ModelRequest): Promise<ModelResponse> {
    const startTime = monotonicNow();

    const messages: Array<{ role: string; content: string }> = [];
    if (request.system) {
      messages.push({ role: 'system', content: request.system });
    }
    for (const msg of request.messages) {
      messages.push({ role: msg.role, content: msg.content });
    }

    const body = {
      model: request.model || this.modelId,
      messages,
      stream: false,
      options: {
        temperature: request.temperature ?? 0.1,
        num_predict: request.maxTokens ?? 1024,
      },
      ...(request.responseFormat === 'json' ? { format: 'json' } : {}),
    };

    const res = await fetch(`${this.baseUrl}/api/chat`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
      ...(request.signal ? { signal: request.signal } : {}),
    });

    if (!res.ok) {
      const text = await res.text();
      throw new Error(`Ollama API error (${res.status}): ${text}`);
    }

    const data = chatResponseSchema.parse(await res.json());
    const latencyMs = monotonicNow() - startTime;
    const promptTokens = data.prompt_eval_count ?? 0;
    const completionTokens = data.eval_count ?? 0;

    return {
      model: data.model,
      provider: 'ollama',
      tier: ModelTier.SLM,
      content: data.message?.content ?? '',
      tokenUsage: {
        promptTokens,
        completionTokens,
        totalTokens: promptTokens + completionTokens,
      },
      latencyMs,
      costUsd: 0, // Local = free
      finishReason: data.done ? 'stop' : 'length',
    };
  }

  async listModels(): Promise<ModelInfo[]> {
    return [
      {
        id: this.modelId,
        name: this.modelId,
        tier: ModelTier.SLM,
        contextWindow: 8192,
        costPerInputToken: 0,
        costPerOutputToken: 0,
      },
    ];
  }

  estimateCost(): number {
    return 0;
  }
}
