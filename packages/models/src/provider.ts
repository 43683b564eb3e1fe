import type {
  ModelRequest,
  ModelResponse,
  ModelProviderName,
  ModelTier,
  ModelInfo,
} from '@cairn/shared';

export abstract class ModelProvider {
  abstract readonly name: ModelProviderName;
  abstract readonly supportedTiers: ModelTier[];

  abstract isAvailable(): Promise<boolean>;
  abstract chat(request: ModelRequest): Promise<ModelResponse>;
  abstract listModels(): Promise<ModelInfo[]>;
  abstract estimateCost(promptTokens: number, model: string): number;

  /** Model id this provider uses for a tier. */
  abstract modelFor(tier: ModelTier): string;
}
