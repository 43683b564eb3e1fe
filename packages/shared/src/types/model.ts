export enum ModelTier {
  SLM = 'slm',
  LLM = 'llm',
}

export type ModelProviderName = 'ollama' | 'anthropic' | 'openai';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ModelRequest {
  model: string;
  provider: ModelProviderName;
  tier: ModelTier;
  system?: string;
  messages: ChatMessage[];
  maxTokens?: number;
  temperature?: number;
  responseFormat?: 'text' | 'json';
  signal?: AbortSignal;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface ModelResponse {
  model: string;
  provider: ModelProviderName;
  tier: ModelTier;
  content: string;
  tokenUsage: TokenUsage;
  latencyMs: number;
  costUsd: number;
  finishReason: 'stop' | 'length' | 'error';
}

export interface ModelInfo {
  id: string;
  name: string;
  tier: ModelTier;
  contextWindow: number;
  costPerInputToken: number;
  costPerOutputToken: number;
}
