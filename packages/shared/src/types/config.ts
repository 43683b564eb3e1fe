import type { ModeCostTable, StrategyName } from './mode.js';
import type { ModelProviderName } from './model.js';
import type { AgentDescriptor } from './agent.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type ConfigPresetName = 'development' | 'production' | 'testing';

export interface BudgetConfig {
  initialBalance: number;
  /** Estimated cost reserved before each mode runs */
  modeCosts: ModeCostTable;
}

export interface MatchingConfig {
  semanticEnabled: boolean;
  similarityFloor: number;
  /** Most-recently-used traces offered to the similarity scorer */
  candidateLimit: number;
}

export interface SelectionConfig {
  strategy: StrategyName;
  replayThreshold: number;
  guidedThreshold: number;
  complexityThreshold: number;
}

export interface CrystallizationConfig {
  minUsage: number;
  minConfidence: number;
  autoSchedule: boolean;
  intervalMs: number;
  batchLimit: number;
}

export interface DispatcherConfig {
  executionTimeoutMs: number;
}

export interface StoreConfig {
  backend: 'sqlite' | 'markdown';
  dbPath?: string;
  traceDir?: string;
}

export interface ProvidersConfig {
  ollama?: {
    baseUrl: string;
    models: { slm: string; llm?: string };
    enabled: boolean;
  };
  anthropic?: {
    apiKey: string;
    models: { slm: string; llm: string };
    enabled: boolean;
  };
  openai?: {
    apiKey: string;
    models: { slm: string; llm: string };
    enabled: boolean;
  };
}

export interface ReasoningConfig {
  providerPriority: ModelProviderName[];
  maxTokens: number;
}

export interface LoggingConfig {
  level: LogLevel;
  persistDecisions: boolean;
}

export interface CairnConfig {
  workspace: string;
  budget: BudgetConfig;
  matching: MatchingConfig;
  selection: SelectionConfig;
  crystallization: CrystallizationConfig;
  dispatcher: DispatcherConfig;
  store: StoreConfig;
  providers: ProvidersConfig;
  reasoning: ReasoningConfig;
  agents: AgentDescriptor[];
  logging: LoggingConfig;
}
