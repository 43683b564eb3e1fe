import type { CairnConfig, ConfigPresetName } from './types/config.js';
import type { ModeCostTable, SelectionThresholds } from './types/mode.js';

export const CONFIDENCE_PRIOR = 0.75;
export const CONFIDENCE_SUCCESS_STEP = 0.1;
export const CONFIDENCE_FAILURE_STEP = 0.2;

export const DEFAULT_MODE_COSTS: ModeCostTable = {
  CRYSTALLIZED: 0,
  REPLAY: 0,
  GUIDED: 0.25,
  FRESH: 0.50,
  COORDINATED: 1.00,
};

export const STRATEGY_THRESHOLDS: Record<'balanced' | 'cost-optimized' | 'speed-optimized', SelectionThresholds> = {
  balanced: {
    replayThreshold: 0.92,
    guidedThreshold: 0.75,
    complexityThreshold: 2,
    allowCoordinated: true,
  },
  'cost-optimized': {
    replayThreshold: 0.75,
    guidedThreshold: 0.5,
    complexityThreshold: Infinity,
    allowCoordinated: false,
  },
  'speed-optimized': {
    replayThreshold: 0.85,
    guidedThreshold: 0.75,
    complexityThreshold: Infinity,
    allowCoordinated: false,
  },
};

/** Phrases that join or sequence sub-goals. Each occurrence counts once. */
export const SEQUENCING_CUES = [
  'and then',
  'after that',
  'afterwards',
  'as well as',
  'followed by',
  'in addition',
  'then',
  'also',
  'finally',
] as const;

/** Verbs that usually mean several specialists are needed. Each distinct verb counts once. */
export const COORDINATION_CUES = [
  'analyze',
  'analyse',
  'compare',
  'coordinate',
  'design',
  'evaluate',
  'investigate',
  'research',
  'review',
  'summarize',
] as const;

export const MODEL_PRICING: Record<string, { inputPerMillion: number; outputPerMillion: number }> = {
  // Anthropic
  'claude-haiku-4-5-20251001': { inputPerMillion: 0.80, outputPerMillion: 4.00 },
  'claude-sonnet-4-20250514': { inputPerMillion: 3.00, outputPerMillion: 15.00 },
  // OpenAI
  'gpt-4o-mini': { inputPerMillion: 0.15, outputPerMillion: 0.60 },
  'gpt-4o': { inputPerMillion: 2.50, outputPerMillion: 10.00 },
  // Ollama (local = free)
  'llama3.2:3b': { inputPerMillion: 0, outputPerMillion: 0 },
  'qwen2.5:7b': { inputPerMillion: 0, outputPerMillion: 0 },
};

export const DEFAULT_CONFIG: CairnConfig = {
  workspace: '.cairn',
  budget: {
    initialBalance: 10.0,
    modeCosts: DEFAULT_MODE_COSTS,
  },
  matching: {
    semanticEnabled: true,
    similarityFloor: 0.5,
    candidateLimit: 100,
  },
  selection: {
    strategy: 'balanced',
    replayThreshold: 0.92,
    guidedThreshold: 0.75,
    complexityThreshold: 2,
  },
  crystallization: {
    minUsage: 5,
    minConfidence: 0.95,
    autoSchedule: false,
    intervalMs: 3_600_000,
    batchLimit: 3,
  },
  dispatcher: {
    executionTimeoutMs: 300_000,
  },
  store: {
    backend: 'sqlite',
  },
  providers: {
    ollama: {
      baseUrl: 'http://localhost:11434',
      models: { slm: 'llama3.2:3b' },
      enabled: true,
    },
  },
  reasoning: {
    providerPriority: ['anthropic', 'openai', 'ollama'],
    maxTokens: 2048,
  },
  agents: [],
  logging: {
    level: 'info',
    persistDecisions: true,
  },
};

export const CONFIG_PRESETS: Record<ConfigPresetName, Partial<CairnConfig>> = {
  development: {
    budget: { initialBalance: 1.0, modeCosts: DEFAULT_MODE_COSTS },
    matching: { semanticEnabled: false, similarityFloor: 0.5, candidateLimit: 100 },
    logging: { level: 'debug', persistDecisions: true },
  },
  production: {
    budget: { initialBalance: 100.0, modeCosts: DEFAULT_MODE_COSTS },
    crystallization: {
      minUsage: 5,
      minConfidence: 0.95,
      autoSchedule: true,
      intervalMs: 3_600_000,
      batchLimit: 3,
    },
  },
  testing: {
    workspace: '.cairn-test',
    budget: { initialBalance: 0.1, modeCosts: DEFAULT_MODE_COSTS },
    matching: { semanticEnabled: false, similarityFloor: 0.5, candidateLimit: 100 },
    dispatcher: { executionTimeoutMs: 30_000 },
    logging: { level: 'warn', persistDecisions: false },
  },
};
