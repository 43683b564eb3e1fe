import { z } from 'zod';
import { DEFAULT_CONFIG } from '../constants.js';

const nonNegative = z.number().nonnegative();

export const modeCostTableSchema = z.object({
  CRYSTALLIZED: nonNegative,
  REPLAY: nonNegative,
  GUIDED: nonNegative,
  FRESH: nonNegative,
  COORDINATED: nonNegative,
});

export const modelProviderNameSchema = z.enum(['ollama', 'anthropic', 'openai']);

export const strategyNameSchema = z.enum([
  'balanced',
  'auto',
  'cost-optimized',
  'speed-optimized',
  'forced-fresh',
  'forced-replay',
]);

export const budgetConfigSchema = z.object({
  initialBalance: nonNegative.default(DEFAULT_CONFIG.budget.initialBalance),
  modeCosts: modeCostTableSchema.default(DEFAULT_CONFIG.budget.modeCosts),
});

export const matchingConfigSchema = z.object({
  semanticEnabled: z.boolean().default(true),
  similarityFloor: z.number().min(0).max(1).default(0.5),
  candidateLimit: z.number().int().positive().default(100),
});

export const selectionConfigSchema = z.object({
  strategy: strategyNameSchema.default('balanced'),
  replayThreshold: z.number().min(0).max(1).default(0.92),
  guidedThreshold: z.number().min(0).max(1).default(0.75),
  complexityThreshold: z.number().int().nonnegative().default(2),
}).refine(s => s.guidedThreshold <= s.replayThreshold, {
  message: 'guidedThreshold must not exceed replayThreshold',
  path: ['guidedThreshold'],
});

export const crystallizationConfigSchema = z.object({
  minUsage: z.number().int().positive().default(5),
  minConfidence: z.number().min(0).max(1).default(0.95),
  autoSchedule: z.boolean().default(false),
  intervalMs: z.number().int().positive().default(3_600_000),
  batchLimit: z.number().int().positive().default(3),
});

export const dispatcherConfigSchema = z.object({
  executionTimeoutMs: z.number().int().positive().default(300_000),
});

export const storeConfigSchema = z.object({
  backend: z.enum(['sqlite', 'markdown']).default('sqlite'),
  dbPath: z.string().optional(),
  traceDir: z.string().optional(),
});

const ollamaConfigSchema = z.object({
  baseUrl: z.string().url().default('http://localhost:11434'),
  models: z.object({
    slm: z.string().default('llama3.2:3b'),
    llm: z.string().optional(),
  }).default({}),
  enabled: z.boolean().default(true),
});

const cloudProviderConfigSchema = z.object({
  apiKey: z.string().min(1),
  models: z.object({
    slm: z.string(),
    llm: z.string(),
  }),
  enabled: z.boolean().default(true),
});

export const providersConfigSchema = z.object({
  ollama: ollamaConfigSchema.optional(),
  anthropic: cloudProviderConfigSchema.optional(),
  openai: cloudProviderConfigSchema.optional(),
});

export const reasoningConfigSchema = z.object({
  providerPriority: z.array(modelProviderNameSchema).default(['anthropic', 'openai', 'ollama']),
  maxTokens: z.number().int().positive().default(2048),
});

export const agentDescriptorSchema = z.object({
  name: z.string().min(1),
  capabilities: z.array(z.string()).default([]),
  prompt: z.string().default(''),
});

export const loggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  persistDecisions: z.boolean().default(true),
});

export const cairnConfigSchema = z.object({
  workspace: z.string().min(1).default('.cairn'),
  budget: budgetConfigSchema.default({}),
  matching: matchingConfigSchema.default({}),
  selection: selectionConfigSchema.default({}),
  crystallization: crystallizationConfigSchema.default({}),
  dispatcher: dispatcherConfigSchema.default({}),
  store: storeConfigSchema.default({}),
  providers: providersConfigSchema.default({}),
  reasoning: reasoningConfigSchema.default({}),
  agents: z.array(agentDescriptorSchema).default([]),
  logging: loggingConfigSchema.default({}),
});
