export { executionModeSchema, traceStepSchema, traceSchema } from './trace.schema.js';
export {
  cairnConfigSchema,
  modeCostTableSchema,
  modelProviderNameSchema,
  strategyNameSchema,
  budgetConfigSchema,
  matchingConfigSchema,
  selectionConfigSchema,
  crystallizationConfigSchema,
  dispatcherConfigSchema,
  storeConfigSchema,
  providersConfigSchema,
  reasoningConfigSchema,
  agentDescriptorSchema,
  loggingConfigSchema,
} from './config.schema.js';
