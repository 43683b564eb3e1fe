export * from './types/index.js';
export * from './schemas/index.js';
export * from './utils/index.js';
export {
  CONFIDENCE_PRIOR,
  CONFIDENCE_SUCCESS_STEP,
  CONFIDENCE_FAILURE_STEP,
  DEFAULT_MODE_COSTS,
  STRATEGY_THRESHOLDS,
  SEQUENCING_CUES,
  COORDINATION_CUES,
  MODEL_PRICING,
  DEFAULT_CONFIG,
  CONFIG_PRESETS,
} from './constants.js';
