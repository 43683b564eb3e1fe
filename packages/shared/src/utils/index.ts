export { generateId } from './id.js';
export { monotonicNow, isoNow } from './clock.js';
export { calculateCost, estimateCost, roundCurrency } from './cost.js';
export { goalKeyFor, normalizeGoal } from './goal-key.js';
export { nextConfidence } from './confidence.js';
export { Mutex, KeyedMutex } from './mutex.js';
export { createLogger, silentLogger } from './logger.js';
export type { Logger, LogSink } from './logger.js';
export {
  CairnError,
  InsufficientBudgetError,
  PersistenceError,
  MatchDegradedWarning,
  ExecutorFailure,
  PromotionValidationError,
  InvalidGoalError,
  ConfigError,
  RoutineNotFoundError,
  ActionNotFoundError,
  ProviderNotAvailableError,
  errorMessage,
} from './errors.js';
export type { PersistenceOperation } from './errors.js';
