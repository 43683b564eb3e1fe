import type { ExecutionMode } from '../types/mode.js';

export class CairnError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CairnError';
  }
}

export class InsufficientBudgetError extends CairnError {
  constructor(
    public readonly required: number,
    public readonly available: number,
    public readonly mode?: ExecutionMode,
  ) {
    super(`Insufficient budget${mode ? ` for ${mode}` : ''}: need ${required.toFixed(2)}, have ${available.toFixed(2)}`);
    this.name = 'InsufficientBudgetError';
  }
}

export type PersistenceOperation = 'read' | 'write' | 'list' | 'promote' | 'ledger';

export class PersistenceError extends CairnError {
  constructor(
    public readonly operation: PersistenceOperation,
    message: string,
    public readonly cause?: unknown,
  ) {
    super(`Persistence ${operation} failed: ${message}`);
    this.name = 'PersistenceError';
  }
}

/** Reported in match results, never thrown: matching continues on the exact tier. */
export class MatchDegradedWarning extends CairnError {
  constructor(reason: string) {
    super(`Semantic matching unavailable, exact tier only: ${reason}`);
    this.name = 'MatchDegradedWarning';
  }
}

export class ExecutorFailure extends CairnError {
  constructor(
    public readonly mode: ExecutionMode,
    message: string,
    public readonly cause?: unknown,
  ) {
    super(`${mode} execution failed: ${message}`);
    this.name = 'ExecutorFailure';
  }
}

export class PromotionValidationError extends CairnError {
  constructor(
    public readonly goalKey: string,
    public readonly issues: string[],
  ) {
    super(`Routine for ${goalKey} failed validation: ${issues.join('; ')}`);
    this.name = 'PromotionValidationError';
  }
}

export class InvalidGoalError extends CairnError {
  constructor(message: string) {
    super(`Invalid goal: ${message}`);
    this.name = 'InvalidGoalError';
  }
}

export class ConfigError extends CairnError {
  constructor(message: string) {
    super(`Configuration error: ${message}`);
    this.name = 'ConfigError';
  }
}

export class RoutineNotFoundError extends CairnError {
  constructor(public readonly routineRef: string) {
    super(`Routine not registered: ${routineRef}`);
    this.name = 'RoutineNotFoundError';
  }
}

export class ActionNotFoundError extends CairnError {
  constructor(public readonly actionName: string) {
    super(`Action not found: ${actionName}`);
    this.name = 'ActionNotFoundError';
  }
}

export class ProviderNotAvailableError extends CairnError {
  constructor(public readonly providerName: string) {
    super(`Provider not available: ${providerName}`);
    this.name = 'ProviderNotAvailableError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
