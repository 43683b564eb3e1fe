export { Cairn } from './engine.js';
export type { CairnOptions, CairnStats } from './engine.js';
export { ConfigManager, CONFIG_FILE_NAMES } from './config-manager.js';
export type { ConfigLoadOptions } from './config-manager.js';
export { BudgetLedger } from './budget-ledger.js';
export type { BudgetLedgerOptions, LedgerPersistence } from './budget-ledger.js';
export { BaseTraceStore, createTrace, DEFAULT_CANDIDATE_LIMIT } from './stores/trace-store.js';
export type { TraceStore, NewTraceInput } from './stores/trace-store.js';
export { SqliteTraceStore } from './stores/sqlite-trace-store.js';
export { MarkdownTraceStore, renderTraceFile, parseTraceFile } from './stores/markdown-trace-store.js';
export { TraceMatcher } from './trace-matcher.js';
export type { TraceMatcherOptions } from './trace-matcher.js';
export { complexitySignal } from './complexity.js';
export { ThresholdStrategy, ForcedModeStrategy, getStrategy, TRACE_MODES } from './mode-strategies.js';
export type { ModeStrategy, StrategyOptions } from './mode-strategies.js';
export { ActionRegistry } from './action-registry.js';
export { AgentRegistry } from './agent-registry.js';
export { ActionStepReplayer, renderOutput } from './step-replayer.js';
export {
  CrystallizedExecutor,
  ReplayExecutor,
  ReasoningModeExecutor,
  createExecutors,
} from './executors.js';
export type { ExecutorTable, DefaultExecutorDeps } from './executors.js';
export { Dispatcher, DOWNGRADE_LADDER } from './dispatcher.js';
export type { DispatcherOptions } from './dispatcher.js';
export { DecisionLogger } from './decision-logger.js';
export type { DecisionPersistence, DecisionSummary } from './decision-logger.js';
export { RoutineRegistry, compileRoutine } from './crystallization/routine-registry.js';
export type { RoutineActions, CompiledRoutine } from './crystallization/routine-registry.js';
export { RoutineValidator } from './crystallization/routine-validator.js';
export { StepScriptSynthesizer, renderRoutineSource } from './crystallization/step-script-synthesizer.js';
export {
  CrystallizationEngine,
  CrystallizationScheduler,
  routineRefFor,
} from './crystallization/crystallization-engine.js';
export type { CandidateCriteria, CrystallizationEngineOptions } from './crystallization/crystallization-engine.js';
export { ModelReasoningExecutor } from './llm/reasoning-executor.js';
export type { ModelReasoningExecutorOptions } from './llm/reasoning-executor.js';
export { ModelSimilarityScorer } from './llm/similarity-scorer.js';
export { extractJson } from './llm/json.js';
export type {
  SimilarityScorer,
  ActionSummary,
  ReasoningRequest,
  ReasoningExecutor,
  ReplayResult,
  StepReplayer,
  RoutineSynthesizer,
  TelemetrySink,
  ModeExecutor,
} from './collaborators.js';
