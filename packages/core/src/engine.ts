import * as path from 'node:path';
import {
  type BudgetSnapshot,
  type CairnConfig,
  type ConfigPresetName,
  type CrystallizationCandidate,
  type DispatchOptions,
  type DispatchResult,
  type Logger,
  type PromotionReport,
  type Trace,
  CairnError,
  createLogger,
  errorMessage,
} from '@cairn/shared';
import { type CairnStore, initializeStore } from '@cairn/store';
import {
  AnthropicProvider,
  ModelProviderRegistry,
  OllamaProvider,
  OpenAIProvider,
} from '@cairn/models';
import { ConfigManager } from './config-manager.js';
import { BudgetLedger } from './budget-ledger.js';
import { type TraceStore } from './stores/trace-store.js';
import { SqliteTraceStore } from './stores/sqlite-trace-store.js';
import { MarkdownTraceStore } from './stores/markdown-trace-store.js';
import { TraceMatcher } from './trace-matcher.js';
import { getStrategy, type ModeStrategy } from './mode-strategies.js';
import { ActionRegistry } from './action-registry.js';
import { AgentRegistry } from './agent-registry.js';
import { ActionStepReplayer } from './step-replayer.js';
import { type ExecutorTable, createExecutors } from './executors.js';
import { Dispatcher } from './dispatcher.js';
import { DecisionLogger, type DecisionSummary } from './decision-logger.js';
import { RoutineRegistry } from './crystallization/routine-registry.js';
import { StepScriptSynthesizer } from './crystallization/step-script-synthesizer.js';
import {
  type CandidateCriteria,
  CrystallizationEngine,
  CrystallizationScheduler,
} from './crystallization/crystallization-engine.js';
import { ModelReasoningExecutor } from './llm/reasoning-executor.js';
import { ModelSimilarityScorer } from './llm/similarity-scorer.js';
import type {
  ReasoningExecutor,
  RoutineSynthesizer,
  SimilarityScorer,
  StepReplayer,
  TelemetrySink,
} from './collaborators.js';

/** Everything here is optional; what is left out is built from configuration. */
export interface CairnOptions {
  /** Applied on top of the loaded configuration */
  config?: Partial<CairnConfig>;
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  preset?: ConfigPresetName;
  store?: CairnStore;
  traceStore?: TraceStore;
  providers?: ModelProviderRegistry;
  scorer?: SimilarityScorer;
  reasoner?: ReasoningExecutor;
  replayer?: StepReplayer;
  synthesizer?: RoutineSynthesizer;
  strategy?: ModeStrategy;
  executors?: ExecutorTable;
  telemetry?: TelemetrySink;
  actions?: ActionRegistry;
  agents?: AgentRegistry;
  logger?: Logger;
}

export interface CairnStats {
  strategy: string;
  budget: BudgetSnapshot;
  traces: { total: number; promoted: number };
  routines: number;
  decisions: DecisionSummary;
}

interface Wiring {
  store: CairnStore;
  ownsStore: boolean;
  traces: TraceStore;
  ledger: BudgetLedger;
  matcher: TraceMatcher;
  dispatcher: Dispatcher;
  crystallizer: CrystallizationEngine;
  scheduler: CrystallizationScheduler | null;
  decisions: DecisionLogger;
}

/**
 * Engine facade. Wires configuration, storage, the ledger, matching,
 * dispatch and crystallization into one object.
 */
export class Cairn {
  readonly config: ConfigManager;
  readonly actions: ActionRegistry;
  readonly agents: AgentRegistry;
  readonly routines: RoutineRegistry;
  readonly providers: ModelProviderRegistry;

  private wiring: Wiring | null = null;
  private logger: Logger | undefined;

  constructor(private options: CairnOptions = {}) {
    this.config = new ConfigManager();
    this.actions = options.actions ?? new ActionRegistry();
    this.agents = options.agents ?? new AgentRegistry();
    this.routines = new RoutineRegistry();
    this.providers = options.providers ?? new ModelProviderRegistry();
    this.logger = options.logger;
  }

  async initialize(): Promise<void> {
    if (this.wiring) return;
    const opts = this.options;

    // Load configuration
    await this.config.load({
      ...(opts.configPath !== undefined ? { configPath: opts.configPath } : {}),
      ...(opts.cwd !== undefined ? { cwd: opts.cwd } : {}),
      ...(opts.env !== undefined ? { env: opts.env } : {}),
      ...(opts.preset !== undefined ? { preset: opts.preset } : {}),
    });
    if (opts.config) {
      this.config.set(opts.config);
    }
    const config = this.config.getAll();
    const logger = this.logger ?? createLogger('cairn', config.logging.level);
    this.logger = logger;
    const workspace = path.resolve(opts.cwd ?? process.cwd(), config.workspace);

    // Storage: the database always holds the ledger and decision log
    const ownsStore = opts.store === undefined;
    const store = opts.store ?? initializeStore(config.store.dbPath ?? path.join(workspace, 'cairn.db'));
    const traces = opts.traceStore ?? this.createTraceStore(config, store, workspace);

    const ledger = new BudgetLedger({
      initialBalance: config.budget.initialBalance,
      persistence: store.ledger,
      logger,
    });

    if (!opts.providers) {
      this.registerProviders(config);
    }
    for (const agent of config.agents) {
      this.agents.register(agent);
    }

    const priority = config.reasoning.providerPriority;
    const scorer = opts.scorer ?? new ModelSimilarityScorer(this.providers, priority);
    const matcher = new TraceMatcher({
      store: traces,
      scorer,
      semanticEnabled: config.matching.semanticEnabled,
      similarityFloor: config.matching.similarityFloor,
      candidateLimit: config.matching.candidateLimit,
      logger,
    });

    const replayer = opts.replayer ?? new ActionStepReplayer(this.actions);
    const reasoner = opts.reasoner ?? new ModelReasoningExecutor({
      providers: this.providers,
      replayer,
      priority,
      maxTokens: config.reasoning.maxTokens,
      logger,
    });
    const executors = opts.executors ?? createExecutors({
      reasoner,
      replayer,
      routines: this.routines,
      actions: this.actions,
      agents: this.agents,
    });

    const decisions = new DecisionLogger(
      config.logging.persistDecisions ? store.decisions : undefined,
      logger,
    );

    const { selection, budget } = config;
    const strategy = opts.strategy ?? getStrategy(selection.strategy, {
      thresholds: {
        replayThreshold: selection.replayThreshold,
        guidedThreshold: selection.guidedThreshold,
        complexityThreshold: selection.complexityThreshold,
      },
      costs: budget.modeCosts,
    });

    const dispatcher = new Dispatcher({
      store: traces,
      matcher,
      ledger,
      strategy,
      executors,
      modeCosts: budget.modeCosts,
      telemetry: opts.telemetry ?? decisions,
      agents: this.agents,
      executionTimeoutMs: config.dispatcher.executionTimeoutMs,
      logger,
    });

    const crystallizer = new CrystallizationEngine({
      store: traces,
      synthesizer: opts.synthesizer ?? new StepScriptSynthesizer(),
      routines: this.routines,
      minUsage: config.crystallization.minUsage,
      minConfidence: config.crystallization.minConfidence,
      logger,
    });
    const unrestored = await crystallizer.restoreAll();
    if (unrestored.length > 0) {
      logger.warn('Some crystallized routines could not be restored', { routines: unrestored });
    }

    let scheduler: CrystallizationScheduler | null = null;
    if (config.crystallization.autoSchedule) {
      scheduler = new CrystallizationScheduler(crystallizer, {
        intervalMs: config.crystallization.intervalMs,
        batchLimit: config.crystallization.batchLimit,
        logger,
      });
      scheduler.start();
    }

    this.wiring = {
      store, ownsStore, traces, ledger, matcher, dispatcher, crystallizer, scheduler, decisions,
    };
    logger.debug('Engine initialized', {
      workspace,
      strategy: strategy.name,
      backend: opts.traceStore ? 'custom' : config.store.backend,
    });
  }

  async dispatch(goal: string, options: DispatchOptions = {}): Promise<DispatchResult> {
    const wiring = await this.ready();
    return wiring.dispatcher.dispatch(goal, options);
  }

  async findCrystallizationCandidates(criteria: CandidateCriteria = {}): Promise<CrystallizationCandidate[]> {
    const wiring = await this.ready();
    return wiring.crystallizer.findCandidates(criteria);
  }

  /** Promote the trace recorded for `goal`. */
  async promote(goal: string): Promise<string> {
    const wiring = await this.ready();
    const trace = await wiring.traces.findExact(goal);
    if (!trace) {
      throw new CairnError(`No trace recorded for goal "${goal}"`);
    }
    return wiring.crystallizer.promote(trace);
  }

  async crystallizeEligible(options: { limit?: number } & CandidateCriteria = {}): Promise<PromotionReport[]> {
    const wiring = await this.ready();
    return wiring.crystallizer.crystallizeEligible(options);
  }

  async listTraces(): Promise<Trace[]> {
    const wiring = await this.ready();
    return wiring.traces.list();
  }

  async getTrace(goal: string): Promise<Trace | null> {
    const wiring = await this.ready();
    return wiring.traces.findExact(goal);
  }

  async ledger(): Promise<BudgetLedger> {
    return (await this.ready()).ledger;
  }

  async decisions(): Promise<DecisionLogger> {
    return (await this.ready()).decisions;
  }

  async setStrategy(strategy: ModeStrategy): Promise<void> {
    const wiring = await this.ready();
    wiring.dispatcher.setStrategy(strategy);
  }

  async stats(): Promise<CairnStats> {
    const wiring = await this.ready();
    const traces = await wiring.traces.list();
    return {
      strategy: wiring.dispatcher.getStrategy().name,
      budget: wiring.ledger.snapshot(),
      traces: {
        total: traces.length,
        promoted: traces.filter(t => t.promotedRoutineRef !== undefined).length,
      },
      routines: this.routines.list().length,
      decisions: wiring.decisions.summary(),
    };
  }

  /** Stops the scheduler and closes the database this engine opened. */
  async shutdown(): Promise<void> {
    const wiring = this.wiring;
    if (!wiring) return;
    this.wiring = null;

    wiring.scheduler?.stop();
    if (wiring.ownsStore && wiring.store.db.open) {
      try {
        wiring.store.db.close();
      } catch (err) {
        this.logger?.warn('Failed to close database', { error: errorMessage(err) });
      }
    }
  }

  private async ready(): Promise<Wiring> {
    if (!this.wiring) {
      await this.initialize();
    }
    if (!this.wiring) {
      throw new CairnError('Engine failed to initialize');
    }
    return this.wiring;
  }

  private createTraceStore(config: CairnConfig, store: CairnStore, workspace: string): TraceStore {
    if (config.store.backend === 'markdown') {
      const dir = config.store.traceDir ?? path.join(workspace, 'traces');
      return new MarkdownTraceStore(dir, config.matching.candidateLimit);
    }
    return new SqliteTraceStore(store.traces, config.matching.candidateLimit);
  }

  private registerProviders(config: CairnConfig): void {
    const { ollama, anthropic, openai } = config.providers;

    if (ollama?.enabled) {
      this.providers.register(new OllamaProvider({
        baseUrl: ollama.baseUrl,
        model: ollama.models.slm,
      }));
    }
    if (anthropic?.enabled) {
      this.providers.register(new AnthropicProvider({
        apiKey: anthropic.apiKey,
        slmModel: anthropic.models.slm,
        llmModel: anthropic.models.llm,
      }));
    }
    if (openai?.enabled) {
      this.providers.register(new OpenAIProvider({
        apiKey: openai.apiKey,
        slmModel: openai.models.slm,
        llmModel: openai.models.llm,
      }));
    }
  }
}
