import {
  type Logger,
  type MatchResult,
  type Trace,
  MatchDegradedWarning,
  errorMessage,
  silentLogger,
} from '@cairn/shared';
import type { TraceStore } from './stores/trace-store.js';
import type { SimilarityScorer } from './collaborators.js';

export interface TraceMatcherOptions {
  store: TraceStore;
  scorer?: SimilarityScorer;
  semanticEnabled?: boolean;
  /** Lowest similarity accepted as a semantic match */
  similarityFloor?: number;
  candidateLimit?: number;
  logger?: Logger;
}

/**
 * Finds the best stored trace for a goal: exact key first, then the
 * similarity scorer over recent traces. A broken scorer degrades matching to
 * the exact tier and is reported in the result, never thrown.
 */
export class TraceMatcher {
  private store: TraceStore;
  private scorer?: SimilarityScorer;
  private semanticEnabled: boolean;
  private similarityFloor: number;
  private candidateLimit?: number;
  private logger: Logger;

  constructor(options: TraceMatcherOptions) {
    this.store = options.store;
    this.scorer = options.scorer;
    this.semanticEnabled = options.semanticEnabled ?? true;
    this.similarityFloor = options.similarityFloor ?? 0.5;
    this.candidateLimit = options.candidateLimit;
    this.logger = options.logger ?? silentLogger;
  }

  async match(goal: string): Promise<MatchResult> {
    const exact = await this.store.findExact(goal);
    if (exact) {
      return { trace: exact, confidence: exact.confidence, tier: 'exact', degraded: false, warnings: [] };
    }

    if (!this.semanticEnabled) {
      return noMatch();
    }

    if (!this.scorer) {
      return this.degraded('no similarity scorer configured');
    }

    let scores: number[];
    let candidates: Trace[];
    try {
      if (!(await this.scorer.isAvailable())) {
        return this.degraded('similarity scorer unavailable');
      }
      candidates = await this.store.listCandidates(this.candidateLimit);
      if (candidates.length === 0) return noMatch();

      scores = await this.scorer.score(goal, candidates);
      if (scores.length !== candidates.length) {
        return this.degraded(`scorer returned ${scores.length} scores for ${candidates.length} candidates`);
      }
    } catch (err) {
      return this.degraded(errorMessage(err));
    }

    let best: { trace: Trace; similarity: number } | null = null;
    for (const [i, trace] of candidates.entries()) {
      const similarity = scores[i] ?? 0;
      if (!Number.isFinite(similarity) || similarity < this.similarityFloor) continue;
      if (!best || isBetter(trace, similarity, best)) {
        best = { trace, similarity };
      }
    }

    if (!best) return noMatch();
    const { trace, similarity } = best;
    return {
      trace,
      confidence: Math.min(similarity, trace.confidence),
      tier: 'semantic',
      degraded: false,
      warnings: [],
      similarity,
    };
  }

  private degraded(reason: string): MatchResult {
    const warning = new MatchDegradedWarning(reason);
    this.logger.warn(warning.message);
    return { ...noMatch(), degraded: true, warnings: [warning.message] };
  }
}

function noMatch(): MatchResult {
  return { trace: null, confidence: 0, tier: 'none', degraded: false, warnings: [] };
}

/** Higher similarity wins; ties go to more usage, then the most recent use (or creation). */
function isBetter(trace: Trace, similarity: number, best: { trace: Trace; similarity: number }): boolean {
  if (similarity !== best.similarity) return similarity > best.similarity;
  if (trace.usageCount !== best.trace.usageCount) return trace.usageCount > best.trace.usageCount;
  return recency(trace) > recency(best.trace);
}

function recency(trace: Trace): string {
  return trace.lastUsedAt ?? trace.createdAt;
}
