import type {
  BudgetSnapshot,
  CrystallizationCandidate,
  DispatchResult,
  PromotionReport,
  SpendEntry,
  Trace,
} from '@cairn/shared';

export function formatCost(usd: number): string {
  if (usd === 0) return 'free';
  if (usd < 0.001) return `$${usd.toFixed(6)}`;
  if (usd < 1) return `$${usd.toFixed(4)}`;
  return `$${usd.toFixed(2)}`;
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  return `${Math.floor(ms / 60000)}m ${Math.round((ms % 60000) / 1000)}s`;
}

export function truncate(str: string, max: number): string {
  if (str.length <= max) return str;
  return str.slice(0, max - 3) + '...';
}

export function formatDispatchResult(result: DispatchResult): string {
  const { decision } = result;
  const lines: string[] = [];

  if (result.success) {
    lines.push(`[OK] ${decision.mode} (confidence ${decision.confidence.toFixed(2)})`);
  } else {
    lines.push(`[FAIL] ${decision.mode}: ${result.error?.message ?? 'unknown error'}`);
  }
  lines.push(`  Reason: ${decision.reasoning}`);
  if (decision.downgradedFrom) {
    lines.push(`  Downgraded from: ${decision.downgradedFrom}`);
  }
  if (result.suggestion) {
    lines.push(`  Suggestion: retry with ${result.suggestion.fallbackMode} (${result.suggestion.reason})`);
  }
  for (const warning of result.warnings) {
    lines.push(`  Warning: ${warning}`);
  }

  if (result.output) {
    lines.push('');
    lines.push(result.output);
  }

  lines.push('');
  lines.push(`Cost: ${formatCost(result.cost)} | Time: ${formatDuration(result.durationMs)} | Match: ${result.matchTier}`);
  return lines.join('\n');
}

export function formatTraceList(traces: Trace[]): string {
  if (traces.length === 0) return 'No traces recorded.';
  return traces
    .map(t => {
      const promoted = t.promotedRoutineRef ? ' [crystallized]' : '';
      return `${t.confidence.toFixed(2)}  x${t.usageCount}  ${truncate(t.goalText, 60)}${promoted}`;
    })
    .join('\n');
}

export function formatTrace(trace: Trace): string {
  const lines = [
    `Goal:       ${trace.goalText}`,
    `Key:        ${trace.goalKey}`,
    `Origin:     ${trace.originMode}`,
    `Confidence: ${trace.confidence.toFixed(2)}`,
    `Usage:      ${trace.usageCount} (${trace.successCount} ok, ${trace.failureCount} failed)`,
    `Last cost:  ${formatCost(trace.costObserved)} in ${formatDuration(trace.timeObservedMs)}`,
  ];
  if (trace.promotedRoutineRef) {
    lines.push(`Routine:    ${trace.promotedRoutineRef}`);
  }
  lines.push('Steps:');
  if (trace.steps.length === 0) {
    lines.push('  (none)');
  }
  trace.steps.forEach((step, i) => {
    const args = step.args ? ` ${JSON.stringify(step.args)}` : '';
    const note = step.note ? ` - ${step.note}` : '';
    lines.push(`  ${i + 1}. ${step.action}${args}${note}`);
  });
  return lines.join('\n');
}

export function formatBudget(snapshot: BudgetSnapshot, history: SpendEntry[] = []): string {
  const lines = [
    '--- Budget ---',
    `Balance:   ${snapshot.balance.toFixed(4)}`,
    `Reserved:  ${snapshot.reserved.toFixed(4)}`,
    `Available: ${snapshot.available.toFixed(4)}`,
    `Spent:     ${snapshot.totalSpent.toFixed(4)}`,
  ];
  if (history.length > 0) {
    lines.push('');
    lines.push('Recent spend:');
    for (const entry of history) {
      lines.push(`  ${entry.timestamp}  ${entry.amount.toFixed(4)}  ${entry.reason}`);
    }
  }
  return lines.join('\n');
}

export function formatCandidates(candidates: CrystallizationCandidate[]): string {
  if (candidates.length === 0) return 'No traces are ready to crystallize.';
  return candidates
    .map((c, i) => `${i + 1}. ${c.score.toFixed(3)}  ${truncate(c.trace.goalText, 60)} (x${c.trace.usageCount}, ${c.trace.confidence.toFixed(2)})`)
    .join('\n');
}

export function formatPromotions(reports: PromotionReport[]): string {
  if (reports.length === 0) return 'Nothing promoted.';
  return reports
    .map(r => (r.promoted ? `[OK] ${r.goalKey} -> ${r.routineRef ?? ''}` : `[FAIL] ${r.goalKey}: ${r.error ?? 'unknown error'}`))
    .join('\n');
}
