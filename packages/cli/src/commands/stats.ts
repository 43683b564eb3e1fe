import { Command } from 'commander';
import { EXECUTION_MODES } from '@cairn/shared';
import { formatBudget, formatCost } from '../output/formatter.js';
import { withCairn } from '../setup.js';

export const statsCommand = new Command('stats')
  .description('Summarize traces, routines and past decisions')
  .option('--json', 'Output as JSON')
  .option('-c, --config <path>', 'Config file path')
  .action(async (options: { json?: boolean; config?: string }) => {
    await withCairn(options, async cairn => {
      const stats = await cairn.stats();
      if (options.json) {
        console.log(JSON.stringify(stats, null, 2));
        return;
      }

      const { decisions } = stats;
      console.log(`Strategy:  ${stats.strategy}`);
      console.log(`Traces:    ${stats.traces.total} (${stats.traces.promoted} crystallized)`);
      console.log(`Routines:  ${stats.routines}`);
      console.log(`Decisions: ${decisions.total} (${decisions.successes} succeeded, ${formatCost(decisions.totalCost)})`);
      for (const mode of EXECUTION_MODES) {
        console.log(`  ${mode.padEnd(12)} ${decisions.byMode[mode]}`);
      }
      console.log('');
      console.log(formatBudget(stats.budget));
    });
  });
