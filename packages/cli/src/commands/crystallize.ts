import { Command } from 'commander';
import { formatCandidates, formatPromotions } from '../output/formatter.js';
import { withCairn } from '../setup.js';

interface CrystallizeOptions {
  promote?: boolean;
  limit?: number;
  goal?: string;
  config?: string;
}

export const crystallizeCommand = new Command('crystallize')
  .description('List traces ready to become routines, or promote them')
  .option('-p, --promote', 'Promote eligible traces')
  .option('-l, --limit <n>', 'Promote at most this many', (v: string) => parseInt(v, 10))
  .option('-g, --goal <goal>', 'Promote the trace of one goal')
  .option('-c, --config <path>', 'Config file path')
  .action(async (options: CrystallizeOptions) => {
    await withCairn(options, async cairn => {
      if (options.goal) {
        const ref = await cairn.promote(options.goal);
        console.log(`[OK] Promoted to ${ref}`);
        return;
      }

      if (options.promote) {
        const reports = await cairn.crystallizeEligible(
          options.limit !== undefined ? { limit: options.limit } : {},
        );
        console.log(formatPromotions(reports));
        if (reports.some(r => !r.promoted)) process.exitCode = 1;
        return;
      }

      console.log(formatCandidates(await cairn.findCrystallizationCandidates()));
    });
  });
