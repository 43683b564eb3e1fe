import { Command } from 'commander';
import { formatBudget } from '../output/formatter.js';
import { withCairn } from '../setup.js';

interface BudgetOptions {
  add?: number;
  history?: number;
  config?: string;
}

export const budgetCommand = new Command('budget')
  .description('Show or top up the budget balance')
  .option('-a, --add <amount>', 'Credit the balance', parseFloat)
  .option('--history <n>', 'Show the last n spend entries', (v: string) => parseInt(v, 10), 5)
  .option('-c, --config <path>', 'Config file path')
  .action(async (options: BudgetOptions) => {
    await withCairn(options, async cairn => {
      const ledger = await cairn.ledger();
      if (options.add !== undefined) {
        const balance = await ledger.credit(options.add);
        console.log(`Credited ${options.add}. Balance is now ${balance.toFixed(4)}`);
        return;
      }
      const history = ledger.history(options.history ?? 5);
      console.log(formatBudget(ledger.snapshot(), history));
    });
  });
