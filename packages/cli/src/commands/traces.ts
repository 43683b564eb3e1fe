import { Command } from 'commander';
import { formatTrace, formatTraceList } from '../output/formatter.js';
import { withCairn } from '../setup.js';

interface TraceOptions {
  json?: boolean;
  config?: string;
}

export const tracesCommand = new Command('traces')
  .description('Inspect recorded traces');

tracesCommand
  .command('list', { isDefault: true })
  .description('List recorded traces')
  .option('--json', 'Output as JSON')
  .option('-c, --config <path>', 'Config file path')
  .action(async (options: TraceOptions) => {
    await withCairn(options, async cairn => {
      const traces = await cairn.listTraces();
      console.log(options.json ? JSON.stringify(traces, null, 2) : formatTraceList(traces));
    });
  });

tracesCommand
  .command('show')
  .description('Show the trace recorded for a goal')
  .argument('<goal>', 'Goal text')
  .option('--json', 'Output as JSON')
  .option('-c, --config <path>', 'Config file path')
  .action(async (goal: string, options: TraceOptions) => {
    await withCairn(options, async cairn => {
      const trace = await cairn.getTrace(goal);
      if (!trace) {
        console.error(`No trace recorded for "${goal}"`);
        process.exitCode = 1;
        return;
      }
      console.log(options.json ? JSON.stringify(trace, null, 2) : formatTrace(trace));
    });
  });
