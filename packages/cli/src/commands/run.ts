import { Command } from 'commander';
import { EXECUTION_MODES, type ExecutionMode } from '@cairn/shared';
import { formatDispatchResult } from '../output/formatter.js';
import { withCairn } from '../setup.js';

interface RunOptions {
  mode?: string;
  timeout?: number;
  json?: boolean;
  config?: string;
}

export function parseMode(value: string | undefined): ExecutionMode | undefined {
  if (value === undefined) return undefined;
  const upper = value.toUpperCase();
  const mode = EXECUTION_MODES.find(m => m === upper);
  if (!mode) {
    throw new Error(`Unknown mode "${value}". Expected one of: ${EXECUTION_MODES.join(', ')}`);
  }
  return mode;
}

export const runCommand = new Command('run')
  .description('Dispatch a goal, reusing a recorded trace when one fits')
  .argument('<goal>', 'Goal to accomplish')
  .option('-m, --mode <mode>', `Force an execution mode (${EXECUTION_MODES.join(', ')})`)
  .option('-t, --timeout <ms>', 'Abort execution after this many milliseconds', (v: string) => parseInt(v, 10))
  .option('--json', 'Output as JSON')
  .option('-c, --config <path>', 'Config file path')
  .action(async (goal: string, options: RunOptions) => {
    const mode = parseMode(options.mode);

    await withCairn(options, async cairn => {
      const result = await cairn.dispatch(goal, {
        ...(mode ? { mode } : {}),
        ...(options.timeout !== undefined ? { timeoutMs: options.timeout } : {}),
      });

      if (options.json) {
        console.log(JSON.stringify({ ...result, error: result.error?.message }, null, 2));
      } else {
        console.log(formatDispatchResult(result));
      }
      if (!result.success) process.exitCode = 1;
    });
  });
