#!/usr/bin/env node
import { Command } from 'commander';
import { runCommand } from '../src/commands/run.js';
import { tracesCommand } from '../src/commands/traces.js';
import { crystallizeCommand } from '../src/commands/crystallize.js';
import { budgetCommand } from '../src/commands/budget.js';
import { statsCommand } from '../src/commands/stats.js';
import { configCommand } from '../src/commands/config.js';

const program = new Command();

program
  .name('cairn')
  .description('Cairn - trace reuse and crystallization for agent goals')
  .version('0.1.0');

program.addCommand(runCommand);
program.addCommand(tracesCommand);
program.addCommand(crystallizeCommand);
program.addCommand(budgetCommand);
program.addCommand(statsCommand);
program.addCommand(configCommand);

program.parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
