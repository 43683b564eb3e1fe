/**
 * Cairn Quick Start
 *
 * Register a custom action, dispatch the same goal a few times and watch
 * it move from fresh reasoning to a replayed trace, then crystallize it.
 */

import { Cairn } from '@cairn/core';
import { registerBuiltinActions } from '@cairn/actions';
import { z } from 'zod';

async function main() {
  const cairn = new Cairn({ preset: 'development' });
  registerBuiltinActions(cairn.actions);

  cairn.actions.register({
    name: 'get_weather',
    description: 'Get the current weather for a city',
    inputSchema: z.object({
      city: z.string().describe('City name'),
    }),
    execute: async ({ city }) => {
      const data: Record<string, { temperature: number; condition: string }> = {
        'london': { temperature: 15, condition: 'Rainy' },
        'tokyo': { temperature: 28, condition: 'Sunny' },
      };
      return data[city.toLowerCase()] ?? { temperature: 20, condition: 'Unknown' };
    },
  });

  await cairn.initialize();
  console.log('Actions:', cairn.actions.listNames().join(', '));

  const goal = 'What is the weather in Tokyo? Use the get_weather action.';
  for (let i = 0; i < 6; i++) {
    const result = await cairn.dispatch(goal);
    console.log(`[${result.success ? 'OK' : 'FAIL'}] ${result.decision.mode} cost=${result.cost} ${result.output ?? ''}`);
  }

  for (const report of await cairn.crystallizeEligible()) {
    console.log(`Promoted ${report.goalKey}: ${report.routineRef ?? report.error ?? ''}`);
  }

  const stats = await cairn.stats();
  console.log('Balance:', stats.budget.balance.toFixed(4));

  await cairn.shutdown();
}

main().catch(console.error);
