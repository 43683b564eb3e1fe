import { z } from 'zod';
import type { ActionDefinition } from '@cairn/shared';

const inputSchema = z.object({
  text: z.string().describe('Final answer for the user'),
});

/** Returns its text unchanged, so a recorded run can end on a fixed answer. */
export const respondAction: ActionDefinition<z.infer<typeof inputSchema>, string> = {
  name: 'respond',
  description: 'Reply to the user with the given text',
  inputSchema,
  async execute({ text }) {
    return text;
  },
};
