import { z } from 'zod';
import { readFile } from 'node:fs/promises';
import type { ActionDefinition } from '@cairn/shared';

const inputSchema = z.object({
  path: z.string().describe('File path to read'),
  encoding: z.enum(['utf-8', 'base64']).default('utf-8'),
  maxBytes: z.number().int().positive().default(100_000).describe('Max bytes to read'),
});

export interface FileReadOutput {
  content: string;
  sizeBytes: number;
  truncated: boolean;
}

export const fileReadAction: ActionDefinition<z.infer<typeof inputSchema>, FileReadOutput> = {
  name: 'file_read',
  description: 'Read the contents of a file',
  inputSchema,
  async execute(input) {
    const buffer = await readFile(input.path);
    const truncated = buffer.length > input.maxBytes;
    const content = buffer.subarray(0, input.maxBytes).toString(input.encoding);
    return { content, sizeBytes: buffer.length, truncated };
  },
};
