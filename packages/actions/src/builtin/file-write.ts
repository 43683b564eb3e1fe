import { z } from 'zod';
import { writeFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { ActionDefinition } from '@cairn/shared';

const PATH_ALIASES = ['filepath', 'filePath', 'file_path', 'filename'] as const;

// Models often name the path field differently; accept the common aliases
const inputSchema = z.preprocess(
  (raw: unknown) => {
    if (raw === null || typeof raw !== 'object' || Array.isArray(raw) || 'path' in raw) return raw;
    const entries = Object.entries(raw);
    const alias = entries.find(([key]) => PATH_ALIASES.some(a => a === key));
    return alias ? { ...Object.fromEntries(entries), path: alias[1] } : raw;
  },
  z.object({
    path: z.string().describe('File path to write to'),
    content: z.string().describe('Text content to write into the file'),
    createDirs: z.boolean().default(true).describe('Create parent directories if needed'),
  }),
);

export interface FileWriteOutput {
  path: string;
  bytesWritten: number;
}

export const fileWriteAction: ActionDefinition<z.infer<typeof inputSchema>, FileWriteOutput> = {
  name: 'file_write',
  description: 'Write text content to a file at the given path',
  inputSchema,
  async execute(input) {
    if (input.createDirs) {
      await mkdir(dirname(input.path), { recursive: true });
    }
    const buffer = Buffer.from(input.content, 'utf-8');
    await writeFile(input.path, buffer);
    return { path: input.path, bytesWritten: buffer.length };
  },
};
