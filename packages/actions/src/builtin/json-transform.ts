import { z } from 'zod';
import type { ActionDefinition } from '@cairn/shared';

const inputSchema = z.object({
  json: z.string().describe('JSON string to transform'),
  operation: z.enum(['parse', 'pick', 'keys', 'values', 'flatten']).describe('Transform operation'),
  fields: z.array(z.string()).optional().describe('Fields to pick (for "pick" operation)'),
  indent: z.number().int().nonnegative().default(2).describe('Indentation of the result'),
});

const recordSchema = z.record(z.unknown());

export const jsonTransformAction: ActionDefinition<z.infer<typeof inputSchema>, string> = {
  name: 'json_transform',
  description: 'Parse, reshape and extract data from JSON',
  inputSchema,
  async execute(input) {
    const data: unknown = JSON.parse(input.json);

    switch (input.operation) {
      case 'parse':
        return JSON.stringify(data, null, input.indent);

      case 'pick': {
        if (!input.fields?.length) {
          throw new Error('Fields required for pick operation');
        }
        const source = recordSchema.parse(data);
        const picked: Record<string, unknown> = {};
        for (const field of input.fields) {
          if (field in source) picked[field] = source[field];
        }
        return JSON.stringify(picked, null, input.indent);
      }

      case 'keys':
        return JSON.stringify(Object.keys(recordSchema.parse(data)));

      case 'values':
        return JSON.stringify(Object.values(recordSchema.parse(data)));

      case 'flatten':
        return JSON.stringify(flattenObject(recordSchema.parse(data)), null, input.indent);
    }
  },
};

function flattenObject(obj: Record<string, unknown>, prefix = ''): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    const newKey = prefix ? `${prefix}.${key}` : key;
    const nested = recordSchema.safeParse(value);
    if (nested.success && !Array.isArray(value)) {
      Object.assign(result, flattenObject(nested.data, newKey));
    } else {
      result[newKey] = value;
    }
  }
  return result;
}
