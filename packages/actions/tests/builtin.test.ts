import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { ActionDefinition } from '@cairn/shared';
import {
  BUILTIN_ACTION_NAMES,
  fileReadAction,
  fileWriteAction,
  jsonTransformAction,
  registerBuiltinActions,
  respondAction,
} from '../src/index.js';

function run<TInput, TOutput>(action: ActionDefinition<TInput, TOutput>, raw: unknown): Promise<TOutput> {
  return action.execute(action.inputSchema.parse(raw));
}

describe('respond', () => {
  it('returns its text', async () => {
    expect(await run(respondAction, { text: 'All done' })).toBe('All done');
  });
});

describe('file actions', () => {
  let dir = '';

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'cairn-actions-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes into missing directories and reads the file back', async () => {
    const path = join(dir, 'notes', 'today.txt');

    const written = await run(fileWriteAction, { path, content: 'hello' });
    const read = await run(fileReadAction, { path });

    expect(written).toEqual({ path, bytesWritten: 5 });
    expect(read).toEqual({ content: 'hello', sizeBytes: 5, truncated: false });
  });

  it('accepts filePath as the path field', async () => {
    const path = join(dir, 'alias.txt');
    await run(fileWriteAction, { filePath: path, content: 'x' });
    expect(await readFile(path, 'utf-8')).toBe('x');
  });

  it('truncates reads at maxBytes', async () => {
    const path = join(dir, 'long.txt');
    await writeFile(path, 'abcdefgh', 'utf-8');

    const read = await run(fileReadAction, { path, maxBytes: 3 });

    expect(read).toEqual({ content: 'abc', sizeBytes: 8, truncated: true });
  });

  it('reads as base64', async () => {
    const path = join(dir, 'bin.txt');
    await writeFile(path, 'hi', 'utf-8');
    expect((await run(fileReadAction, { path, encoding: 'base64' })).content).toBe('aGk=');
  });
});

describe('json_transform', () => {
  const json = '{"name":"cairn","meta":{"version":1,"tags":["a"]}}';

  it('picks fields', async () => {
    const out = await run(jsonTransformAction, { json, operation: 'pick', fields: ['name', 'missing'], indent: 0 });
    expect(out).toBe('{"name":"cairn"}');
  });

  it('lists keys', async () => {
    expect(await run(jsonTransformAction, { json, operation: 'keys' })).toBe('["name","meta"]');
  });

  it('flattens nested objects but keeps arrays whole', async () => {
    const out = await run(jsonTransformAction, { json, operation: 'flatten', indent: 0 });
    expect(out).toBe('{"name":"cairn","meta.version":1,"meta.tags":["a"]}');
  });

  it('requires fields for pick', async () => {
    await expect(run(jsonTransformAction, { json, operation: 'pick' })).rejects.toThrow(
      'Fields required for pick operation',
    );
  });

  it('rejects keys of a non-object', async () => {
    await expect(run(jsonTransformAction, { json: '[1,2]', operation: 'keys' })).rejects.toThrow();
  });
});

describe('registerBuiltinActions', () => {
  it('registers every builtin as a builtin', () => {
    const registered: Array<[string, string | undefined]> = [];
    registerBuiltinActions({
      register(action, source) {
        registered.push([action.name, source]);
      },
    });

    expect(registered.map(([name]) => name)).toEqual([...BUILTIN_ACTION_NAMES]);
    expect(registered.every(([, source]) => source === 'builtin')).toBe(true);
  });
});
