import { Cairn } from '@cairn/core';
import { registerBuiltinActions } from '@cairn/actions';

export interface CliOptions {
  config?: string;
}

/** Engine with the builtin actions registered, initialized and ready to dispatch. */
export async function createCairn(options: CliOptions = {}): Promise<Cairn> {
  const cairn = new Cairn({ configPath: options.config });
  registerBuiltinActions(cairn.actions);
  await cairn.initialize();
  return cairn;
}

export async function withCairn<T>(options: CliOptions, fn: (cairn: Cairn) => Promise<T>): Promise<T> {
  const cairn = await createCairn(options);
  try {
    return await fn(cairn);
  } finally {
    await cairn.shutdown();
  }
}
