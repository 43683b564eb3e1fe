import type { ActionDefinition } from '@cairn/shared';
import { fileReadAction } from './builtin/file-read.js';
import { fileWriteAction } from './builtin/file-write.js';
import { jsonTransformAction } from './builtin/json-transform.js';
import { respondAction } from './builtin/respond.js';

export { fileReadAction, fileWriteAction, jsonTransformAction, respondAction };
export type { FileReadOutput } from './builtin/file-read.js';
export type { FileWriteOutput } from './builtin/file-write.js';

/** Anything that accepts action definitions, such as the core `ActionRegistry`. */
export interface ActionSink {
  register<TInput, TOutput>(action: ActionDefinition<TInput, TOutput>, source?: 'builtin' | 'programmatic'): void;
}

export const BUILTIN_ACTION_NAMES = ['respond', 'file_read', 'file_write', 'json_transform'] as const;

export function registerBuiltinActions(sink: ActionSink): void {
  sink.register(respondAction, 'builtin');
  sink.register(fileReadAction, 'builtin');
  sink.register(fileWriteAction, 'builtin');
  sink.register(jsonTransformAction, 'builtin');
}
