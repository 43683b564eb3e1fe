import vm from 'node:vm';
import { type RoutineArtifact, RoutineNotFoundError } from '@cairn/shared';

/** What a routine may call. Only registered actions are reachable. */
export interface RoutineActions {
  invoke(action: string, args?: Record<string, unknown>): Promise<unknown>;
}

export interface CompiledRoutine {
  ref: string;
  artifact: RoutineArtifact;
  run(goal: string, actions: RoutineActions): Promise<unknown>;
}

/**
 * Compile a routine source in a fresh vm context. The source must evaluate
 * to a function; anything else is rejected.
 */
export function compileRoutine(ref: string, artifact: RoutineArtifact): CompiledRoutine {
  const context = vm.createContext({}, { name: ref, codeGeneration: { strings: false, wasm: false } });
  const script = new vm.Script(`(${artifact.source})`, { filename: `${ref}.js` });
  const fn: unknown = script.runInContext(context, { timeout: 1000 });
  if (typeof fn !== 'function') {
    throw new TypeError(`Routine ${ref} does not evaluate to a function`);
  }
  return {
    ref,
    artifact,
    run: async (goal, actions) => {
      const result: unknown = await Reflect.apply(fn, undefined, [goal, actions]);
      return result;
    },
  };
}

/**
 * Hot-loadable routines. Registration builds a new map and swaps the
 * reference, so a snapshot taken by a running dispatch never changes.
 */
export class RoutineRegistry {
  private routines: ReadonlyMap<string, CompiledRoutine> = new Map();

  /** Compiles first; a source that fails to compile leaves the registry untouched. */
  register(ref: string, artifact: RoutineArtifact): CompiledRoutine {
    const compiled = compileRoutine(ref, artifact);
    const next = new Map(this.routines);
    next.set(ref, compiled);
    this.routines = next;
    return compiled;
  }

  unregister(ref: string): boolean {
    if (!this.routines.has(ref)) return false;
    const next = new Map(this.routines);
    next.delete(ref);
    this.routines = next;
    return true;
  }

  get(ref: string): CompiledRoutine | undefined {
    return this.routines.get(ref);
  }

  require(ref: string): CompiledRoutine {
    const routine = this.routines.get(ref);
    if (!routine) throw new RoutineNotFoundError(ref);
    return routine;
  }

  has(ref: string): boolean {
    return this.routines.has(ref);
  }

  snapshot(): ReadonlyMap<string, CompiledRoutine> {
    return this.routines;
  }

  list(): string[] {
    return Array.from(this.routines.keys());
  }
}
