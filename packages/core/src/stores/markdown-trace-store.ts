import { mkdir, readdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { type Trace, generateId, traceSchema } from '@cairn/shared';
import { BaseTraceStore } from './trace-store.js';

const FRONT_MATTER = /^---\r?\n([\s\S]*?)\r?\n---(?:\r?\n|$)/;

/**
 * One markdown file per trace, `<dir>/<goalKey>.md`. The YAML front matter is
 * the record; the body is a readable rendering of the steps and is ignored on read.
 */
export class MarkdownTraceStore extends BaseTraceStore {
  constructor(private dir: string, candidateLimit?: number) {
    super(candidateLimit);
  }

  protected async read(goalKey: string): Promise<Trace | null> {
    let content: string;
    try {
      content = await readFile(this.pathFor(goalKey), 'utf-8');
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
    return parseTraceFile(content);
  }

  protected async write(trace: Trace): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    const target = this.pathFor(trace.goalKey);
    const temp = `${target}.${generateId('tmp')}`;
    try {
      await writeFile(temp, renderTraceFile(trace), 'utf-8');
      await rename(temp, target);
    } catch (err) {
      await rm(temp, { force: true });
      throw err;
    }
  }

  protected async readRecent(limit: number): Promise<Trace[]> {
    const traces = await this.readAll();
    return traces
      .sort((a, b) => {
        const byRecency = recency(b).localeCompare(recency(a));
        return byRecency !== 0 ? byRecency : a.goalKey.localeCompare(b.goalKey);
      })
      .slice(0, limit);
  }

  protected async readAll(): Promise<Trace[]> {
    let names: string[];
    try {
      names = await readdir(this.dir);
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }

    const traces: Trace[] = [];
    for (const name of names.filter(n => n.endsWith('.md')).sort()) {
      const content = await readFile(join(this.dir, name), 'utf-8');
      traces.push(parseTraceFile(content));
    }
    return traces;
  }

  private pathFor(goalKey: string): string {
    return join(this.dir, `${goalKey}.md`);
  }
}

export function renderTraceFile(trace: Trace): string {
  const lines = [
    '---',
    stringifyYaml(trace).trimEnd(),
    '---',
    '',
    `# ${trace.goalText}`,
    '',
  ];
  trace.steps.forEach((step, i) => {
    const args = step.args ? ` ${JSON.stringify(step.args)}` : '';
    const note = step.note ? `: ${step.note}` : '';
    lines.push(`${i + 1}. \`${step.action}\`${args}${note}`);
  });
  if (trace.promotedRoutineRef) {
    lines.push('', `Crystallized as \`${trace.promotedRoutineRef}\`.`);
  }
  return `${lines.join('\n')}\n`;
}

export function parseTraceFile(content: string): Trace {
  const match = FRONT_MATTER.exec(content);
  if (!match) {
    throw new Error('Trace file has no front matter');
  }
  return traceSchema.parse(parseYaml(match[1] ?? ''));
}

function recency(trace: Trace): string {
  return trace.lastUsedAt ?? trace.createdAt;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
