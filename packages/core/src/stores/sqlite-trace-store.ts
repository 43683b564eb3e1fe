import type { Trace } from '@cairn/shared';
import type { TraceRepository } from '@cairn/store';
import { BaseTraceStore } from './trace-store.js';

export class SqliteTraceStore extends BaseTraceStore {
  constructor(private repo: TraceRepository, candidateLimit?: number) {
    super(candidateLimit);
  }

  protected async read(goalKey: string): Promise<Trace | null> {
    return this.repo.get(goalKey);
  }

  protected async write(trace: Trace): Promise<void> {
    this.repo.save(trace);
  }

  protected async readRecent(limit: number): Promise<Trace[]> {
    return this.repo.listRecent(limit);
  }

  protected async readAll(): Promise<Trace[]> {
    return this.repo.list();
  }
}
