// ── Database & Migrations ────────────────────────────────────────
export { getDatabase, closeDatabase, createTestDatabase } from './database.js';
export type { DatabaseOptions } from './database.js';
export { runMigrations, getCurrentVersion } from './migrations.js';
export type { Migration } from './migrations.js';
export { allMigrations } from './migrations/index.js';

// ── Repositories ─────────────────────────────────────────────────
export { TraceRepository } from './repositories/trace.repository.js';
export type { TraceRow } from './repositories/trace.repository.js';

export { LedgerRepository } from './repositories/ledger.repository.js';

export { DecisionRepository } from './repositories/decision.repository.js';
export type { DecisionListOptions, ModeSummary } from './repositories/decision.repository.js';

// ── Store ────────────────────────────────────────────────────────

import type Database from 'better-sqlite3';
import { getDatabase } from './database.js';
import { runMigrations } from './migrations.js';
import { allMigrations } from './migrations/index.js';
import { TraceRepository } from './repositories/trace.repository.js';
import { LedgerRepository } from './repositories/ledger.repository.js';
import { DecisionRepository } from './repositories/decision.repository.js';

export interface CairnStore {
  db: Database.Database;
  traces: TraceRepository;
  ledger: LedgerRepository;
  decisions: DecisionRepository;
}

/**
 * Open/create the database, run migrations, and return the repositories.
 *
 * @param dbPath - Defaults to `.cairn/cairn.db` under the working directory.
 */
export function initializeStore(dbPath?: string): CairnStore {
  const db = getDatabase(dbPath ? { dbPath } : undefined);
  runMigrations(db, allMigrations);
  return storeFor(db);
}

/** Wrap an already-migrated connection, e.g. one from {@link createTestDatabase}. */
export function storeFor(db: Database.Database): CairnStore {
  return {
    db,
    traces: new TraceRepository(db),
    ledger: new LedgerRepository(db),
    decisions: new DecisionRepository(db),
  };
}
