import { describe, it, expect } from 'vitest';
import { createTestDatabase } from '../src/database.js';
import { runMigrations, getCurrentVersion } from '../src/migrations.js';
import { allMigrations } from '../src/migrations/index.js';

describe('runMigrations', () => {
  it('creates _migrations table', () => {
    const db = createTestDatabase();
    runMigrations(db, []);

    const tables = db.prepare("SELECT name FROM sqlite_master WHERE type='table' AND name='_migrations'").all();
    expect(tables).toHaveLength(1);
    db.close();
  });

  it('runs initial schema migration', () => {
    const db = createTestDatabase();
    runMigrations(db, allMigrations);

    const tables = db.prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type='table'").all();
    const tableNames = tables.map(t => t.name);

    expect(tableNames).toContain('traces');
    expect(tableNames).toContain('ledger_state');
    expect(tableNames).toContain('spend_log');
    expect(tableNames).toContain('decisions');
    db.close();
  });

  it('records migration version', () => {
    const db = createTestDatabase();
    runMigrations(db, allMigrations);

    const version = getCurrentVersion(db);
    expect(version).toBe(1);
    db.close();
  });

  it('can run twice on the same database', () => {
    const db = createTestDatabase();
    runMigrations(db, allMigrations);
    runMigrations(db, allMigrations);

    const version = getCurrentVersion(db);
    expect(version).toBe(1);
    db.close();
  });

  it('skips migrations at or below the current version', () => {
    const db = createTestDatabase();
    const applied: number[] = [];
    const make = (version: number) => ({
      version,
      name: `m${version}`,
      up: () => { applied.push(version); },
    });

    runMigrations(db, [make(2), make(1)]);
    runMigrations(db, [make(1), make(2), make(3)]);

    expect(applied).toEqual([1, 2, 3]);
    expect(getCurrentVersion(db)).toBe(3);
    db.close();
  });

  it('getCurrentVersion returns 0 when no migrations table exists', () => {
    const db = createTestDatabase();
    const version = getCurrentVersion(db);
    expect(version).toBe(0);
    db.close();
  });
});
