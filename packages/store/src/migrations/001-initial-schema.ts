import type { Migration } from '../migrations.js';

export const migration001: Migration = {
  version: 1,
  name: 'initial-schema',
  up(db) {
    // ── Traces ───────────────────────────────────────────────
    db.exec(`
      CREATE TABLE IF NOT EXISTS traces (
        goal_key             TEXT PRIMARY KEY,
        goal_text            TEXT NOT NULL,
        steps                TEXT NOT NULL,
        confidence           REAL NOT NULL,
        usage_count          INTEGER NOT NULL DEFAULT 0,
        success_count        INTEGER NOT NULL DEFAULT 0,
        failure_count        INTEGER NOT NULL DEFAULT 0,
        cost_observed        REAL NOT NULL DEFAULT 0,
        time_observed_ms     REAL NOT NULL DEFAULT 0,
        promoted_routine_ref TEXT,
        origin_mode          TEXT NOT NULL,
        output_summary       TEXT,
        created_at           TEXT NOT NULL,
        last_used_at         TEXT,
        last_update_id       TEXT
      )
    `);
    db.exec('CREATE INDEX IF NOT EXISTS idx_traces_recent ON traces(COALESCE(last_used_at, created_at))');
    db.exec('CREATE INDEX IF NOT EXISTS idx_traces_promoted ON traces(promoted_routine_ref)');

    // ── Budget ledger ────────────────────────────────────────
    db.exec(`
      CREATE TABLE IF NOT EXISTS ledger_state (
        id         INTEGER PRIMARY KEY CHECK (id = 1),
        balance    REAL NOT NULL CHECK (balance >= 0),
        updated_at TEXT NOT NULL
      )
    `);

    db.exec(`
      CREATE TABLE IF NOT EXISTS spend_log (
        id        INTEGER PRIMARY KEY AUTOINCREMENT,
        amount    REAL NOT NULL,
        reason    TEXT NOT NULL,
        mode      TEXT,
        timestamp TEXT NOT NULL
      )
    `);

    // ── Decisions ────────────────────────────────────────────
    db.exec(`
      CREATE TABLE IF NOT EXISTS decisions (
        attempt_id      TEXT PRIMARY KEY,
        goal_key        TEXT NOT NULL,
        mode            TEXT NOT NULL,
        confidence      REAL NOT NULL,
        cost            REAL NOT NULL,
        duration_ms     REAL NOT NULL,
        success         INTEGER NOT NULL,
        match_tier      TEXT NOT NULL,
        degraded        INTEGER NOT NULL DEFAULT 0,
        reasoning       TEXT NOT NULL,
        downgraded_from TEXT,
        error           TEXT,
        recorded_at     TEXT NOT NULL
      )
    `);
    db.exec('CREATE INDEX IF NOT EXISTS idx_decisions_goal ON decisions(goal_key)');
    db.exec('CREATE INDEX IF NOT EXISTS idx_decisions_recorded ON decisions(recorded_at)');
  },
};
