import type Database from 'better-sqlite3';
import { executionModeSchema } from '@cairn/shared';
import type { SpendEntry } from '@cairn/shared';

interface SpendRow {
  amount: number;
  reason: string;
  mode: string | null;
  timestamp: string;
}

/**
 * Persists the budget balance (a single row) and an append-only spend log.
 * A debit and its log entry are written in one transaction.
 */
export class LedgerRepository {
  private getBalanceStmt: Database.Statement<[], { balance: number }>;
  private setBalanceStmt: Database.Statement<[number, string]>;
  private insertSpendStmt: Database.Statement<SpendRow>;
  private listSpendStmt: Database.Statement<[number], SpendRow>;
  private totalSpentStmt: Database.Statement<[], { total: number }>;

  constructor(private db: Database.Database) {
    this.getBalanceStmt = db.prepare<[], { balance: number }>('SELECT balance FROM ledger_state WHERE id = 1');
    this.setBalanceStmt = db.prepare<[number, string]>(`
      INSERT INTO ledger_state (id, balance, updated_at) VALUES (1, ?, ?)
      ON CONFLICT(id) DO UPDATE SET balance = excluded.balance, updated_at = excluded.updated_at
    `);
    this.insertSpendStmt = db.prepare<SpendRow>(
      'INSERT INTO spend_log (amount, reason, mode, timestamp) VALUES (@amount, @reason, @mode, @timestamp)',
    );
    this.listSpendStmt = db.prepare<[number], SpendRow>(
      'SELECT amount, reason, mode, timestamp FROM spend_log ORDER BY id DESC LIMIT ?',
    );
    this.totalSpentStmt = db.prepare<[], { total: number }>(
      'SELECT COALESCE(SUM(amount), 0) AS total FROM spend_log',
    );
  }

  /** Stored balance, or null before the ledger has ever been written. */
  loadBalance(): number | null {
    return this.getBalanceStmt.get()?.balance ?? null;
  }

  saveBalance(balance: number, updatedAt: string = new Date().toISOString()): void {
    this.setBalanceStmt.run(balance, updatedAt);
  }

  recordDebit(balanceAfter: number, entry: SpendEntry): void {
    this.db.transaction(() => {
      this.setBalanceStmt.run(balanceAfter, entry.timestamp);
      this.insertSpendStmt.run({
        amount: entry.amount,
        reason: entry.reason,
        mode: entry.mode ?? null,
        timestamp: entry.timestamp,
      });
    })();
  }

  /** Newest first. */
  listSpend(limit = 100): SpendEntry[] {
    return this.listSpendStmt.all(limit).map(row => {
      const entry: SpendEntry = { amount: row.amount, reason: row.reason, timestamp: row.timestamp };
      const mode = executionModeSchema.safeParse(row.mode);
      if (mode.success) entry.mode = mode.data;
      return entry;
    });
  }

  totalSpent(): number {
    return this.totalSpentStmt.get()?.total ?? 0;
  }
}

