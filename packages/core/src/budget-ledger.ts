import {
  type BudgetReservation,
  type BudgetSnapshot,
  type ExecutionMode,
  type Logger,
  type SpendEntry,
  InsufficientBudgetError,
  Mutex,
  PersistenceError,
  errorMessage,
  generateId,
  isoNow,
  monotonicNow,
  roundCurrency,
  silentLogger,
} from '@cairn/shared';

/** Durable side of the ledger. `LedgerRepository` from @cairn/store satisfies it. */
export interface LedgerPersistence {
  loadBalance(): number | null;
  saveBalance(balance: number, updatedAt?: string): void;
  recordDebit(balanceAfter: number, entry: SpendEntry): void;
  /** Newest first. */
  listSpend(limit: number): SpendEntry[];
  totalSpent(): number;
}

export interface BudgetLedgerOptions {
  initialBalance: number;
  persistence?: LedgerPersistence;
  logger?: Logger;
}

/**
 * Single spending ledger. Reservations hold part of the balance while a mode
 * runs; settling releases the hold and debits what was actually spent.
 * All mutations run under one mutex so two reservations can never both pass
 * against a balance that covers only one.
 */
export class BudgetLedger {
  private balance: number;
  private reservations = new Map<string, BudgetReservation>();
  private spendLog: SpendEntry[] = [];
  private totalSpent = 0;
  private mutex = new Mutex();
  private persistence?: LedgerPersistence;
  private logger: Logger;

  constructor(options: BudgetLedgerOptions) {
    this.persistence = options.persistence;
    this.logger = options.logger ?? silentLogger;
    this.balance = options.initialBalance;

    if (this.persistence) {
      const stored = this.wrap(() => this.persistence?.loadBalance() ?? null);
      if (stored === null) {
        this.wrap(() => this.persistence?.saveBalance(this.balance));
      } else {
        this.balance = stored;
      }
      this.totalSpent = roundCurrency(this.wrap(() => this.persistence?.totalSpent() ?? 0));
    }
  }

  snapshot(): BudgetSnapshot {
    const reserved = this.reservedTotal();
    return {
      balance: this.balance,
      reserved,
      available: roundCurrency(Math.max(0, this.balance - reserved)),
      totalSpent: this.totalSpent,
    };
  }

  canAfford(amount: number): boolean {
    return this.snapshot().available >= amount;
  }

  /**
   * Hold `amount` until {@link settle} or {@link release}.
   * Throws InsufficientBudgetError when the unreserved balance is short.
   */
  reserve(amount: number, reason: string, mode?: ExecutionMode): Promise<BudgetReservation> {
    return this.mutex.runExclusive(() => {
      const { available } = this.snapshot();
      if (amount > available) {
        throw new InsufficientBudgetError(amount, available, mode);
      }
      const reservation: BudgetReservation = {
        id: generateId('rsv'),
        amount,
        reason,
        createdAt: monotonicNow(),
        ...(mode ? { mode } : {}),
      };
      this.reservations.set(reservation.id, reservation);
      return reservation;
    });
  }

  /**
   * Release the hold and debit `actualCost`, capped at the balance.
   * Returns the spend entry, or null when nothing was debited.
   */
  settle(reservation: BudgetReservation, actualCost: number): Promise<SpendEntry | null> {
    return this.mutex.runExclusive(() => {
      this.reservations.delete(reservation.id);
      return this.applyDebit(actualCost, reservation.reason, reservation.mode);
    });
  }

  release(reservation: BudgetReservation): Promise<void> {
    return this.mutex.runExclusive(() => {
      this.reservations.delete(reservation.id);
    });
  }

  /** Debit outside any reservation, still capped at the unreserved balance. */
  debit(amount: number, reason: string, mode?: ExecutionMode): Promise<SpendEntry | null> {
    return this.mutex.runExclusive(() => {
      const { available } = this.snapshot();
      if (amount > available) {
        throw new InsufficientBudgetError(amount, available, mode);
      }
      return this.applyDebit(amount, reason, mode);
    });
  }

  credit(amount: number): Promise<number> {
    return this.mutex.runExclusive(() => {
      if (!(amount > 0)) {
        throw new RangeError(`Credit must be positive, got ${amount}`);
      }
      const next = roundCurrency(this.balance + amount);
      this.wrap(() => this.persistence?.saveBalance(next));
      this.balance = next;
      this.logger.info('Budget credited', { amount, balance: next });
      return next;
    });
  }

  /** The last `limit` spend entries, oldest first. Read from persistence when there is one. */
  history(limit = 100): SpendEntry[] {
    if (limit <= 0) return [];
    const persistence = this.persistence;
    if (persistence) {
      return this.wrap(() => persistence.listSpend(limit)).reverse();
    }
    return this.spendLog.slice(-limit);
  }

  private applyDebit(amount: number, reason: string, mode?: ExecutionMode): SpendEntry | null {
    const debited = roundCurrency(Math.min(Math.max(0, amount), this.balance));
    if (debited === 0) return null;

    const entry: SpendEntry = { amount: debited, reason, timestamp: isoNow(), ...(mode ? { mode } : {}) };
    const next = roundCurrency(this.balance - debited);
    this.wrap(() => this.persistence?.recordDebit(next, entry));

    this.balance = next;
    this.totalSpent = roundCurrency(this.totalSpent + debited);
    this.spendLog.push(entry);
    if (debited < amount) {
      this.logger.warn('Debit capped at remaining balance', { requested: amount, debited });
    }
    return entry;
  }

  private reservedTotal(): number {
    let total = 0;
    for (const r of this.reservations.values()) total += r.amount;
    return roundCurrency(total);
  }

  private wrap<T>(fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      throw new PersistenceError('ledger', errorMessage(err), err);
    }
  }
}
