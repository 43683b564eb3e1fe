import type { ExecutionMode } from './mode.js';

export interface SpendEntry {
  amount: number;
  reason: string;
  mode?: ExecutionMode;
  timestamp: string;
}

export interface BudgetSnapshot {
  balance: number;
  /** Amount currently held by in-flight reservations */
  reserved: number;
  available: number;
  totalSpent: number;
}

export interface BudgetReservation {
  id: string;
  amount: number;
  reason: string;
  mode?: ExecutionMode;
  createdAt: number;
}
