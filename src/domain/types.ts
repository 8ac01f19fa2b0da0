/**
 * Domain types for the expense ledger.
 * Pure data — no console, no files, no IO.
 */

/** A single recorded expense. Immutable once created. */
export interface Expense {
  id: string;
  amount: number;              // >= 0, two fractional digits
  category: string;
  note: string;
  date: string;                // YYYY-MM-DDTHH:MM:SS, optional ±HH:MM offset
}

/** Raw fields as typed by the user (or posted to the API) */
export interface ExpenseInput {
  amount: number | string;
  category?: string;
  note?: string;
  date?: string;
}

/** What to do with a date that cannot be parsed */
export type InvalidDatePolicy = 'now' | 'reject';

export interface CategoryTotal {
  category: string;
  total: number;
}

/** Totals view produced by domain computations */
export interface LedgerSummary {
  count: number;
  total: number;
  categories: CategoryTotal[];  // descending by total, then name
}

export const DEFAULT_CATEGORY = 'Uncategorized';
