/**
 * Pure ledger computations.
 * No console, no files — only data in, data out.
 */
import { roundAmount } from './expense.js';
import type { Expense, CategoryTotal, LedgerSummary } from './types.js';

/** Sum of all amounts, rounded to cents */
export function total(expenses: readonly Expense[]): number {
  return roundAmount(expenses.reduce((sum, e) => sum + e.amount, 0));
}

// Rounded subtotals keyed by the exact category string
function categorySums(expenses: readonly Expense[]): Map<string, number> {
  const map = new Map<string, number>();
  for (const e of expenses) {
    map.set(e.category, (map.get(e.category) || 0) + e.amount);
  }
  for (const [category, sum] of map) {
    map.set(category, roundAmount(sum));
  }
  return map;
}

/** Subtotal per exact category string; every category is an own key */
export function byCategory(expenses: readonly Expense[]): Record<string, number> {
  return Object.fromEntries(categorySums(expenses));
}

/** Category subtotals in display order: biggest first, then by name */
export function categoryBreakdown(expenses: readonly Expense[]): CategoryTotal[] {
  return Array.from(categorySums(expenses).entries())
    .map(([category, sum]) => ({ category, total: sum }))
    .sort((a, b) => b.total - a.total || compareText(a.category, b.category));
}

export function ledgerSummary(expenses: readonly Expense[]): LedgerSummary {
  return {
    count: expenses.length,
    total: total(expenses),
    categories: categoryBreakdown(expenses),
  };
}

// Code-unit order; ISO timestamps of the same shape sort chronologically
function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/** Newest first. Returns a new array. */
export function sortByDateDesc(expenses: readonly Expense[]): Expense[] {
  return [...expenses].sort((a, b) => compareText(b.date, a.date));
}

/**
 * Case-insensitive substring match on category, note or date.
 * An empty keyword matches everything.
 */
export function searchExpenses(expenses: readonly Expense[], keyword: string): Expense[] {
  const needle = keyword.trim().toLowerCase();
  const matches = expenses.filter(
    (e) =>
      e.category.toLowerCase().includes(needle) ||
      e.note.toLowerCase().includes(needle) ||
      e.date.toLowerCase().includes(needle),
  );
  return sortByDateDesc(matches);
}

/** Filter to a single month (YYYY-MM) */
export function forMonth(expenses: readonly Expense[], month: string): Expense[] {
  return expenses.filter((e) => e.date.startsWith(month));
}
