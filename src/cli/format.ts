import type { Expense, LedgerSummary } from '../domain/types.js';

export const RULE = '-'.repeat(40);

export function formatAmount(amount: number): string {
  return String(amount);
}

/** One record as printed in listings */
export function formatExpense(expense: Expense): string[] {
  const lines = [
    `ID: ${expense.id}`,
    `Date: ${expense.date}`,
    `Category: ${expense.category}`,
    `Amount: ${formatAmount(expense.amount)}`,
  ];
  if (expense.note) lines.push(`Note: ${expense.note}`);
  lines.push(RULE);
  return lines;
}

export function formatSummary(summary: LedgerSummary): string[] {
  const lines = [`Total spending: ${formatAmount(summary.total)}`, '', 'Spending by category:'];
  if (summary.categories.length === 0) {
    lines.push('  No category data.');
  } else {
    for (const { category, total } of summary.categories) {
      lines.push(`  ${category}: ${formatAmount(total)}`);
    }
  }
  return lines;
}
