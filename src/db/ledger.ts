/**
 * The ledger for one session: the in-memory records plus the store they
 * came from. Every mutation is followed by a full save.
 */
import { createExpense, generateId, type CreateExpenseOptions } from '../domain/expense.js';
import { ledgerSummary, searchExpenses, sortByDateDesc, forMonth } from '../domain/computations.js';
import type { Expense, ExpenseInput, LedgerSummary } from '../domain/types.js';
import type { ExpenseStore } from './expenseFile.js';

export interface AddResult {
  expense: Expense;
  saved: boolean;
}

export type RemoveResult = 'deleted' | 'not_found' | 'save_failed';

export class Ledger {
  private expenses: Expense[];

  constructor(
    private readonly store: ExpenseStore,
    expenses: readonly Expense[] = [],
    private readonly createOptions: CreateExpenseOptions = {},
  ) {
    this.expenses = [...expenses];
  }

  /** Load the store once and wrap it. */
  static open(store: ExpenseStore, createOptions: CreateExpenseOptions = {}): Ledger {
    return new Ledger(store, store.load(), createOptions);
  }

  get path(): string {
    return this.store.path;
  }

  get size(): number {
    return this.expenses.length;
  }

  /** Records newest first, optionally limited to one month (YYYY-MM) */
  list(month?: string): Expense[] {
    return sortByDateDesc(month ? forMonth(this.expenses, month) : this.expenses);
  }

  search(keyword: string): Expense[] {
    return searchExpenses(this.expenses, keyword);
  }

  summary(month?: string): LedgerSummary {
    return ledgerSummary(month ? forMonth(this.expenses, month) : this.expenses);
  }

  /**
   * Validate, append and save. Throws InvalidAmountError / InvalidDateError
   * before anything is changed.
   */
  add(input: ExpenseInput): AddResult {
    let expense = createExpense(input, this.createOptions);
    const taken = new Set(this.expenses.map((e) => e.id));
    while (taken.has(expense.id)) {
      expense = { ...expense, id: generateId() };
    }
    this.expenses.push(expense);
    return { expense, saved: this.save() };
  }

  remove(id: string): RemoveResult {
    const before = this.expenses.length;
    this.expenses = this.expenses.filter((e) => e.id !== id);
    if (this.expenses.length === before) return 'not_found';
    return this.save() ? 'deleted' : 'save_failed';
  }

  save(): boolean {
    return this.store.save(this.expenses);
  }
}
