import { describe, expect, it } from 'vitest';
import {
  byCategory,
  categoryBreakdown,
  forMonth,
  ledgerSummary,
  searchExpenses,
  sortByDateDesc,
  total,
} from './computations.js';
import { createExpense } from './expense.js';
import type { Expense } from './types.js';

function makeExpense(overrides: Partial<Expense> = {}): Expense {
  return {
    id: 'e-1',
    amount: 10,
    category: 'Food',
    note: '',
    date: '2024-01-15T12:00:00',
    ...overrides,
  };
}

describe('total', () => {
  it('is 0 for an empty ledger', () => {
    expect(total([])).toBe(0);
  });

  it('sums amounts rounded at creation', () => {
    const records = [
      createExpense({ amount: 10.005, category: 'Food', date: '2024-01-01T00:00:00' }),
      createExpense({ amount: 5, category: 'Food', date: '2024-01-02T00:00:00' }),
    ];
    expect(total(records)).toBe(15.01);
    expect(byCategory(records)).toEqual({ Food: 15.01 });
  });
});

describe('byCategory', () => {
  it('groups by the exact category string', () => {
    const records = [
      makeExpense({ id: '1', amount: 4, category: 'Food' }),
      makeExpense({ id: '2', amount: 6, category: 'food' }),
      makeExpense({ id: '3', amount: 1.5, category: 'Food' }),
    ];
    expect(byCategory(records)).toEqual({ Food: 5.5, food: 6 });
  });

  it('partitions the total', () => {
    const records = [
      makeExpense({ id: '1', amount: 1.1, category: 'A' }),
      makeExpense({ id: '2', amount: 2.2, category: 'B' }),
      makeExpense({ id: '3', amount: 3.3, category: 'A' }),
    ];
    const subtotals = Object.values(byCategory(records));
    const sum = subtotals.reduce((acc, v) => acc + v, 0);
    expect(sum).toBeCloseTo(total(records), 10);
    expect(total(records)).toBe(6.6);
  });
  it('keeps categories that collide with Object.prototype names', () => {
    const records = [
      makeExpense({ id: '1', amount: 5, category: '__proto__' }),
      makeExpense({ id: '2', amount: 3, category: 'Food' }),
      makeExpense({ id: '3', amount: 2, category: 'constructor' }),
    ];
    const subtotals = byCategory(records);

    expect(Object.entries(subtotals)).toEqual([
      ['__proto__', 5],
      ['Food', 3],
      ['constructor', 2],
    ]);
    expect(Object.values(subtotals).reduce((acc, v) => acc + v, 0)).toBe(total(records));
    expect(categoryBreakdown(records)).toEqual([
      { category: '__proto__', total: 5 },
      { category: 'Food', total: 3 },
      { category: 'constructor', total: 2 },
    ]);
  });
});

describe('categoryBreakdown', () => {
  it('orders by total descending, ties by name', () => {
    const records = [
      makeExpense({ id: '1', amount: 5, category: 'Bills' }),
      makeExpense({ id: '2', amount: 10, category: 'Travel' }),
      makeExpense({ id: '3', amount: 5, category: 'Apps' }),
    ];
    expect(categoryBreakdown(records)).toEqual([
      { category: 'Travel', total: 10 },
      { category: 'Apps', total: 5 },
      { category: 'Bills', total: 5 },
    ]);
  });
});

describe('ledgerSummary', () => {
  it('combines count, total and breakdown', () => {
    const records = [
      makeExpense({ id: '1', amount: 2.5, category: 'Food' }),
      makeExpense({ id: '2', amount: 7, category: 'Travel' }),
    ];
    expect(ledgerSummary(records)).toEqual({
      count: 2,
      total: 9.5,
      categories: [
        { category: 'Travel', total: 7 },
        { category: 'Food', total: 2.5 },
      ],
    });
  });

  it('is empty for an empty ledger', () => {
    expect(ledgerSummary([])).toEqual({ count: 0, total: 0, categories: [] });
  });
});

describe('sortByDateDesc', () => {
  it('puts the newest first without touching the input', () => {
    const records = [
      makeExpense({ id: 'old', date: '2024-01-01T00:00:00' }),
      makeExpense({ id: 'new', date: '2024-03-01T00:00:00' }),
      makeExpense({ id: 'mid', date: '2024-02-01T09:30:00' }),
    ];
    const sorted = sortByDateDesc(records);
    expect(sorted.map((e) => e.id)).toEqual(['new', 'mid', 'old']);
    expect(records.map((e) => e.id)).toEqual(['old', 'new', 'mid']);
  });
});

describe('searchExpenses', () => {
  const records = [
    makeExpense({ id: 'trip', category: 'Travel', note: 'Taxi to airport', date: '2024-02-10T08:00:00' }),
    makeExpense({ id: 'lunch', category: 'Food', note: 'Sandwich', date: '2024-02-12T12:30:00' }),
    makeExpense({ id: 'rent', category: 'Bills', note: '', date: '2024-01-01T00:00:00' }),
  ];

  it('matches category regardless of case', () => {
    expect(searchExpenses(records, 'travel').map((e) => e.id)).toEqual(['trip']);
  });

  it('matches note and date fragments', () => {
    expect(searchExpenses(records, 'TAXI').map((e) => e.id)).toEqual(['trip']);
    expect(searchExpenses(records, '2024-02').map((e) => e.id)).toEqual(['lunch', 'trip']);
  });

  it('returns everything, newest first, for an empty keyword', () => {
    expect(searchExpenses(records, '').map((e) => e.id)).toEqual(['lunch', 'trip', 'rent']);
    expect(searchExpenses(records, '   ').map((e) => e.id)).toEqual(['lunch', 'trip', 'rent']);
  });

  it('returns nothing when no field matches', () => {
    expect(searchExpenses(records, 'gym')).toEqual([]);
  });
});

describe('forMonth', () => {
  it('filters by the YYYY-MM prefix', () => {
    const records = [
      makeExpense({ id: '1', date: '2024-01-15T00:00:00' }),
      makeExpense({ id: '2', date: '2024-02-01T00:00:00' }),
      makeExpense({ id: '3', date: '2024-01-31T23:59:59' }),
    ];
    expect(forMonth(records, '2024-01').map((e) => e.id)).toEqual(['1', '3']);
  });
});
