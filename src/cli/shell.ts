/**
 * Interactive menu over a Ledger.
 *
 * Two states: MainMenu and Terminated. Each menu option maps to one command;
 * anything else reprints the menu. Exit (or end of input) is the only way out.
 */
import { parseAmount } from '../domain/expense.js';
import { InvalidAmountError, InvalidDateError } from '../domain/errors.js';
import type { Ledger } from '../db/ledger.js';
import { formatExpense, formatSummary } from './format.js';

export type ShellState = 'MainMenu' | 'Terminated';

export type Command = 'Add' | 'ViewAll' | 'ViewTotals' | 'Search' | 'Delete' | 'ExportSave' | 'Exit';

export interface ShellIO {
  /** Resolves null when there is no more input */
  ask(question: string): Promise<string | null>;
  print(line?: string): void;
}

interface MenuEntry {
  key: string;
  command: Command;
  label: string;
}

export const MENU: readonly MenuEntry[] = [
  { key: '1', command: 'Add', label: 'Add an expense' },
  { key: '2', command: 'ViewAll', label: 'View all expenses' },
  { key: '3', command: 'ViewTotals', label: 'View totals & category summary' },
  { key: '4', command: 'Search', label: 'Search expenses' },
  { key: '5', command: 'Delete', label: 'Delete an expense (by ID)' },
  { key: '6', command: 'ExportSave', label: 'Export expenses to JSON file (save)' },
  { key: '0', command: 'Exit', label: 'Exit' },
];

export const PROMPTS = {
  choice: 'Choose an option: ',
  amount: 'Enter amount (numbers only, e.g. 250.50): ',
  category: 'Enter category (e.g. Food, Travel, Bills): ',
  note: 'Optional note: ',
  date: 'Date (YYYY-MM-DD) or press Enter for today: ',
  keyword: 'Enter search keyword (category/note/date fragment): ',
  deleteId: 'Enter the ID of the expense to delete: ',
} as const;

export function parseCommand(choice: string): Command | null {
  const entry = MENU.find((m) => m.key === choice.trim());
  return entry ? entry.command : null;
}

function printMenu(io: ShellIO): void {
  io.print();
  io.print('Personal Expense Tracker');
  io.print('-'.repeat(25));
  for (const { key, label } of MENU) {
    io.print(`${key}. ${label}`);
  }
}

function printAll(io: ShellIO, lines: string[]): void {
  for (const line of lines) io.print(line);
}

/** Re-prompts until the amount parses; null when input ended. */
async function readAmount(io: ShellIO): Promise<number | null> {
  for (;;) {
    const text = await io.ask(PROMPTS.amount);
    if (text === null) return null;
    try {
      return parseAmount(text);
    } catch (error) {
      if (!(error instanceof InvalidAmountError)) throw error;
      io.print('Invalid amount. Try again.');
    }
  }
}

async function addExpense(ledger: Ledger, io: ShellIO): Promise<ShellState> {
  const amount = await readAmount(io);
  if (amount === null) return 'Terminated';

  const category = await io.ask(PROMPTS.category);
  if (category === null) return 'Terminated';
  const note = await io.ask(PROMPTS.note);
  if (note === null) return 'Terminated';
  let date = await io.ask(PROMPTS.date);
  if (date === null) return 'Terminated';

  for (;;) {
    try {
      const { saved } = ledger.add({ amount, category, note, date });
      io.print(saved ? 'Expense added!' : 'Expense added, but the ledger could not be saved.');
      io.print();
      return 'MainMenu';
    } catch (error) {
      if (!(error instanceof InvalidDateError)) throw error;
      io.print('Invalid date. Use YYYY-MM-DD or a full ISO-8601 timestamp.');
      date = await io.ask(PROMPTS.date);
      if (date === null) return 'Terminated';
    }
  }
}

function viewAll(ledger: Ledger, io: ShellIO): ShellState {
  const expenses = ledger.list();
  if (expenses.length === 0) {
    io.print('No expenses found.');
    return 'MainMenu';
  }
  for (const expense of expenses) printAll(io, formatExpense(expense));
  return 'MainMenu';
}

function viewTotals(ledger: Ledger, io: ShellIO): ShellState {
  printAll(io, formatSummary(ledger.summary()));
  return 'MainMenu';
}

async function search(ledger: Ledger, io: ShellIO): Promise<ShellState> {
  const keyword = await io.ask(PROMPTS.keyword);
  if (keyword === null) return 'Terminated';
  const results = ledger.search(keyword);
  if (results.length === 0) {
    io.print('No matching expenses found.');
    return 'MainMenu';
  }
  for (const expense of results) printAll(io, formatExpense(expense));
  return 'MainMenu';
}

async function deleteExpense(ledger: Ledger, io: ShellIO): Promise<ShellState> {
  const id = await io.ask(PROMPTS.deleteId);
  if (id === null) return 'Terminated';
  switch (ledger.remove(id.trim())) {
    case 'deleted':
      io.print('Expense deleted.');
      break;
    case 'save_failed':
      io.print('Expense deleted, but the ledger could not be saved.');
      break;
    case 'not_found':
      io.print('ID not found. No changes made.');
      break;
  }
  return 'MainMenu';
}

function exportSave(ledger: Ledger, io: ShellIO): ShellState {
  if (ledger.save()) {
    io.print(`Expenses saved to ${ledger.path}.`);
  }
  return 'MainMenu';
}

/** Run one command from the main menu and return the next state. */
export async function dispatch(command: Command, ledger: Ledger, io: ShellIO): Promise<ShellState> {
  switch (command) {
    case 'Add':
      return addExpense(ledger, io);
    case 'ViewAll':
      return viewAll(ledger, io);
    case 'ViewTotals':
      return viewTotals(ledger, io);
    case 'Search':
      return search(ledger, io);
    case 'Delete':
      return deleteExpense(ledger, io);
    case 'ExportSave':
      return exportSave(ledger, io);
    case 'Exit':
      io.print('Goodbye!');
      return 'Terminated';
  }
}

export async function runShell(ledger: Ledger, io: ShellIO): Promise<void> {
  let state: ShellState = 'MainMenu';
  while (state === 'MainMenu') {
    printMenu(io);
    const choice = await io.ask(PROMPTS.choice);
    if (choice === null) return;
    const command = parseCommand(choice);
    if (!command) {
      io.print('Invalid choice. Try again.');
      continue;
    }
    state = await dispatch(command, ledger, io);
  }
}
