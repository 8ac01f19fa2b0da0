/**
 * Expense construction: amount and date parsing, id generation.
 * Everything a record needs is decided here, once, at creation time.
 */
import { InvalidAmountError, InvalidDateError } from './errors.js';
import { DEFAULT_CATEGORY } from './types.js';
import type { Expense, ExpenseInput, InvalidDatePolicy } from './types.js';

export const INVALID_DATE_WARNING = 'Invalid date format. Using current date/time.';

const AMOUNT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

// YYYY-MM-DD, optionally followed by a time and a UTC offset
const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,]\d+)?)?(Z|[+-]\d{2}:?\d{2})?)?$/;

export interface CreateExpenseOptions {
  invalidDate?: InvalidDatePolicy;
  now?: Date;
}

// cuid-like: c + base36 timestamp + base36 random part
export function generateId(): string {
  const timestamp = Date.now().toString(36);
  const randomPart = Math.random().toString(36).substring(2, 9);
  return `c${timestamp}${randomPart}`;
}

/**
 * Round to two fractional digits, half away from zero on the decimal text
 * (so 10.005 becomes 10.01 even though its binary value is 10.00499…).
 */
export function roundAmount(value: number): number {
  const text = String(value);
  if (text.includes('e')) return Math.round(value * 100) / 100;
  return Number(`${Math.round(Number(`${text}e2`))}e-2`);
}

/** Parse a user-typed amount. Throws InvalidAmountError. */
export function parseAmount(text: string): number {
  const trimmed = text.trim();
  if (!AMOUNT_PATTERN.test(trimmed)) {
    throw new InvalidAmountError(text);
  }
  const value = Number(trimmed);
  if (!Number.isFinite(value) || value < 0) {
    throw new InvalidAmountError(text);
  }
  return value;
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

function normalizeOffset(offset: string): string {
  if (offset === 'Z') return '+00:00';
  return offset.includes(':') ? offset : `${offset.slice(0, 3)}:${offset.slice(3)}`;
}

/** Local wall-clock time as YYYY-MM-DDTHH:MM:SS */
export function formatTimestamp(date: Date): string {
  const y = String(date.getFullYear()).padStart(4, '0');
  return (
    `${y}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}` +
    `T${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`
  );
}

/**
 * Parse an ISO-8601 datetime, or a plain YYYY-MM-DD (midnight).
 * Returns the second-precision form, or null when the text is not a real date.
 */
export function parseExpenseDate(text: string): string | null {
  const match = ISO_PATTERN.exec(text.trim());
  if (!match) return null;

  const [, y, mo, d, hh = '00', mi = '00', ss = '00', offset] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);

  if (year < 1 || month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  if (Number(hh) > 23 || Number(mi) > 59 || Number(ss) > 59) return null;

  let suffix = '';
  if (offset) {
    suffix = normalizeOffset(offset);
    if (Number(suffix.slice(1, 3)) > 23 || Number(suffix.slice(4, 6)) > 59) return null;
  }

  return `${y}-${mo}-${d}T${hh}:${mi}:${ss}${suffix}`;
}

function resolveAmount(amount: number | string): number {
  if (typeof amount === 'string') return parseAmount(amount);
  if (!Number.isFinite(amount) || amount < 0) {
    throw new InvalidAmountError(String(amount));
  }
  return amount;
}

function resolveDate(text: string, policy: InvalidDatePolicy, now: Date): string {
  if (text === '') return formatTimestamp(now);

  const parsed = parseExpenseDate(text);
  if (parsed !== null) return parsed;

  if (policy === 'reject') {
    throw new InvalidDateError(text);
  }
  console.warn(INVALID_DATE_WARNING);
  return formatTimestamp(now);
}

/**
 * Build a new expense record from raw input.
 * Throws InvalidAmountError, and InvalidDateError under the 'reject' policy.
 */
export function createExpense(input: ExpenseInput, options: CreateExpenseOptions = {}): Expense {
  const amount = roundAmount(resolveAmount(input.amount));
  const category = (input.category ?? '').trim() || DEFAULT_CATEGORY;
  const note = (input.note ?? '').trim();
  const date = resolveDate(
    (input.date ?? '').trim(),
    options.invalidDate ?? 'now',
    options.now ?? new Date(),
  );

  return { id: generateId(), amount, category, note, date };
}
