/**
 * Record store: the whole ledger lives in one JSON array on disk.
 * Reads and writes are whole-file and synchronous.
 */
import fs from 'fs';
import path from 'path';
import { storedExpenseSchema } from './schema.js';
import type { Expense } from '../domain/types.js';

export const CORRUPT_FILE_WARNING =
  'Warning: Could not read JSON file or file is corrupted. Starting with empty ledger.';
export const SAVE_ERROR = 'Error: Unable to save expenses.';

export interface ExpenseStore {
  readonly path: string;
  /** Never throws: a missing or corrupt file yields an empty ledger. */
  load(): Expense[];
  /** Overwrites the file. Returns false (after logging) when the write failed. */
  save(expenses: readonly Expense[]): boolean;
}

function readRaw(filePath: string): unknown {
  const text = fs.readFileSync(filePath, 'utf-8');
  return JSON.parse(text);
}

export function createFileStore(filePath: string): ExpenseStore {
  return {
    path: filePath,

    load(): Expense[] {
      if (!fs.existsSync(filePath)) return [];

      let data: unknown;
      try {
        data = readRaw(filePath);
      } catch {
        console.warn(CORRUPT_FILE_WARNING);
        return [];
      }
      if (!Array.isArray(data)) {
        console.warn(CORRUPT_FILE_WARNING);
        return [];
      }

      const expenses: Expense[] = [];
      let skipped = 0;
      for (const item of data) {
        const parsed = storedExpenseSchema.safeParse(item);
        if (parsed.success) {
          expenses.push(parsed.data);
        } else {
          skipped++;
        }
      }
      if (skipped > 0) {
        console.warn(
          `Warning: Skipped ${skipped} malformed expense record(s) in ${filePath}. ` +
            'They will be removed from the file on the next save.',
        );
      }
      return expenses;
    },

    save(expenses: readonly Expense[]): boolean {
      const tmpPath = `${filePath}.tmp`;
      try {
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
        fs.writeFileSync(tmpPath, JSON.stringify(expenses, null, 2) + '\n', 'utf-8');
        fs.renameSync(tmpPath, filePath);
        return true;
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`${SAVE_ERROR} (${message})`);
        return false;
      }
    },
  };
}
