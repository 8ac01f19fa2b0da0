import path from 'path';
import type { InvalidDatePolicy } from './domain/types.js';

export interface AppConfig {
  /** Backing JSON file */
  dataFile: string;
  /** What the expense factory does with an unparseable date */
  invalidDate: InvalidDatePolicy;
  /** Port for the local API */
  port: number;
}

export const DEFAULT_CONFIG: AppConfig = {
  dataFile: 'expenses.json',
  invalidDate: 'now',
  port: 8787,
};

/** Merge direct overrides over the defaults; dataFile becomes absolute. */
export function resolveConfig(overrides: Partial<AppConfig> = {}, cwd: string = process.cwd()): AppConfig {
  const merged: AppConfig = { ...DEFAULT_CONFIG, ...overrides };
  return { ...merged, dataFile: path.resolve(cwd, merged.dataFile) };
}
