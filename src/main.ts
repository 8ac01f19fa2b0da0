#!/usr/bin/env node
import { resolveConfig } from './config.js';
import { createFileStore } from './db/expenseFile.js';
import { Ledger } from './db/ledger.js';
import { createConsoleIO } from './cli/prompt.js';
import { runShell } from './cli/shell.js';

async function main(): Promise<void> {
  const config = resolveConfig();
  const ledger = Ledger.open(createFileStore(config.dataFile), { invalidDate: config.invalidDate });
  const io = createConsoleIO();
  try {
    await runShell(ledger, io);
  } finally {
    io.close();
  }
}

main().catch((error: unknown) => {
  console.error('Unexpected error:', error);
  process.exit(1);
});
