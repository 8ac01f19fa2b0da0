import { resolveConfig } from '../../src/config.js';
import { createFileStore } from '../../src/db/expenseFile.js';
import { Ledger } from '../../src/db/ledger.js';
import { createApp } from './app.js';

const config = resolveConfig();
const ledger = Ledger.open(createFileStore(config.dataFile), { invalidDate: config.invalidDate });
const app = createApp(ledger);

app.listen(config.port, () => {
  console.log(`API server running on http://localhost:${config.port}`);
  console.log(`Ledger file: ${config.dataFile} (${ledger.size} expenses)`);
});

export default app;
