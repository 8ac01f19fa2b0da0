/**
 * API smoke test against a running server.
 * Run with: npm run smoke (requires `npm run dev:api` on port 8787)
 */
import { DEFAULT_CONFIG } from '../../src/config.js';

const API_BASE = `http://localhost:${DEFAULT_CONFIG.port}`;

interface Check {
  name: string;
  method?: 'GET' | 'POST' | 'DELETE';
  path: () => string;
  body?: unknown;
  status: number;
  /** Extra assertion on the parsed body; return a message to fail */
  verify?: (body: unknown) => string | undefined;
}

const note = `smoke-test-${Date.now()}`;
let createdId = '';

const checks: Check[] = [
  { name: 'health', path: () => '/health', status: 200 },
  {
    name: 'create expense',
    method: 'POST',
    path: () => '/expenses',
    body: { amount: '12.345', category: 'Smoke', note, date: '2024-01-15' },
    status: 201,
    verify: (body) => {
      if (typeof body !== 'object' || body === null || !('id' in body) || typeof body.id !== 'string') {
        return 'missing id';
      }
      createdId = body.id;
      return 'amount' in body && body.amount === 12.35 ? undefined : 'amount not rounded to 12.35';
    },
  },
  {
    name: 'search finds it',
    path: () => `/expenses?q=${encodeURIComponent(note)}`,
    status: 200,
    verify: (body) => (Array.isArray(body) && body.length === 1 ? undefined : 'expected exactly one match'),
  },
  { name: 'reject non-numeric amount', method: 'POST', path: () => '/expenses', body: { amount: 'twelve' }, status: 400 },
  { name: 'summary', path: () => '/summary', status: 200 },
  { name: 'delete', method: 'DELETE', path: () => `/expenses/${createdId}`, status: 200 },
  { name: 'delete again', method: 'DELETE', path: () => `/expenses/${createdId}`, status: 404 },
];

async function run(check: Check): Promise<string | undefined> {
  const response = await fetch(`${API_BASE}${check.path()}`, {
    method: check.method ?? 'GET',
    headers: { 'Content-Type': 'application/json' },
    body: check.body === undefined ? undefined : JSON.stringify(check.body),
  });
  if (response.status !== check.status) return `expected ${check.status}, got ${response.status}`;
  return check.verify?.(await response.json());
}

async function main(): Promise<void> {
  let failed = 0;
  for (const check of checks) {
    let problem: string | undefined;
    try {
      problem = await run(check);
    } catch (error) {
      problem = error instanceof Error ? error.message : String(error);
    }
    if (problem) failed++;
    console.log(problem ? `✗ ${check.name}: ${problem}` : `✓ ${check.name}`);
  }

  console.log(`\n${checks.length - failed} passed, ${failed} failed (${API_BASE})`);
  if (failed > 0) process.exitCode = 1;
}

main().catch((error: unknown) => {
  console.error('Smoke test crashed:', error);
  process.exitCode = 1;
});
