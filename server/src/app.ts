import express from 'express';
import cors from 'cors';
import { expenseInputSchema } from '../../src/db/schema.js';
import { LedgerError } from '../../src/domain/errors.js';
import { forMonth } from '../../src/domain/computations.js';
import type { Ledger } from '../../src/db/ledger.js';

const MONTH_PATTERN = /^\d{4}-\d{2}$/;

function monthParam(value: unknown): string | undefined | null {
  if (value === undefined) return undefined;
  return typeof value === 'string' && MONTH_PATTERN.test(value) ? value : null;
}

export function createApp(ledger: Ledger): express.Express {
  const app = express();

  app.use(cors());
  app.use(express.json());

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({ ok: true });
  });

  // GET /expenses - newest first; ?q= searches, ?month=YYYY-MM filters
  app.get('/expenses', (req, res) => {
    try {
      const { q } = req.query;
      const month = monthParam(req.query.month);
      if (month === null) {
        res.status(400).json({ error: 'month must be YYYY-MM' });
        return;
      }

      if (typeof q === 'string') {
        const results = ledger.search(q);
        res.json(month ? forMonth(results, month) : results);
        return;
      }
      res.json(ledger.list(month));
    } catch (error) {
      console.error('Error fetching expenses:', error);
      res.status(500).json({ error: 'Failed to fetch expenses' });
    }
  });

  // POST /expenses - create one expense
  app.post('/expenses', (req, res) => {
    try {
      const body = expenseInputSchema.safeParse(req.body);
      if (!body.success) {
        res.status(400).json({ error: 'Invalid expense body' });
        return;
      }

      const { expense, saved } = ledger.add(body.data);
      if (!saved) {
        res.status(500).json({ error: 'Failed to save expenses', expense });
        return;
      }
      res.status(201).json(expense);
    } catch (error) {
      if (error instanceof LedgerError) {
        res.status(400).json({ error: error.message });
        return;
      }
      console.error('Error creating expense:', error);
      res.status(500).json({ error: 'Failed to create expense' });
    }
  });

  // DELETE /expenses/:id
  app.delete('/expenses/:id', (req, res) => {
    try {
      const result = ledger.remove(req.params.id);
      if (result === 'not_found') {
        res.status(404).json({ error: 'Expense not found' });
        return;
      }
      if (result === 'save_failed') {
        res.status(500).json({ error: 'Failed to save expenses' });
        return;
      }
      res.json({ ok: true });
    } catch (error) {
      console.error('Error deleting expense:', error);
      res.status(500).json({ error: 'Failed to delete expense' });
    }
  });

  // GET /summary?month=YYYY-MM - total and per-category subtotals
  app.get('/summary', (req, res) => {
    try {
      const month = monthParam(req.query.month);
      if (month === null) {
        res.status(400).json({ error: 'month must be YYYY-MM' });
        return;
      }
      res.json(ledger.summary(month));
    } catch (error) {
      console.error('Error computing summary:', error);
      res.status(500).json({ error: 'Failed to compute summary' });
    }
  });

  return app;
}
