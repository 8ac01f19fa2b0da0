import { z } from 'zod';
import type { Expense } from '../domain/types.js';

/** Shape of one record in the backing file */
export const storedExpenseSchema: z.ZodType<Expense, z.ZodTypeDef, unknown> = z.object({
  id: z.string().min(1),
  amount: z.number().finite().nonnegative(),
  category: z.string(),
  note: z.string(),
  date: z.string(),
});

/** Body of POST /expenses */
export const expenseInputSchema = z.object({
  amount: z.union([z.number(), z.string()]),
  category: z.string().optional(),
  note: z.string().optional(),
  date: z.string().optional(),
});
