import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import { z } from 'zod';
import { evaluateAllocation } from '../../src/domain/computations.js';
import { NotFoundError, TransientStoreError, ValidationError } from '../../src/domain/errors.js';
import {
  MAX_LIMIT,
  allocationDraftSchema,
  expenseInputSchema,
  isoDate,
  parseInput,
  settingsInputSchema,
} from '../../src/domain/validation.js';
import type { Analytics } from './analytics.js';
import { expensesToCsv } from './export.js';
import type { LedgerStore } from './ledger.js';
import type { SettingsStore } from './settings.js';

export interface AppDeps {
  ledger: LedgerStore;
  settings: SettingsStore;
  analytics: Analytics;
}

export interface ErrorBody {
  error: {
    code: 'VALIDATION_ERROR' | 'NOT_FOUND' | 'STORE_BUSY' | 'INTERNAL';
    message: string;
    fieldErrors?: Record<string, string[]>;
  };
}

// --- Request schemas ---
const idParams = z.object({ id: z.coerce.number().int().positive() });
const limitQuery = z.coerce.number().int().positive().max(MAX_LIMIT).optional();

const listQuery = z.object({
  search: z.string().optional(),
  start: isoDate.optional(),
  end: isoDate.optional(),
  tag: z.string().optional(),
  limit: limitQuery,
});

const analyticsQuery = z.object({
  search: z.string().optional(),
  start: isoDate.optional(),
  end: isoDate.optional(),
  limit: limitQuery,
});

const tagTrendQuery = z.object({
  tag: z.string().trim().min(1, 'tag required'),
  limit: limitQuery,
});

const resetBody = z.object({ confirm: z.string() });

function dateRangeOf(q: { start?: string; end?: string }) {
  return q.start || q.end ? { start: q.start, end: q.end } : undefined;
}

function toErrorBody(err: unknown): { status: number; body: ErrorBody } {
  if (err instanceof ValidationError) {
    const fieldErrors = Object.keys(err.fieldErrors).length > 0 ? { fieldErrors: err.fieldErrors } : {};
    return { status: 400, body: { error: { code: err.code, message: err.message, ...fieldErrors } } };
  }
  // express.json() rejects a malformed body with a SyntaxError
  if (err instanceof SyntaxError) {
    return { status: 400, body: { error: { code: 'VALIDATION_ERROR', message: 'Malformed JSON body' } } };
  }
  if (err instanceof NotFoundError) {
    return { status: 404, body: { error: { code: err.code, message: err.message } } };
  }
  if (err instanceof TransientStoreError) {
    return { status: 503, body: { error: { code: err.code, message: err.message } } };
  }
  return { status: 500, body: { error: { code: 'INTERNAL', message: 'Internal error' } } };
}

export function createApp({ ledger, settings, analytics }: AppDeps): express.Express {
  const app = express();
  const api = express.Router();

  app.use(cors());
  app.use(express.json());

  // Health check endpoint
  api.get('/health', (_req, res) => {
    res.json({ ok: true });
  });

  // --- Expenses ---

  api.get('/expenses', (req, res) => {
    const q = parseInput(listQuery, req.query, 'Invalid query');
    res.json(ledger.listFiltered({
      search: q.search,
      dateRange: dateRangeOf(q),
      tag: q.tag,
      limit: q.limit,
    }));
  });

  api.get('/expenses/:id', (req, res) => {
    const { id } = parseInput(idParams, req.params, 'Invalid id');
    const expense = ledger.get(id);
    if (!expense) throw new NotFoundError('Expense', id);
    res.json(expense);
  });

  api.post('/expenses', (req, res) => {
    const input = parseInput(expenseInputSchema, req.body, 'Invalid expense');
    const id = ledger.insert(input);
    res.status(201).json({ id });
  });

  api.put('/expenses/:id', (req, res) => {
    const { id } = parseInput(idParams, req.params, 'Invalid id');
    const input = parseInput(expenseInputSchema, req.body, 'Invalid expense');
    ledger.update(id, input);
    res.json(ledger.get(id));
  });

  api.delete('/expenses/:id', (req, res) => {
    const { id } = parseInput(idParams, req.params, 'Invalid id');
    ledger.delete(id);
    res.status(204).end();
  });

  api.get('/tags', (req, res) => {
    const limit = parseInput(limitQuery, req.query.limit, 'Invalid limit');
    res.json(ledger.allTagNames(limit));
  });

  // --- Settings ---

  api.get('/settings', (_req, res) => {
    res.json(settings.get());
  });

  api.put('/settings', (req, res) => {
    const input = parseInput(settingsInputSchema, req.body, 'Invalid settings');
    res.json(settings.save(input));
  });

  // Live recompute for a draft the UI is still editing; nothing is stored
  api.post('/allocation', (req, res) => {
    const draft = parseInput(allocationDraftSchema, req.body, 'Invalid allocation draft');
    res.json(evaluateAllocation(draft));
  });

  api.post('/reset', (req, res) => {
    const { confirm } = parseInput(resetBody, req.body, 'Confirmation required');
    settings.reset(confirm);
    res.json({ ok: true });
  });

  api.get('/export.csv', (_req, res) => {
    const csv = expensesToCsv(ledger.listAll());
    res.type('text/csv').attachment('expenses.csv').send(csv);
  });

  // --- Summary & analytics ---

  api.get('/summary', (req, res) => {
    const date = parseInput(isoDate.optional(), req.query.date, 'Invalid date');
    res.json(analytics.budgetSummary(date));
  });

  api.get('/analytics/monthly', (req, res) => {
    const q = parseInput(analyticsQuery, req.query, 'Invalid query');
    res.json(analytics.monthlyTotals(q.limit, { dateRange: dateRangeOf(q), search: q.search }));
  });

  api.get('/analytics/weekly', (req, res) => {
    const limit = parseInput(limitQuery, req.query.limit, 'Invalid limit');
    res.json(analytics.weeklyTotals(limit));
  });

  api.get('/analytics/categories', (req, res) => {
    const q = parseInput(analyticsQuery, req.query, 'Invalid query');
    res.json(analytics.monthlyCategoryTotals(q.limit, dateRangeOf(q)));
  });

  api.get('/analytics/kpi', (req, res) => {
    const q = parseInput(analyticsQuery, req.query, 'Invalid query');
    res.json(analytics.kpiMetrics({ dateRange: dateRangeOf(q), search: q.search }));
  });

  api.get('/analytics/savings-rate', (req, res) => {
    const limit = parseInput(limitQuery, req.query.limit, 'Invalid limit');
    res.json(analytics.monthlySavingsRate(limit));
  });

  api.get('/analytics/tags/top', (req, res) => {
    const limit = parseInput(limitQuery, req.query.limit, 'Invalid limit');
    res.json(analytics.topTagsBySpending(limit));
  });

  api.get('/analytics/tags/monthly', (req, res) => {
    const limit = parseInput(limitQuery, req.query.limit, 'Invalid limit');
    res.json(analytics.tagSpendingByMonth(limit));
  });

  api.get('/analytics/tag-trend', (req, res) => {
    const q = parseInput(tagTrendQuery, req.query, 'Invalid query');
    res.json(analytics.tagSpendingOverTime(q.tag, q.limit));
  });

  app.use('/api', api);

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const { status, body } = toErrorBody(err);
    if (status === 500) {
      console.error(`[api] ${req.method} ${req.path} failed:`, err);
    } else if (status === 503) {
      console.warn(`[api] ${req.method} ${req.path}: ${body.error.message}`);
    }
    res.status(status).json(body);
  });

  return app;
}
