import express, { type ErrorRequestHandler } from 'express';
import cors from 'cors';
import { z } from 'zod';
import type { CostTracker } from './tracker.js';
import {
  buildSummary,
  budgetUsedPct,
  dailyRows,
  formatKrw,
  historyRows,
  modelRows,
  projectRows,
  roundRate,
  roundUsd,
  toKrw,
  type BudgetSettings,
} from './report.js';

export interface RateSource {
  getRate(): Promise<number>;
}

export interface AppDeps {
  tracker: CostTracker;
  rates: RateSource;
  budget: BudgetSettings;
  corsOrigin?: string;
  now?: () => Date;
}

const UsageBodySchema = z.object({
  model: z.string().trim().min(1),
  input_tokens: z.number().int().nonnegative(),
  output_tokens: z.number().int().nonnegative(),
  project: z.string().trim().min(1).optional(),
});

export const ENDPOINTS = [
  '/api/cost/summary',
  '/api/cost/today',
  '/api/cost/monthly',
  '/api/cost/history',
  '/api/cost/models',
  '/api/cost/projects',
] as const;

export function createApp({ tracker, rates, budget, corsOrigin = '*', now = () => new Date() }: AppDeps) {
  const app = express();

  app.use(cors({ origin: corsOrigin }));
  app.use(express.json());

  app.get('/', (_req, res) => {
    res.json({ service: 'API Cost Monitor', version: '1.0', endpoints: ENDPOINTS });
  });

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({ ok: true });
  });

  // GET /api/cost/summary - today / month / all-time totals and budget state
  app.get('/api/cost/summary', async (_req, res) => {
    try {
      const rate = await rates.getRate();
      const summary = buildSummary(
        {
          todayUsd: tracker.todayTotal(),
          monthlyUsd: tracker.monthlyTotal(),
          alltimeUsd: tracker.allTimeTotal(),
        },
        rate,
        budget,
        now(),
      );
      res.json(summary);
    } catch (error) {
      console.error('[Cost] Error building summary:', error);
      res.status(500).json({ error: 'Failed to build cost summary' });
    }
  });

  // GET /api/cost/today - today's total with per-model breakdown
  app.get('/api/cost/today', async (_req, res) => {
    try {
      const rate = await rates.getRate();
      const total = tracker.todayTotal();
      res.json({
        total_usd: roundUsd(total),
        total_krw: toKrw(total, rate),
        total_krw_fmt: formatKrw(total, rate),
        models: modelRows(tracker.modelBreakdown(tracker.todayStart()), rate),
        exchange_rate: roundRate(rate),
      });
    } catch (error) {
      console.error('[Cost] Error fetching today:', error);
      res.status(500).json({ error: 'Failed to fetch today costs' });
    }
  });

  // GET /api/cost/monthly - month-to-date with models and per-day series
  app.get('/api/cost/monthly', async (_req, res) => {
    try {
      const rate = await rates.getRate();
      const total = tracker.monthlyTotal();
      const since = tracker.monthStart();
      res.json({
        total_usd: roundUsd(total),
        total_krw: toKrw(total, rate),
        total_krw_fmt: formatKrw(total, rate),
        budget_limit_krw: budget.limitKrw,
        budget_pct: budgetUsedPct(total * rate, budget.limitKrw),
        models: modelRows(tracker.modelBreakdown(since), rate),
        daily: dailyRows(tracker.dailyTotals(since), rate),
        exchange_rate: roundRate(rate),
      });
    } catch (error) {
      console.error('[Cost] Error fetching monthly:', error);
      res.status(500).json({ error: 'Failed to fetch monthly costs' });
    }
  });

  // GET /api/cost/history - latest 50 records
  app.get('/api/cost/history', async (_req, res) => {
    try {
      const rate = await rates.getRate();
      const records = historyRows(tracker.history(50), rate);
      res.json({ count: records.length, records, exchange_rate: roundRate(rate) });
    } catch (error) {
      console.error('[Cost] Error fetching history:', error);
      res.status(500).json({ error: 'Failed to fetch history' });
    }
  });

  // GET /api/cost/models - all-time per-model totals
  app.get('/api/cost/models', async (_req, res) => {
    try {
      const rate = await rates.getRate();
      res.json({ models: modelRows(tracker.modelBreakdown(), rate), exchange_rate: roundRate(rate) });
    } catch (error) {
      console.error('[Cost] Error fetching models:', error);
      res.status(500).json({ error: 'Failed to fetch model breakdown' });
    }
  });

  // GET /api/cost/projects - all-time per-project totals
  app.get('/api/cost/projects', async (_req, res) => {
    try {
      const rate = await rates.getRate();
      res.json({ projects: projectRows(tracker.projectBreakdown(), rate), exchange_rate: roundRate(rate) });
    } catch (error) {
      console.error('[Cost] Error fetching projects:', error);
      res.status(500).json({ error: 'Failed to fetch project breakdown' });
    }
  });

  // POST /api/cost/usage - record one LLM call
  app.post('/api/cost/usage', (req, res) => {
    const parsed = UsageBodySchema.safeParse(req.body);
    if (!parsed.success) {
      const detail = parsed.error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`).join('; ');
      res.status(400).json({ error: `Invalid usage record: ${detail}` });
      return;
    }

    try {
      const record = tracker.record(parsed.data);
      res.status(201).json(record);
    } catch (error) {
      console.error('[Cost] Error recording usage:', error);
      res.status(500).json({ error: 'Failed to record usage' });
    }
  });

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  const errorHandler: ErrorRequestHandler = (err, _req, res, _next) => {
    console.error('[Cost] Unhandled error:', err);
    const status = err instanceof SyntaxError ? 400 : 500;
    res.status(status).json({ error: status === 400 ? 'Malformed JSON body' : 'Internal server error' });
  };
  app.use(errorHandler);

  return app;
}
