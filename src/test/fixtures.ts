import type { BudgetInfo, Snapshot } from '../domain/types';

export function makeSnapshot(overrides: Partial<Snapshot> = {}, budget: Partial<BudgetInfo> = {}): Snapshot {
  return {
    today: { usd: 0.0123, krw: 17 },
    monthly: { usd: 30.5, krw: 42090 },
    alltime: { usd: 120.25, krw: 165945 },
    budget: { limit_krw: 50000, used_pct: 84.2, status: 'warn', ...budget },
    exchange_rate: 1380,
    models: [
      { model: 'gemini-2.5-flash', cost_usd: 20.1, cost_krw: 27738 },
      { model: 'claude-3-5-haiku-20241022-extended', cost_usd: 10.4, cost_krw: 14352 },
    ],
    ...overrides,
  };
}
