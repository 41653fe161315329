import type { DailyTotalRow, ModelTotalRow, ProjectTotalRow, UsageRecord } from './db.js';

export type BudgetStatus = 'ok' | 'warn' | 'over';

export interface BudgetSettings {
  limitKrw: number;
  warnRatio: number;
}

export interface PeriodTotals {
  todayUsd: number;
  monthlyUsd: number;
  alltimeUsd: number;
}

// Rounding for JSON output
export const roundUsd = (usd: number): number => Number(usd.toFixed(6));
export const roundRate = (rate: number): number => Number(rate.toFixed(2));
export const toKrw = (usd: number, rate: number): number => Math.round(usd * rate);

const wonFormatter = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

/** "12,345원" from 1,000 won up, "690.0원" below */
export function formatKrw(usd: number, rate: number): string {
  const krw = usd * rate;
  if (krw >= 1000) return `${wonFormatter.format(krw)}원`;
  return `${krw.toFixed(1)}원`;
}

export function budgetUsedPct(monthlyKrw: number, limitKrw: number): number {
  if (limitKrw <= 0) return 0;
  return Math.round((monthlyKrw / limitKrw) * 1000) / 10;
}

export function budgetStatus(usedPct: number, warnRatio: number): BudgetStatus {
  if (usedPct >= 100) return 'over';
  if (usedPct >= warnRatio * 100) return 'warn';
  return 'ok';
}

function amount(usd: number, rate: number) {
  return { usd: roundUsd(usd), krw: toKrw(usd, rate), krw_fmt: formatKrw(usd, rate) };
}

export function buildSummary(totals: PeriodTotals, rate: number, budget: BudgetSettings, now: Date) {
  const usedPct = budgetUsedPct(totals.monthlyUsd * rate, budget.limitKrw);
  return {
    today: amount(totals.todayUsd, rate),
    monthly: amount(totals.monthlyUsd, rate),
    alltime: amount(totals.alltimeUsd, rate),
    budget: {
      limit_krw: budget.limitKrw,
      used_pct: usedPct,
      status: budgetStatus(usedPct, budget.warnRatio),
    },
    exchange_rate: roundRate(rate),
    timestamp: now.toISOString(),
  };
}

export function modelRows(rows: ModelTotalRow[], rate: number) {
  return rows.map((row) => ({
    model: row.model,
    calls: row.calls,
    input_tokens: row.input_tokens,
    output_tokens: row.output_tokens,
    cost_usd: roundUsd(row.cost_usd),
    cost_krw: toKrw(row.cost_usd, rate),
    cost_krw_fmt: formatKrw(row.cost_usd, rate),
  }));
}

export function projectRows(rows: ProjectTotalRow[], rate: number) {
  return rows.map((row) => ({
    project: row.project,
    cost_usd: roundUsd(row.cost_usd),
    cost_krw: toKrw(row.cost_usd, rate),
    cost_krw_fmt: formatKrw(row.cost_usd, rate),
  }));
}

export function dailyRows(rows: DailyTotalRow[], rate: number) {
  return rows.map((row) => ({
    date: row.date,
    calls: row.calls,
    cost_usd: roundUsd(row.cost_usd),
    cost_krw: toKrw(row.cost_usd, rate),
  }));
}

export function historyRows(rows: UsageRecord[], rate: number) {
  return rows.map((row) => ({
    timestamp: row.timestamp,
    project: row.project,
    model: row.model,
    input_tokens: row.input_tokens,
    output_tokens: row.output_tokens,
    cost_usd: roundUsd(row.cost_usd),
    cost_krw: toKrw(row.cost_usd, rate),
  }));
}
