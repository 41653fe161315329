/**
 * Pure display computations for the cost widget.
 * Plain data in, plain data out; nothing here touches React or IO.
 */
import type { BarColor, BudgetLevel } from './types';

export const REFRESH_INTERVAL_MS = 15_000;
export const MODEL_NAME_LIMIT = 25;

const WARN_PCT = 80;
const OVER_PCT = 100;

export const COLOR_HEX: Record<BarColor, string> = {
  green: '#22c55e',
  amber: '#f59e0b',
  red: '#ef4444',
};

/** Bar fill width in percent, capped at a full bar */
export function budgetBarWidth(usedPct: number): number {
  return Math.min(usedPct, OVER_PCT);
}

/** green < 80 ≤ amber < 100 ≤ red */
export function budgetBarColor(usedPct: number): BarColor {
  if (usedPct >= OVER_PCT) return 'red';
  if (usedPct >= WARN_PCT) return 'amber';
  return 'green';
}

/** Server-reported level, rendered as reported (may disagree with the bar) */
export function statusColor(status: BudgetLevel): BarColor {
  switch (status) {
    case 'over':
      return 'red';
    case 'warn':
      return 'amber';
    case 'ok':
      return 'green';
  }
}

export function buttonGradient(status: BudgetLevel | undefined): string {
  if (status === 'over') return 'linear-gradient(135deg, #ef4444, #dc2626)';
  if (status === 'warn') return 'linear-gradient(135deg, #f59e0b, #d97706)';
  return 'linear-gradient(135deg, #6366f1, #a855f7)';
}

const krwFmt = new Intl.NumberFormat('ko-KR', { maximumFractionDigits: 0 });
const rateFmt = new Intl.NumberFormat('ko-KR', { maximumFractionDigits: 2 });

export const formatKRW = (n: number) => `₩${krwFmt.format(n)}`;
export const formatRate = (n: number) => `₩${rateFmt.format(n)}`;
export const formatUSD = (n: number) => `$${n.toFixed(4)}`;

export function truncateModelName(model: string): string {
  return model.length > MODEL_NAME_LIMIT ? `${model.substring(0, MODEL_NAME_LIMIT)}...` : model;
}

/** HH:MM:SS in local time */
export function clockTime(epochMs: number): string {
  const d = new Date(epochMs);
  return [d.getHours(), d.getMinutes(), d.getSeconds()]
    .map((n) => String(n).padStart(2, '0'))
    .join(':');
}
