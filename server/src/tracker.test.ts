import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { openDatabase, type Db } from './db.js';
import { CostTracker, localTimestamp } from './tracker.js';

let db: Db;
let clock: Date;

function tracker(): CostTracker {
  return new CostTracker(db, { defaultProject: 'cost_api', now: () => clock });
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  db = openDatabase(':memory:');
  clock = new Date(2026, 9, 18, 9, 30, 0);
});

afterEach(() => {
  db.close();
  vi.restoreAllMocks();
});

describe('localTimestamp', () => {
  it('formats local wall-clock time', () => {
    expect(localTimestamp(new Date(2026, 0, 5, 7, 8, 9))).toBe('2026-01-05 07:08:09');
  });
});

describe('CostTracker', () => {
  it('records a call with its computed cost', () => {
    const record = tracker().record({ model: 'gpt-4o', input_tokens: 1000, output_tokens: 1000 });

    expect(record).toEqual({
      id: 1,
      timestamp: '2026-10-18 09:30:00',
      project: 'cost_api',
      model: 'gpt-4o',
      input_tokens: 1000,
      output_tokens: 1000,
      cost_usd: 0.0125,
    });
    expect(tracker().history()).toEqual([record]);
  });

  it('splits totals by day, month and all time', () => {
    const t = tracker();
    clock = new Date(2026, 8, 30, 23, 0, 0);
    t.record({ model: 'gpt-4', input_tokens: 1000, output_tokens: 0 }); // 0.03, last month
    clock = new Date(2026, 9, 2, 12, 0, 0);
    t.record({ model: 'gpt-4', input_tokens: 2000, output_tokens: 0 }); // 0.06, this month
    clock = new Date(2026, 9, 18, 8, 0, 0);
    t.record({ model: 'gpt-4', input_tokens: 0, output_tokens: 1000 }); // 0.06, today

    expect(t.todayTotal()).toBeCloseTo(0.06, 10);
    expect(t.monthlyTotal()).toBeCloseTo(0.12, 10);
    expect(t.allTimeTotal()).toBeCloseTo(0.15, 10);
  });

  it('returns zero totals on an empty database', () => {
    const t = tracker();
    expect(t.todayTotal()).toBe(0);
    expect(t.allTimeTotal()).toBe(0);
    expect(t.modelBreakdown()).toEqual([]);
  });

  it('breaks costs down by model, most expensive first', () => {
    const t = tracker();
    t.record({ model: 'gpt-4o-mini', input_tokens: 1000, output_tokens: 0 });
    t.record({ model: 'gpt-4', input_tokens: 1000, output_tokens: 0 });
    t.record({ model: 'gpt-4o-mini', input_tokens: 1000, output_tokens: 0 });

    const rows = t.modelBreakdown();
    expect(rows.map((r) => [r.model, r.calls, r.input_tokens])).toEqual([
      ['gpt-4', 1, 1000],
      ['gpt-4o-mini', 2, 2000],
    ]);
  });

  it('limits the model breakdown to records since a timestamp', () => {
    const t = tracker();
    clock = new Date(2026, 9, 17, 10, 0, 0);
    t.record({ model: 'gpt-4', input_tokens: 1000, output_tokens: 0 });
    clock = new Date(2026, 9, 18, 10, 0, 0);
    t.record({ model: 'gpt-4o', input_tokens: 1000, output_tokens: 0 });

    expect(t.modelBreakdown(t.todayStart()).map((r) => r.model)).toEqual(['gpt-4o']);
  });

  it('groups by project using the default when none is given', () => {
    const t = tracker();
    t.record({ model: 'gpt-4', input_tokens: 1000, output_tokens: 0, project: 'blog' });
    t.record({ model: 'gpt-4o-mini', input_tokens: 1000, output_tokens: 0 });

    expect(t.projectBreakdown().map((r) => r.project)).toEqual(['blog', 'cost_api']);
  });

  it('builds a per-day series for the month', () => {
    const t = tracker();
    clock = new Date(2026, 9, 1, 10, 0, 0);
    t.record({ model: 'gpt-4', input_tokens: 1000, output_tokens: 0 });
    clock = new Date(2026, 9, 3, 10, 0, 0);
    t.record({ model: 'gpt-4', input_tokens: 1000, output_tokens: 0 });
    t.record({ model: 'gpt-4', input_tokens: 1000, output_tokens: 0 });

    const daily = t.dailyTotals(t.monthStart());
    expect(daily.map((d) => [d.date, d.calls])).toEqual([
      ['2026-10-01', 1],
      ['2026-10-03', 2],
    ]);
  });

  it('returns history newest first, capped at the limit', () => {
    const t = tracker();
    for (let i = 1; i <= 3; i++) {
      t.record({ model: 'gpt-4', input_tokens: i, output_tokens: 0 });
    }
    expect(t.history(2).map((r) => r.input_tokens)).toEqual([3, 2]);
  });
});
