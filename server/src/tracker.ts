import type { Db, DailyTotalRow, ModelTotalRow, ProjectTotalRow, UsageInput, UsageRecord } from './db.js';
import { calcCost } from './pricing.js';

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** Local wall-clock time as stored in api_usage.timestamp */
export function localTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function dayStart(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} 00:00:00`;
}

export function monthStart(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-01 00:00:00`;
}

export interface CostTrackerOptions {
  defaultProject: string;
  now?: () => Date;
}

/**
 * Records LLM usage and answers the period/breakdown queries the cost API serves.
 * All amounts are USD.
 */
export class CostTracker {
  private readonly now: () => Date;

  constructor(
    private readonly db: Db,
    private readonly options: CostTrackerOptions,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  record(input: UsageInput): UsageRecord {
    const cost = calcCost(input.model, input.input_tokens, input.output_tokens);
    const timestamp = localTimestamp(this.now());
    const project = input.project || this.options.defaultProject;

    const result = this.db
      .prepare<[string, string, string, number, number, number]>(`
        INSERT INTO api_usage (timestamp, project, model, input_tokens, output_tokens, cost_usd)
        VALUES (?, ?, ?, ?, ?, ?)
      `)
      .run(timestamp, project, input.model, input.input_tokens, input.output_tokens, cost);

    console.log(
      `[Cost] ${input.model} | in=${input.input_tokens} out=${input.output_tokens} | $${cost.toFixed(6)}`,
    );

    return {
      id: Number(result.lastInsertRowid),
      timestamp,
      project,
      model: input.model,
      input_tokens: input.input_tokens,
      output_tokens: input.output_tokens,
      cost_usd: cost,
    };
  }

  todayStart(): string {
    return dayStart(this.now());
  }

  monthStart(): string {
    return monthStart(this.now());
  }

  private totalSince(since: string | null): number {
    const row = this.db
      .prepare<[string], { total: number }>(
        'SELECT COALESCE(SUM(cost_usd), 0) AS total FROM api_usage WHERE timestamp >= ?',
      )
      .get(since ?? '');
    return row?.total ?? 0;
  }

  todayTotal(): number {
    return this.totalSince(this.todayStart());
  }

  monthlyTotal(): number {
    return this.totalSince(this.monthStart());
  }

  allTimeTotal(): number {
    return this.totalSince(null);
  }

  /** Per-model totals, most expensive first; `since` limits to records at or after it */
  modelBreakdown(since?: string): ModelTotalRow[] {
    return this.db
      .prepare<[string], ModelTotalRow>(`
        SELECT model,
               COUNT(*) AS calls,
               SUM(input_tokens) AS input_tokens,
               SUM(output_tokens) AS output_tokens,
               SUM(cost_usd) AS cost_usd
        FROM api_usage
        WHERE timestamp >= ?
        GROUP BY model
        ORDER BY SUM(cost_usd) DESC
      `)
      .all(since ?? '');
  }

  projectBreakdown(): ProjectTotalRow[] {
    return this.db
      .prepare<[], ProjectTotalRow>(`
        SELECT project, SUM(cost_usd) AS cost_usd
        FROM api_usage
        GROUP BY project
        ORDER BY SUM(cost_usd) DESC
      `)
      .all();
  }

  dailyTotals(since: string): DailyTotalRow[] {
    return this.db
      .prepare<[string], DailyTotalRow>(`
        SELECT DATE(timestamp) AS date, COUNT(*) AS calls, SUM(cost_usd) AS cost_usd
        FROM api_usage
        WHERE timestamp >= ?
        GROUP BY DATE(timestamp)
        ORDER BY DATE(timestamp)
      `)
      .all(since);
  }

  /** Latest records, newest first */
  history(limit = 50): UsageRecord[] {
    return this.db
      .prepare<[number], UsageRecord>('SELECT * FROM api_usage ORDER BY id DESC LIMIT ?')
      .all(limit);
  }
}
