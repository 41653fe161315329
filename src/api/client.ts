import { z } from 'zod';
import type { Snapshot } from '../domain/types';

export const DEFAULT_API_BASE = 'http://localhost:5050';

const AmountSchema = z.object({
  usd: z.number(),
  krw: z.number(),
});

export const SummarySchema = z.object({
  today: AmountSchema,
  monthly: AmountSchema,
  alltime: AmountSchema,
  budget: z.object({
    limit_krw: z.number(),
    used_pct: z.number(),
    status: z.enum(['ok', 'warn', 'over']),
  }),
  exchange_rate: z.number(),
});

export const ModelsSchema = z.object({
  models: z
    .array(
      z.object({
        model: z.string(),
        cost_usd: z.number(),
        cost_krw: z.number(),
      }),
    )
    .optional(),
});

/** Any network, status or payload failure while loading a snapshot */
export class CostApiError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'CostApiError';
  }
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

async function getJson<T>(fetchImpl: FetchLike, url: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
  let response: Response;
  try {
    response = await fetchImpl(url);
  } catch (error) {
    throw new CostApiError(`Request to ${url} failed`, error);
  }
  if (!response.ok) {
    throw new CostApiError(`Request to ${url} returned ${response.status}`);
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    throw new CostApiError(`Response from ${url} is not JSON`, error);
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new CostApiError(`Unexpected payload from ${url}`, parsed.error);
  }
  return parsed.data;
}

/** Both endpoints are fetched together; either failing fails the snapshot */
export async function fetchSnapshot(apiBase: string, fetchImpl: FetchLike = fetch): Promise<Snapshot> {
  const base = apiBase.replace(/\/+$/, '');
  const [summary, models] = await Promise.all([
    getJson(fetchImpl, `${base}/api/cost/summary`, SummarySchema),
    getJson(fetchImpl, `${base}/api/cost/models`, ModelsSchema),
  ]);
  return { ...summary, models: models.models };
}
