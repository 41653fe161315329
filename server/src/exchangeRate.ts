import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';

const CacheSchema = z.object({
  timestamp: z.string(),
  rate: z.number().positive(),
});

const RatesResponseSchema = z.object({
  rates: z.object({ KRW: z.number().positive() }),
});

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface ExchangeRateOptions {
  url: string;
  cachePath: string;
  fallbackRate: number;
  ttlMs?: number;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
  now?: () => number;
}

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * USD→KRW rate, cached in a JSON file for a day. Never rejects: when neither
 * the cache nor the remote source yields a rate, the fallback is returned.
 */
export class ExchangeRateProvider {
  private readonly ttlMs: number;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly now: () => number;

  constructor(private readonly options: ExchangeRateOptions) {
    this.ttlMs = options.ttlMs ?? DAY_MS;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.now = options.now ?? Date.now;
  }

  async getRate(): Promise<number> {
    const cached = await this.readCache();
    if (cached !== null) return cached;

    try {
      const rate = await this.fetchRate();
      await this.writeCache(rate);
      console.log(`[Rate] Exchange rate updated: 1 USD = ${rate.toFixed(2)} KRW`);
      return rate;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[Rate] Exchange rate fetch failed: ${message}, using fallback ${this.options.fallbackRate}`);
      return this.options.fallbackRate;
    }
  }

  /** Fresh cached rate, or null when missing, unreadable or expired */
  private async readCache(): Promise<number | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.options.cachePath, 'utf-8');
    } catch {
      return null;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      return null;
    }

    const parsed = CacheSchema.safeParse(json);
    if (!parsed.success) return null;

    const cachedAt = Date.parse(parsed.data.timestamp);
    if (Number.isNaN(cachedAt) || this.now() - cachedAt >= this.ttlMs) return null;
    return parsed.data.rate;
  }

  private async fetchRate(): Promise<number> {
    const response = await this.fetchImpl(this.options.url, {
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!response.ok) {
      throw new Error(`HTTP ${response.status}`);
    }
    const parsed = RatesResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error('response has no KRW rate');
    }
    return parsed.data.rates.KRW;
  }

  private async writeCache(rate: number): Promise<void> {
    const body = JSON.stringify({ timestamp: new Date(this.now()).toISOString(), rate });
    try {
      await fs.mkdir(path.dirname(this.options.cachePath), { recursive: true });
      await fs.writeFile(this.options.cachePath, body, 'utf-8');
    } catch (error) {
      console.warn('[Rate] Could not write exchange rate cache:', error);
    }
  }
}
