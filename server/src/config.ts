import 'dotenv/config';
import path from 'path';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const dataDir = path.join(__dirname, '../data');

function num(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export interface Config {
  port: number;
  host: string;
  dbPath: string;
  corsOrigin: string;
  budgetLimitKrw: number;
  budgetWarnRatio: number;
  defaultProject: string;
  exchangeRateUrl: string;
  exchangeCachePath: string;
  fallbackRate: number;
  // Organizer / Google Drive
  driveClientId: string;
  driveClientSecret: string;
  driveRefreshToken: string;
  organizeDestination: string;
}

export const config: Config = {
  port: num(process.env.PORT, 5050),
  host: process.env.HOST || '0.0.0.0',
  dbPath: process.env.COST_DB_PATH || path.join(dataDir, 'api_usage.db'),
  corsOrigin: process.env.CORS_ORIGIN || '*',

  budgetLimitKrw: num(process.env.BUDGET_LIMIT_KRW, 50_000),
  budgetWarnRatio: num(process.env.BUDGET_WARN_RATIO, 0.8),
  defaultProject: process.env.COST_DEFAULT_PROJECT || 'cost_api',

  exchangeRateUrl: process.env.EXCHANGE_RATE_URL || 'https://open.er-api.com/v6/latest/USD',
  exchangeCachePath: process.env.EXCHANGE_CACHE_PATH || path.join(dataDir, 'exchange_rate_cache.json'),
  fallbackRate: num(process.env.EXCHANGE_FALLBACK_RATE, 1380),

  driveClientId: process.env.DRIVE_CLIENT_ID || '',
  driveClientSecret: process.env.DRIVE_CLIENT_SECRET || '',
  driveRefreshToken: process.env.DRIVE_REFRESH_TOKEN || '',
  organizeDestination: process.env.ORGANIZE_DESTINATION || '프로젝트 관리',
};
