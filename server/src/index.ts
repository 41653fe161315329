import { config } from './config.js';
import { openDatabase } from './db.js';
import { CostTracker } from './tracker.js';
import { ExchangeRateProvider } from './exchangeRate.js';
import { createApp } from './app.js';

const db = openDatabase(config.dbPath);

const app = createApp({
  tracker: new CostTracker(db, { defaultProject: config.defaultProject }),
  rates: new ExchangeRateProvider({
    url: config.exchangeRateUrl,
    cachePath: config.exchangeCachePath,
    fallbackRate: config.fallbackRate,
  }),
  budget: { limitKrw: config.budgetLimitKrw, warnRatio: config.budgetWarnRatio },
  corsOrigin: config.corsOrigin,
});

app.listen(config.port, config.host, () => {
  console.log(`[Cost] API server running on http://localhost:${config.port}/api/cost/summary`);
});

export default app;
