import type { Express } from 'express';
import { createApp, registerNotFoundHandler } from './src/server/create-app.js';
import { startServer } from './src/server/start-server.js';
import {
  PORT,
  IS_PRODUCTION,
  DATA_ROOT,
  TABLES_ROOT,
  HISTORY_ROOT,
  LIGHT_POLLUTION_GRID_PATH,
  RATE_LIMIT_WINDOW_MS,
  RATE_LIMIT_MAX_REQUESTS,
  CORS_ALLOWLIST,
} from './src/server/runtime.js';
import { loadGridAssets, type GridAssets } from './src/utils/grid.js';
import { createGridBortleSource, type BortleSource } from './src/utils/light-pollution.js';
import { registerHealthRoutes } from './src/routes/health.js';
import { registerForecastRoute } from './src/routes/forecast.js';
import { registerHistoryRoute } from './src/routes/history.js';

interface BuildStargazingAppOptions {
  assets: GridAssets;
  dataRoot: string;
  historyRoot: string;
  bortleSource?: BortleSource | null;
  now?: () => Date;
}

export const buildStargazingApp = ({ assets, dataRoot, historyRoot, bortleSource = null, now }: BuildStargazingAppOptions): Express => {
  const stargazingApp = createApp({
    isProduction: IS_PRODUCTION,
    corsAllowlist: CORS_ALLOWLIST,
    rateLimitWindowMs: RATE_LIMIT_WINDOW_MS,
    rateLimitMaxRequests: RATE_LIMIT_MAX_REQUESTS,
  });

  registerHealthRoutes({ app: stargazingApp, dataRoot, bortleSource, now });
  registerForecastRoute({ app: stargazingApp, assets, dataRoot, bortleSource, now });
  registerHistoryRoute({ app: stargazingApp, assets, historyRoot, bortleSource, now });
  registerNotFoundHandler(stargazingApp);
  return stargazingApp;
};

const assets = loadGridAssets({ dataRoot: DATA_ROOT, tablesRoot: TABLES_ROOT });

const app = buildStargazingApp({
  assets,
  dataRoot: DATA_ROOT,
  historyRoot: HISTORY_ROOT,
  bortleSource: LIGHT_POLLUTION_GRID_PATH ? createGridBortleSource(LIGHT_POLLUTION_GRID_PATH, assets) : null,
});

if (process.env.NODE_ENV !== 'test') {
  startServer({ app, port: PORT });
}

export { app };
