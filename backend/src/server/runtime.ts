import dotenv from 'dotenv';

dotenv.config();

const parsePositiveInt = (rawValue: string | undefined, fallback: number): number => {
  const parsed = Number(rawValue);
  return Number.isFinite(parsed) && parsed > 0 ? Math.round(parsed) : fallback;
};

const parseOptionalPath = (rawValue: string | undefined): string | null => {
  const trimmed = (rawValue || '').trim();
  return trimmed ? trimmed : null;
};

export const PORT = parsePositiveInt(process.env.PORT, 3001);
export const IS_PRODUCTION = process.env.NODE_ENV === 'production';
export const DEBUG_FORECAST = process.env.DEBUG_FORECAST === 'true';

// Dataset directories are resolved against the working directory, as the downloader writes them.
export const DATA_ROOT = parseOptionalPath(process.env.DATA_ROOT) || 'data';
export const TABLES_ROOT = parseOptionalPath(process.env.TABLES_ROOT) || DATA_ROOT;
export const HISTORY_ROOT = parseOptionalPath(process.env.HISTORY_ROOT) || 'history_data';
export const LIGHT_POLLUTION_GRID_PATH = parseOptionalPath(process.env.LIGHT_POLLUTION_GRID_PATH);

export const RATE_LIMIT_WINDOW_MS = parsePositiveInt(process.env.RATE_LIMIT_WINDOW_MS, 15 * 60 * 1000);
export const RATE_LIMIT_MAX_REQUESTS = parsePositiveInt(process.env.RATE_LIMIT_MAX_REQUESTS, 300);

export const CORS_ALLOWLIST = (process.env.CORS_ORIGIN || '')
  .split(',')
  .map((origin) => origin.trim())
  .filter(Boolean);
