import dotenv from 'dotenv';

dotenv.config();

const parsePositiveInt = (rawValue: string | undefined, fallback: number): number => {
  const parsed = Number(rawValue);
  return Number.isFinite(parsed) && parsed > 0 ? Math.round(parsed) : fallback;
};

export const PORT = process.env.PORT || 3001;
export const IS_PRODUCTION = process.env.NODE_ENV === 'production';
export const DEBUG_SEEING = process.env.DEBUG_SEEING === 'true';

export const REQUEST_TIMEOUT_MS = parsePositiveInt(process.env.REQUEST_TIMEOUT_MS, 9000);
export const WEATHER_CACHE_TTL_MS = parsePositiveInt(process.env.WEATHER_CACHE_TTL_MS, 60 * 60 * 1000);
export const DEFAULT_FORECAST_HOURS = parsePositiveInt(process.env.DEFAULT_FORECAST_HOURS, 48);
export const RATE_LIMIT_WINDOW_MS = parsePositiveInt(process.env.RATE_LIMIT_WINDOW_MS, 15 * 60 * 1000);
export const RATE_LIMIT_MAX_REQUESTS = parsePositiveInt(process.env.RATE_LIMIT_MAX_REQUESTS, 300);

export const CATALOG_PATH = process.env.CATALOG_PATH?.trim() || null;
export const SCORING_WEIGHTS_JSON = process.env.SCORING_WEIGHTS?.trim() || null;

export const CORS_ALLOWLIST = (process.env.CORS_ORIGIN || '')
  .split(',')
  .map((origin) => origin.trim())
  .filter(Boolean);

export const debugLog = (...args: unknown[]): void => {
  if (DEBUG_SEEING) {
    console.log('[Debug]', ...args);
  }
};
