import { createApp } from './src/server/create-app.js';
import { registerRoutes } from './src/server/register-routes.js';
import { startServer } from './src/server/start-server.js';
import {
  PORT,
  IS_PRODUCTION,
  REQUEST_TIMEOUT_MS,
  WEATHER_CACHE_TTL_MS,
  DEFAULT_FORECAST_HOURS,
  RATE_LIMIT_WINDOW_MS,
  RATE_LIMIT_MAX_REQUESTS,
  CORS_ALLOWLIST,
  CATALOG_PATH,
  SCORING_WEIGHTS_JSON,
} from './src/server/runtime.js';
import { createAdvisorService } from './src/utils/advisor.js';
import { createAlertService } from './src/utils/alerts.js';
import { createAstronomyCalculator } from './src/utils/astronomy.js';
import { createCelestialCatalog, loadCatalogObjects } from './src/utils/catalog.js';
import { createForecastService } from './src/utils/forecast-service.js';
import { DEFAULT_FETCH_HEADERS, createFetchWithTimeout } from './src/utils/http-client.js';
import { createScoringEngine, parseScoringWeights } from './src/utils/scoring.js';
import { createSeeingService } from './src/utils/seeing-service.js';
import { createWeatherCache } from './src/utils/weather-cache.js';
import { createOpenMeteoJetStreamProvider, createOpenMeteoWeatherProvider } from './src/utils/weather-service.js';

const fetchWithTimeout = createFetchWithTimeout(REQUEST_TIMEOUT_MS);

const astronomy = createAstronomyCalculator();
const catalog = createCelestialCatalog({ objects: loadCatalogObjects(CATALOG_PATH), astronomy });
const scoring = createScoringEngine({ weights: parseScoringWeights(SCORING_WEIGHTS_JSON) });
const weatherCache = createWeatherCache({ ttlMs: WEATHER_CACHE_TTL_MS });

const seeingService = createSeeingService({
  weatherProvider: createOpenMeteoWeatherProvider({ fetchWithTimeout, headers: DEFAULT_FETCH_HEADERS }),
  jetStreamProvider: createOpenMeteoJetStreamProvider({ fetchWithTimeout, headers: DEFAULT_FETCH_HEADERS }),
  astronomy,
  catalog,
  scoring,
  cache: weatherCache,
  cacheTtlMs: WEATHER_CACHE_TTL_MS,
});

export const app = createApp({
  isProduction: IS_PRODUCTION,
  corsAllowlist: CORS_ALLOWLIST,
  rateLimitWindowMs: RATE_LIMIT_WINDOW_MS,
  rateLimitMaxRequests: RATE_LIMIT_MAX_REQUESTS,
});

registerRoutes({
  app,
  seeingService,
  forecastService: createForecastService({ seeingService }),
  advisorService: createAdvisorService({ catalog }),
  alertService: createAlertService(),
  weatherCache,
  defaultForecastHours: DEFAULT_FORECAST_HOURS,
});

if (process.env.NODE_ENV !== 'test') {
  startServer({ app, port: PORT });
}
