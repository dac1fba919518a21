import { type Express, type NextFunction, type Request, type Response } from 'express';
import { registerAdviceRoute } from '../routes/advice.js';
import { registerAlertRoutes } from '../routes/alerts.js';
import { registerCompareRoute } from '../routes/compare.js';
import { registerConditionsRoute } from '../routes/conditions.js';
import { registerForecastRoutes } from '../routes/forecast.js';
import { registerHealthRoutes } from '../routes/health.js';
import { registerTargetRoutes } from '../routes/targets.js';
import { sendError } from '../routes/route-helpers.js';
import { type AdvisorService } from '../utils/advisor.js';
import { type AlertService } from '../utils/alerts.js';
import { type ForecastService } from '../utils/forecast-service.js';
import { type SeeingService } from '../utils/seeing-service.js';
import { type WeatherCache } from '../utils/weather-cache.js';

export interface AppServices {
  seeingService: SeeingService;
  forecastService: ForecastService;
  advisorService: AdvisorService;
  alertService: AlertService;
  weatherCache: WeatherCache | null;
}

interface RegisterRoutesOptions extends AppServices {
  app: Express;
  defaultForecastHours: number;
  now?: () => Date;
}

export const registerRoutes = ({
  app,
  seeingService,
  forecastService,
  advisorService,
  alertService,
  weatherCache,
  defaultForecastHours,
  now,
}: RegisterRoutesOptions): void => {
  const { catalog } = seeingService;

  registerHealthRoutes({
    app,
    getStats: () => ({
      catalogObjects: catalog.size,
      cachedWeatherHours: weatherCache?.size ?? 0,
      alerts: alertService.list().length,
    }),
  });
  registerConditionsRoute({ app, seeingService });
  registerForecastRoutes({ app, seeingService, forecastService, defaultForecastHours });
  registerCompareRoute({ app, forecastService });
  registerTargetRoutes({ app, catalog, forecastService, now });
  registerAdviceRoute({ app, seeingService, advisorService });
  registerAlertRoutes({ app, alertService, seeingService });

  app.use('/api', (_req, res) => {
    res.status(404).json({ error: 'Not found', details: 'NoSuchRoute' });
  });
  // Malformed JSON bodies and anything else thrown synchronously by middleware.
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof SyntaxError) {
      res.status(400).json({ error: 'Malformed JSON body', details: error.message });
      return;
    }
    sendError(res, error);
  });
};
