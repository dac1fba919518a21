import { type Express } from 'express';
import { z } from 'zod';
import { type ForecastService } from '../utils/forecast-service.js';
import { MAX_FORECAST_HOURS } from '../utils/weather-service.js';
import { getSeeingRating } from '../utils/scoring.js';
import { isObservable } from '../utils/seeing-report.js';
import { type SeeingService } from '../utils/seeing-service.js';
import { coordinateSchema, handleRoute, toLocation } from './route-helpers.js';

interface RegisterForecastRoutesOptions {
  app: Express;
  seeingService: SeeingService;
  forecastService: ForecastService;
  defaultForecastHours: number;
}

export const registerForecastRoutes = ({ app, seeingService, forecastService, defaultForecastHours }: RegisterForecastRoutesOptions) => {
  const hoursSchema = z.coerce.number().int().min(1).max(MAX_FORECAST_HOURS).default(defaultForecastHours);

  const forecastQuerySchema = coordinateSchema.extend({
    hours: hoursSchema,
    target: z.string().trim().min(1).max(120).optional(),
  });

  const bestWindowQuerySchema = coordinateSchema.extend({
    hours: hoursSchema,
    minScore: z.coerce.number().min(0).max(100).default(50),
    minDuration: z.coerce.number().int().min(1).max(24).default(2),
  });

  const bestNightsQuerySchema = coordinateSchema.extend({
    days: z.coerce.number().int().min(1).max(16).default(7),
    minScore: z.coerce.number().min(0).max(100).default(60),
  });

  app.get(
    '/api/forecast',
    handleRoute(async (req, res) => {
      const query = forecastQuerySchema.parse(req.query);
      const location = toLocation(query);
      const forecasts = await seeingService.getForecast(location, query.hours, query.target);
      res.json({
        location,
        hours: query.hours,
        forecasts: forecasts.map((forecast) => ({
          ...forecast,
          rating: getSeeingRating(forecast.score.totalScore),
          observable: isObservable(forecast),
        })),
      });
    }),
  );

  app.get(
    '/api/forecast/best-window',
    handleRoute(async (req, res) => {
      const query = bestWindowQuerySchema.parse(req.query);
      const location = toLocation(query);
      const window = await forecastService.findBestWindow(location, {
        hours: query.hours,
        minScore: query.minScore,
        minDurationHours: query.minDuration,
      });
      res.json({
        location,
        window: window && { ...window, rating: getSeeingRating(window.averageScore) },
      });
    }),
  );

  app.get(
    '/api/forecast/best-nights',
    handleRoute(async (req, res) => {
      const query = bestNightsQuerySchema.parse(req.query);
      const location = toLocation(query);
      const nights = await forecastService.getBestNights(location, { days: query.days, minScore: query.minScore });
      res.json({ location, nights });
    }),
  );
};
