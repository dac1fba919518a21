import { type Express } from 'express';
import { z } from 'zod';
import { type ForecastService } from '../utils/forecast-service.js';
import { getSeeingRating } from '../utils/scoring.js';
import { summarizeReport } from '../utils/seeing-report.js';
import { coordinateSchema, handleRoute, toLocation } from './route-helpers.js';

const compareBodySchema = z.object({
  locations: z.array(coordinateSchema).min(2).max(10),
});

export const registerCompareRoute = ({ app, forecastService }: { app: Express; forecastService: ForecastService }) => {
  app.post(
    '/api/compare',
    handleRoute(async (req, res) => {
      const body = compareBodySchema.parse(req.body);
      const comparison = await forecastService.compareLocations(body.locations.map(toLocation));

      const ranked = comparison.ranked().map(({ rank, location, report }) => ({
        rank,
        location,
        score: report.score.totalScore,
        rating: getSeeingRating(report.score.totalScore),
        summary: summarizeReport(report),
        report,
      }));

      res.json({
        timestamp: comparison.timestamp,
        ranked,
        best: ranked[0] ?? null,
        dropped: body.locations.length - ranked.length,
      });
    }),
  );
};
