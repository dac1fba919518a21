import { type Express } from 'express';
import { z } from 'zod';
import { getMoonPhaseName } from '../utils/astronomy.js';
import { pressureStabilityScore } from '../utils/scoring-components.js';
import { getSeeingRating } from '../utils/scoring.js';
import { summarizeReport } from '../utils/seeing-report.js';
import { type SeeingService } from '../utils/seeing-service.js';
import { coordinateSchema, handleRoute, toLocation } from './route-helpers.js';

const conditionsQuerySchema = coordinateSchema.extend({
  target: z.string().trim().min(1).max(120).optional(),
});

interface RegisterConditionsRouteOptions {
  app: Express;
  seeingService: SeeingService;
}

export const registerConditionsRoute = ({ app, seeingService }: RegisterConditionsRouteOptions) => {
  app.get(
    '/api/conditions',
    handleRoute(async (req, res) => {
      const query = conditionsQuerySchema.parse(req.query);
      const report = await seeingService.getCurrentConditions(toLocation(query), query.target);
      const { score, weather } = report;

      res.json({
        report,
        summary: summarizeReport(report),
        rating: getSeeingRating(score.totalScore),
        moonPhase: getMoonPhaseName(report.astronomy.moonIllumination),
        recommendations: seeingService.scoring.getRecommendations(score, weather),
        bestTargets: seeingService.scoring.getBestTargets(score, weather),
        pressureStability: pressureStabilityScore(weather),
      });
    }),
  );
};
