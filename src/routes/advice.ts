import { type Express } from 'express';
import { z } from 'zod';
import { type AdvisorService } from '../utils/advisor.js';
import { type SeeingService } from '../utils/seeing-service.js';
import { coordinateSchema, handleRoute, toLocation } from './route-helpers.js';

const adviceQuerySchema = coordinateSchema.extend({
  limit: z.coerce.number().int().min(1).max(20).default(5),
});

interface RegisterAdviceRouteOptions {
  app: Express;
  seeingService: SeeingService;
  advisorService: AdvisorService;
}

export const registerAdviceRoute = ({ app, seeingService, advisorService }: RegisterAdviceRouteOptions) => {
  app.get(
    '/api/advice',
    handleRoute(async (req, res) => {
      const query = adviceQuerySchema.parse(req.query);
      const location = toLocation(query);
      const report = await seeingService.getCurrentConditions(location);

      res.json({
        location,
        timestamp: report.timestamp,
        score: report.score.totalScore,
        activities: advisorService.getActivityRecommendations(report),
        equipment: advisorService.getEquipmentSuggestions(report),
        targets: advisorService.getTargetRecommendations(report, { location, time: report.timestamp, limit: query.limit }),
      });
    }),
  );
};
