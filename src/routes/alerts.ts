import { type Express } from 'express';
import { z } from 'zod';
import { ALERT_VARIABLES } from '../utils/alert-conditions.js';
import { type AlertService } from '../utils/alerts.js';
import { type SeeingService } from '../utils/seeing-service.js';
import { coordinateSchema, handleRoute, toLocation } from './route-helpers.js';

const alertBodySchema = z.object({
  condition: z.string().trim().min(1).max(500),
  enabled: z.boolean().default(true),
  notify: z.boolean().default(true),
});

const alertIndexSchema = z.object({
  index: z.coerce.number().int().min(0),
});

interface RegisterAlertRoutesOptions {
  app: Express;
  alertService: AlertService;
  seeingService: SeeingService;
}

export const registerAlertRoutes = ({ app, alertService, seeingService }: RegisterAlertRoutesOptions) => {
  const listed = () => alertService.list().map((alert, index) => ({ index, ...alert }));

  app.get(
    '/api/alerts',
    handleRoute((_req, res) => {
      res.json({ alerts: listed(), variables: ALERT_VARIABLES });
    }),
  );

  app.post(
    '/api/alerts',
    handleRoute((req, res) => {
      const { condition, enabled, notify } = alertBodySchema.parse(req.body);
      const alert = alertService.add(condition, { enabled, notify });
      res.status(201).json({ index: alertService.list().length - 1, ...alert });
    }),
  );

  app.get(
    '/api/alerts/evaluate',
    handleRoute(async (req, res) => {
      const query = coordinateSchema.parse(req.query);
      const report = await seeingService.getCurrentConditions(toLocation(query));
      res.json({ score: report.score.totalScore, triggered: alertService.evaluate(report) });
    }),
  );

  app.delete(
    '/api/alerts/:index',
    handleRoute((req, res) => {
      const { index } = alertIndexSchema.parse(req.params);
      if (!alertService.remove(index)) {
        res.status(404).json({ error: `No alert at index ${index}`, details: 'AlertNotFound' });
        return;
      }
      res.status(204).end();
    }),
  );
};
