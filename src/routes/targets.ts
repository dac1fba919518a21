import { type Express } from 'express';
import { z } from 'zod';
import { getAirmass, getAirmassQuality } from '../utils/astronomy.js';
import { type CelestialCatalog } from '../utils/catalog.js';
import { type ForecastService } from '../utils/forecast-service.js';
import { isIsoDate } from '../utils/time.js';
import { coordinateSchema, handleRoute, toLocation } from './route-helpers.js';

const searchQuerySchema = z.object({
  q: z.string().trim().min(1).max(120),
});

const visibleQuerySchema = coordinateSchema.extend({
  minAltitude: z.coerce.number().min(0).max(90).default(15),
});

const visibilityQuerySchema = coordinateSchema.extend({
  hours: z.coerce.number().int().min(1).max(168).default(24),
});

const imagingQuerySchema = coordinateSchema.extend({
  duration: z.coerce.number().min(0.5).max(12).default(4),
  minAltitude: z.coerce.number().min(0).max(90).default(30),
  minScore: z.coerce.number().min(0).max(100).default(40),
  days: z.coerce.number().int().min(1).max(16).default(7),
  date: z.string().trim().refine(isIsoDate, 'Use YYYY-MM-DD').optional(),
});

interface RegisterTargetRoutesOptions {
  app: Express;
  catalog: CelestialCatalog;
  forecastService: ForecastService;
  now?: () => Date;
}

export const registerTargetRoutes = ({ app, catalog, forecastService, now = () => new Date() }: RegisterTargetRoutesOptions) => {
  app.get(
    '/api/targets/search',
    handleRoute((req, res) => {
      const { q } = searchQuerySchema.parse(req.query);
      res.json({ query: q, results: catalog.searchAll(q) });
    }),
  );

  app.get(
    '/api/targets/visible',
    handleRoute((req, res) => {
      const query = visibleQuerySchema.parse(req.query);
      const time = now();
      const visible = catalog.getVisible(toLocation(query), time, query.minAltitude).map(({ object, altitude, azimuth }) => {
        const airmass = getAirmass(altitude);
        return {
          name: object.name,
          designation: object.designation,
          objectType: object.objectType,
          magnitude: object.magnitude,
          constellation: object.constellation,
          altitude,
          azimuth,
          airmass,
          airmassQuality: getAirmassQuality(airmass),
        };
      });
      res.json({ time, minAltitude: query.minAltitude, objects: visible });
    }),
  );

  app.get(
    '/api/targets/:name/visibility',
    handleRoute(async (req, res) => {
      const query = visibilityQuerySchema.parse(req.query);
      const target = catalog.get(req.params.name);
      const timeline = await forecastService.getTargetVisibility(toLocation(query), target, query.hours);
      res.json({ target, timeline });
    }),
  );

  app.get(
    '/api/targets/:name/imaging-windows',
    handleRoute(async (req, res) => {
      const query = imagingQuerySchema.parse(req.query);
      const target = catalog.get(req.params.name);
      const windows = await forecastService.findImagingWindows(toLocation(query), target, {
        durationHours: query.duration,
        minAltitude: query.minAltitude,
        minScore: query.minScore,
        searchDays: query.days,
        date: query.date ?? null,
      });
      res.json({ target, windows });
    }),
  );
};
