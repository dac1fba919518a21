import { type Express, type Request, type Response } from 'express';
import pkg from '../../package.json' with { type: 'json' };

const { version } = pkg;

export interface HealthStats {
  catalogObjects: number;
  cachedWeatherHours: number;
  alerts: number;
}

const healthPayload = (stats: HealthStats) => {
  const mem = process.memoryUsage();
  return {
    ok: true,
    service: 'seeing-forecast-backend',
    version,
    env: process.env.NODE_ENV || 'development',
    uptime: Math.floor(process.uptime()),
    nodeVersion: process.version,
    memory: {
      heapUsedMb: Math.round(mem.heapUsed / 1024 / 1024),
      rssMb: Math.round(mem.rss / 1024 / 1024),
    },
    ...stats,
    timestamp: new Date().toISOString(),
  };
};

interface RegisterHealthRoutesOptions {
  app: Express;
  getStats: () => HealthStats;
}

export const registerHealthRoutes = ({ app, getStats }: RegisterHealthRoutesOptions) => {
  const respond = (_req: Request, res: Response) => {
    res.json(healthPayload(getStats()));
  };

  app.get('/healthz', respond);
  app.get('/health', respond);
  app.get('/api/healthz', respond);
  app.get('/api/health', respond);
};
