import { type Request, type RequestHandler, type Response } from 'express';
import { z, ZodError } from 'zod';
import { SeeingError, describeError } from '../utils/errors.js';
import { createLocation, type Location } from '../utils/location.js';

export const coordinateSchema = z.object({
  lat: z.coerce.number().min(-90).max(90),
  lon: z.coerce.number().min(-180).max(180),
  name: z.string().trim().max(120).optional(),
  elevation: z.coerce.number().min(0).max(9000).optional(),
});

export type CoordinateInput = z.infer<typeof coordinateSchema>;

export const toLocation = ({ lat, lon, name, elevation }: CoordinateInput): Location =>
  createLocation({ name, latitude: lat, longitude: lon, elevation });

const formatIssue = (error: ZodError): string => {
  const issue = error.issues[0];
  if (!issue) return 'Invalid request';
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
};

export const sendError = (res: Response, error: unknown): void => {
  if (res.headersSent) return;

  if (error instanceof ZodError) {
    res.status(400).json({ error: 'Invalid request', details: formatIssue(error) });
    return;
  }
  if (error instanceof SeeingError) {
    if (error.statusCode >= 500) {
      console.error(`[${String(res.locals.requestId ?? '-')}] ${error.name}: ${error.message}`);
    }
    res.status(error.statusCode).json({ error: error.message, details: error.name });
    return;
  }

  console.error(`[${String(res.locals.requestId ?? '-')}] Unhandled route error:`, error);
  res.status(500).json({ error: 'Internal server error', details: describeError(error) });
};

/** Express 4 does not await handlers, so rejections are routed to sendError here. */
export const handleRoute =
  (handler: (req: Request, res: Response) => Promise<void> | void): RequestHandler =>
  (req, res) => {
    void Promise.resolve()
      .then(() => handler(req, res))
      .catch((error: unknown) => sendError(res, error));
  };
