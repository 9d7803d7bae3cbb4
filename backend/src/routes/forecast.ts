import type { Express, Request, Response } from 'express';
import type { GridAssets } from '../utils/grid.js';
import type { BortleSource } from '../utils/light-pollution.js';
import { resolveBortleClass } from '../utils/light-pollution.js';
import { resolveLocation } from '../utils/location.js';
import { buildForecastContext } from '../utils/forecast-service.js';
import { parseCompactDate } from '../utils/time.js';
import { optionalInteger, optionalString, requiredNumber, sendError } from './http-errors.js';

interface RegisterForecastRouteOptions {
  app: Express;
  assets: GridAssets;
  dataRoot: string;
  bortleSource?: BortleSource | null;
  now?: () => Date;
}

export const registerForecastRoute = ({ app, assets, dataRoot, bortleSource = null, now = () => new Date() }: RegisterForecastRouteOptions) => {
  app.get('/api/transparency-forecast', (req: Request, res: Response) => {
    try {
      const lat = requiredNumber(req.query, 'lat');
      const lng = requiredNumber(req.query, 'lng');
      const location = resolveLocation({ lat, lng, timeZone: optionalString(req.query, 'tz') });
      const referenceDate = optionalString(req.query, 'date');
      if (referenceDate !== null) {
        parseCompactDate(referenceDate);
      }
      const bortle = resolveBortleClass({ lat, lng, requested: optionalInteger(req.query, 'bortle'), source: bortleSource });

      res.json(buildForecastContext({ location, bortle, assets, dataRoot, referenceDate, now: now() }));
    } catch (error) {
      sendError(res, error, 'Forecast');
    }
  });
};
