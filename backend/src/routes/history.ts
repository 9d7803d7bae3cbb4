import type { Express, Request, Response } from 'express';
import type { GridAssets } from '../utils/grid.js';
import type { BortleSource } from '../utils/light-pollution.js';
import { resolveBortleClass } from '../utils/light-pollution.js';
import { resolveLocation } from '../utils/location.js';
import { buildHistoricalContext } from '../utils/history-service.js';
import { optionalInteger, optionalString, requiredNumber, sendError } from './http-errors.js';

interface RegisterHistoryRouteOptions {
  app: Express;
  assets: GridAssets;
  historyRoot: string;
  bortleSource?: BortleSource | null;
  now?: () => Date;
}

export const registerHistoryRoute = ({ app, assets, historyRoot, bortleSource = null, now = () => new Date() }: RegisterHistoryRouteOptions) => {
  app.get('/api/historical-transparency', (req: Request, res: Response) => {
    try {
      const lat = requiredNumber(req.query, 'lat');
      const lng = requiredNumber(req.query, 'lng');
      const location = resolveLocation({ lat, lng, timeZone: optionalString(req.query, 'tz') });
      const bortle = resolveBortleClass({ lat, lng, requested: optionalInteger(req.query, 'bortle'), source: bortleSource });
      const year = optionalInteger(req.query, 'year') ?? now().getUTCFullYear();

      res.json(buildHistoricalContext({ location, bortle, year, historyRoot, assets }));
    } catch (error) {
      sendError(res, error, 'History');
    }
  });
};
