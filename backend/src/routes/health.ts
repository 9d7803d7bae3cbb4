import type { Express, Request, Response } from 'express';
import pkg from '../../../package.json' with { type: 'json' };
import { resolveWindow } from '../utils/dataset.js';
import { DataUnavailableError } from '../utils/errors.js';
import type { BortleSource } from '../utils/light-pollution.js';
import { sendError } from './http-errors.js';

const { version } = pkg;

interface RegisterHealthRoutesOptions {
  app: Express;
  dataRoot: string;
  bortleSource?: BortleSource | null;
  now?: () => Date;
}

const latestDataset = (dataRoot: string, now: Date): string | null => {
  try {
    return resolveWindow('gfs', { dataRoot, now }).timestamp;
  } catch (error) {
    if (error instanceof DataUnavailableError) {
      return null;
    }
    throw error;
  }
};

/**
 * `/healthz` is liveness and always answers 200. `/health` is readiness:
 * 503 until a complete forecast run sits under the data root.
 */
export const registerHealthRoutes = ({ app, dataRoot, bortleSource = null, now = () => new Date() }: RegisterHealthRoutesOptions) => {
  const respond = (readiness: boolean) => (_req: Request, res: Response) => {
    try {
      const checkedAt = now();
      const dataset = latestDataset(dataRoot, checkedAt);
      const ready = dataset !== null;
      res.status(readiness && !ready ? 503 : 200).json({
        ok: ready,
        service: 'stargazing-backend',
        version,
        latestDataset: dataset,
        lightPollutionGrid: bortleSource !== null,
        uptime: Math.floor(process.uptime()),
        timestamp: checkedAt.toISOString(),
      });
    } catch (error) {
      sendError(res, error, 'Health');
    }
  };

  app.get('/healthz', respond(false));
  app.get('/api/healthz', respond(false));
  app.get('/health', respond(true));
  app.get('/api/health', respond(true));
};
