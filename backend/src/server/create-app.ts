import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import compression from 'compression';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import crypto from 'node:crypto';

interface CreateAppOptions {
  isProduction: boolean;
  corsAllowlist: string[];
  rateLimitWindowMs: number;
  rateLimitMaxRequests: number;
}

// Health checks under /api that the rate limit leaves alone.
const UNLIMITED_API_PATHS = new Set(['/health', '/healthz']);

// Read-only service: browsers only ever need GET.
const corsFor = (corsAllowlist: string[], isProduction: boolean) =>
  cors({
    methods: ['GET'],
    origin(origin, callback) {
      if (!origin || corsAllowlist.length === 0) {
        callback(null, !origin || !isProduction);
        return;
      }
      callback(null, corsAllowlist.includes(origin));
    },
  });

const requestLogger = (isProduction: boolean) => (req: Request, res: Response, next: NextFunction) => {
  const requestId = crypto.randomUUID();
  const startedAt = Date.now();
  res.locals.requestId = requestId;
  res.setHeader('X-Request-Id', requestId);
  res.on('finish', () => {
    if (!isProduction || res.statusCode >= 500) {
      console.log(`[Request ${requestId}] ${req.method} ${req.path} -> ${res.statusCode} (${Date.now() - startedAt}ms)`);
    }
  });
  next();
};

export const createApp = ({ isProduction, corsAllowlist, rateLimitWindowMs, rateLimitMaxRequests }: CreateAppOptions): Express => {
  const app = express();

  app.set('trust proxy', 1);
  app.use(helmet());
  app.use(corsFor(corsAllowlist, isProduction));
  // Forecast payloads carry 72 hourly records.
  app.use(compression());
  app.use(requestLogger(isProduction));

  app.use(
    '/api',
    rateLimit({
      windowMs: rateLimitWindowMs,
      limit: rateLimitMaxRequests,
      standardHeaders: true,
      legacyHeaders: false,
      skip: (req) => req.method === 'OPTIONS' || UNLIMITED_API_PATHS.has(req.path),
      message: { error: 'Too many forecast requests. Please retry later.', kind: 'RateLimited' },
    }),
  );

  return app;
};

// Registered after every route so unknown paths answer in the API's error shape.
export const registerNotFoundHandler = (app: Express) => {
  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: `No route for ${req.method} ${req.path}.`, kind: 'NotFound' });
  });
};
