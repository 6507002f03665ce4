import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import type { FleetQueryPort } from '@fleet-trips/domain';

import { createFleetRouter, createTripsRouter } from './controllers/fleet.controller.js';
import { errorHandler } from './middleware/error-handler.js';

export interface AppOptions {
  fleet: FleetQueryPort;
  cityName: string;
  corsOrigin?: string;
}

/** Read-only status API over a running tracker. */
export function buildApp(options: AppOptions): ReturnType<typeof express> {
  const app = express();

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  app.use(cors({ origin: options.corsOrigin ?? '*' }));
  if (process.env['NODE_ENV'] !== 'test') app.use(morgan('combined'));

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.use('/api/fleet', createFleetRouter(options.fleet, options.cityName));
  app.use('/api/trips', createTripsRouter(options.fleet));

  app.get('/healthz', (_req, res) => {
    res.json({ status: 'ok', ts: new Date().toISOString() });
  });

  // ─── Error handler (must be last) ───────────────────────────────────────────
  app.use(errorHandler);

  return app;
}
