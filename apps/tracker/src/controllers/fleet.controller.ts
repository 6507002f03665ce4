import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { FleetQueryPort } from '@fleet-trips/domain';

const tripsQuerySchema = z.object({
  order: z.enum(['detected', 'started']).default('started'),
  limit: z.coerce.number().int().min(1).max(500).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});

export function createFleetRouter(fleet: FleetQueryPort, cityName: string): Router {
  const router = Router();

  /** GET /api/fleet - feed freshness and tracking totals */
  router.get('/', (_req: Request, res: Response) => {
    res.json({ city: cityName, ...fleet.getSummary() });
  });

  /** GET /api/fleet/vehicles/:vehicleId - last at-rest sample of one bike */
  router.get('/vehicles/:vehicleId', (req: Request, res: Response) => {
    const vehicle = fleet.getVehicle(req.params['vehicleId'] ?? '');
    if (!vehicle) {
      res.status(404).json({ error: 'vehicle not found' });
      return;
    }
    res.json(vehicle);
  });

  return router;
}

export function createTripsRouter(fleet: FleetQueryPort): Router {
  const router = Router();

  /** GET /api/trips - detected trips, oldest start first unless order=detected */
  router.get('/', (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = tripsQuerySchema.parse(req.query);
      res.json(fleet.listTrips(query));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
