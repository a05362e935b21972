import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { EtaQueryPort } from '@transit-pulse/domain';
import { toEtaResponse } from '../services/eta/eta-response.js';
import type { EtaSubscriptions } from '../services/eta/eta-subscriptions.js';

export const locationSchema = z.object({
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
});

const etaRequestSchema = z.object({
  vehicle_id: z.string().min(1),
  user_location: locationSchema,
});

const subscribeSchema = etaRequestSchema.extend({
  user_id: z.string().min(1).optional(),
});

const unsubscribeSchema = z.object({
  vehicle_id: z.string().min(1),
  user_id: z.string().min(1).optional(),
});

export function etaRouter(eta: EtaQueryPort, subscriptions: EtaSubscriptions): Router {
  const router = Router();

  /** POST /api/eta — distance and smoothed ETA from a vehicle to the rider */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = etaRequestSchema.parse(req.body);
      const estimate = await eta.estimate({ vehicleId: body.vehicle_id, userLocation: body.user_location });
      res.json(toEtaResponse(estimate));
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/eta/subscribe — keep publishing this rider's ETA on the vehicle's channel */
  router.post('/subscribe', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = subscribeSchema.parse(req.body);
      const estimate = await eta.estimate({ vehicleId: body.vehicle_id, userLocation: body.user_location });
      subscriptions.subscribe(body.vehicle_id, body.user_location, body.user_id);
      res.json(toEtaResponse(estimate));
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/eta/unsubscribe */
  router.post('/unsubscribe', (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = unsubscribeSchema.parse(req.body);
      const removed = subscriptions.unsubscribe(body.vehicle_id, body.user_id);
      res.json({ message: 'Unsubscribed from ETA updates', removed });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
