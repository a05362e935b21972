import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { ProximityAlertPort } from '@transit-pulse/domain';
import type { RealtimeSnapshots } from '../realtime/realtime-snapshots.js';
import { toNotificationMessage } from '../realtime/hub-publisher.js';
import { locationSchema } from './eta.controller.js';

const historyQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export function ridersRouter(proximity: ProximityAlertPort, snapshots: RealtimeSnapshots): Router {
  const router = Router();

  /** PUT /api/riders/:userId/location — store the rider's position and check nearby vehicles */
  router.put('/:userId/location', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const location = locationSchema.parse(req.body);
      const result = await proximity.updateRiderLocation(req.params['userId'], location);
      res.json(result);
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/riders/:userId/notifications — most recent proximity alerts */
  router.get('/:userId/notifications', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { limit } = historyQuerySchema.parse(req.query);
      const records = await snapshots.recentNotifications(req.params['userId'], limit);
      res.json({ data: records.map(toNotificationMessage) });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
