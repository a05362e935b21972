import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { TelemetryIngestionPort } from '@transit-pulse/domain';

const envelopeSchema = z.object({
  encrypted_data: z.string().min(1),
});

export function telemetryRouter(ingestion: TelemetryIngestionPort): Router {
  const router = Router();

  /** POST /api/telemetry — one encrypted sensor reading from a device */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = envelopeSchema.parse(req.body);
      const result = await ingestion.ingest({ encryptedData: body.encrypted_data });
      const { position, analysis } = result;
      res.json({
        latitude: position.latitude,
        longitude: position.longitude,
        snapped: position.snapped,
        ...(analysis
          ? {
              testing_analysis: {
                ground_truth_lat: analysis.groundTruthLatitude,
                ground_truth_lng: analysis.groundTruthLongitude,
                error_meters: Math.round(analysis.errorMeters * 100) / 100,
              },
            }
          : {}),
      });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
