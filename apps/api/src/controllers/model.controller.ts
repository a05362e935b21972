import { Router } from 'express';
import type { Request, Response } from 'express';
import type { ModelLoader } from '../services/model/model-loader.js';

export function modelRouter(loader: ModelLoader): Router {
  const router = Router();

  /** GET /api/model/status */
  router.get('/status', (_req: Request, res: Response) => {
    res.json(loader.getStatus());
  });

  /** POST /api/model/reload — reset a settled loader and start again */
  router.post('/reload', (_req: Request, res: Response) => {
    res.status(202).json(loader.reload());
  });

  return router;
}
