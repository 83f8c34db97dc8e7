import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { TelemetryIngestionPort } from '@uwb-locator/domain';

export const telemetryPayloadSchema = z.union([z.string(), z.array(z.string())]);

const rawBodySchema = z.object({
  payload: telemetryPayloadSchema,
});

export function createRawIngestRouter(ingestion: TelemetryIngestionPort): Router {
  const router = Router();

  /** POST /api/raw/ingest: store calibrated readings and forward them downstream */
  router.post('/ingest', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = rawBodySchema.parse(req.body);
      const summary = await ingestion.ingestRaw(body.payload);
      res.json(summary);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
