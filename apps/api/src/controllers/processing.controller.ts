import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { ProcessingInput, TelemetryIngestionPort } from '@uwb-locator/domain';
import { telemetryPayloadSchema } from './raw-ingest.controller.js';

const structuredReadingSchema = z.object({
  tagId: z.union([z.string(), z.number().int().nonnegative()]).transform(String),
  distances: z.array(z.number().nullable()).max(64),
  kx: z.number().nullable().optional(),
  ky: z.number().nullable().optional(),
  cmd: z.number().int().optional(),
  user: z.string().optional(),
  ts: z.string().datetime().optional(),
});

const processingBodySchema = z.union([
  z.object({ payload: telemetryPayloadSchema }),
  z.object({ readings: z.array(structuredReadingSchema).max(1_000) }),
]);

function toProcessingInput(body: z.infer<typeof processingBodySchema>): ProcessingInput {
  if ('payload' in body) return { kind: 'lines', payload: body.payload };
  return {
    kind: 'readings',
    readings: body.readings.map(({ ts, ...r }) => ({
      ...r,
      capturedAt: ts ? new Date(ts) : undefined,
    })),
  };
}

export function createProcessingRouter(ingestion: TelemetryIngestionPort): Router {
  const router = Router();

  /** POST /api/processing/ingest: solve positions and store them with motion deltas */
  router.post('/ingest', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const input = toProcessingInput(processingBodySchema.parse(req.body));
      const summary = await ingestion.ingestProcessed(input);
      res.json(summary);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
