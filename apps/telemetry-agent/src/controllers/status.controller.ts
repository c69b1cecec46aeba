import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { toSnapshotPayload } from '@telemetry-relay/adapters';
import type { StatusSource } from '../agent.js';
import { HttpError } from '../middleware/error-handler.js';
import { formatFrameId, parseFrameId } from '../services/signals/signal-catalog.js';

const catalogQuerySchema = z.object({
  frameId: z
    .string()
    .optional()
    .transform((raw, ctx) => {
      if (raw === undefined) return undefined;
      const id = parseFrameId(raw);
      if (id === null) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid frame id '${raw}'` });
        return z.NEVER;
      }
      return id;
    }),
});

export function createStatusRouter(source: StatusSource): Router {
  const router = Router();

  /** GET /api/status - device id, bus listener and aggregator counters */
  router.get('/status', (_req: Request, res: Response) => {
    res.json(source.status());
  });

  /** GET /api/snapshot/latest - last dispatched snapshot in wire form */
  router.get('/snapshot/latest', (_req: Request, res: Response, next: NextFunction) => {
    const snapshot = source.latestSnapshot();
    if (!snapshot) {
      next(new HttpError(404, 'no snapshot dispatched yet'));
      return;
    }
    res.json(toSnapshotPayload(snapshot));
  });

  /** GET /api/catalog?frameId=0x123 - loaded signal definitions, optionally for one frame */
  router.get('/catalog', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { frameId } = catalogQuerySchema.parse(req.query);
      const definitions =
        frameId === undefined ? source.catalog.definitions() : [...source.catalog.lookup(frameId)];
      res.json({
        data: definitions.map((def) => ({ ...def, frameId: formatFrameId(def.frameId) })),
        total: definitions.length,
      });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
