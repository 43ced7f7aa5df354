import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { isAuthenticated } from '../core/middleware';
import type { ReservationEngine } from '../core/reservationService';
import { parseInput, respondWithServiceError } from './helpers';

const slotQuerySchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'date must be in YYYY-MM-DD format'),
});

export function createStationRouter(engine: ReservationEngine): Router {
  const router = Router();

  router.get('/api/stations/:id/slots', isAuthenticated, async (req: Request, res: Response) => {
    const parsed = parseInput(slotQuerySchema, req.query);
    if (!parsed.ok) {
      return res.status(400).json({ error: parsed.message });
    }

    try {
      const slots = await engine.slots.getStationSlots(req.params.id, parsed.data.date);
      res.json(slots.map(slot => ({
        startTime: slot.start.toISOString(),
        endTime: slot.end.toISOString(),
        remainingCapacity: slot.remainingCapacity,
        isBookable: slot.isBookable,
      })));
    } catch (error: unknown) {
      respondWithServiceError(req, res, error, 'Failed to fetch station slots');
    }
  });

  return router;
}
