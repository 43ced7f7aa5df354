import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import type { Operator } from '../../shared/schema';
import { BOOKING_STATUSES } from '../../shared/constants/statuses';
import { requireAdmin, requireRoles } from '../core/middleware';
import {
  completeSessionSchema,
  createOperatorSchema,
  updateOperatorSchema,
  type ReservationEngine,
} from '../core/reservationService';
import { isAdminUser } from '../types/session';
import { parseInput, requireSessionUser, respondWithServiceError } from './helpers';

const availabilityQuerySchema = z.object({
  stationId: z.string().min(1, 'stationId is required'),
  reservationTime: z.coerce.date({ errorMap: () => ({ message: 'reservationTime must be a valid date' }) }),
});

const assignedSessionsQuerySchema = z.object({
  status: z.enum(BOOKING_STATUSES).optional(),
});

function toOperatorResponse(operator: Operator) {
  return {
    id: operator.id,
    userId: operator.userId,
    stationId: operator.stationId,
    name: operator.name,
    email: operator.email,
    phone: operator.phone,
    isActive: operator.isActive,
    createdAt: operator.createdAt.toISOString(),
    updatedAt: operator.updatedAt.toISOString(),
  };
}

export function createOperatorRouter(engine: ReservationEngine): Router {
  const router = Router();
  const { operators, sessions } = engine;
  const staffOrOperator = requireRoles('admin', 'backoffice', 'station_operator');

  router.get('/api/operators/available', staffOrOperator, async (req: Request, res: Response) => {
    const parsed = parseInput(availabilityQuerySchema, req.query);
    if (!parsed.ok) {
      return res.status(400).json({ error: parsed.message });
    }

    try {
      const operator = await operators.findAvailableOperator(parsed.data.stationId, parsed.data.reservationTime);
      if (!operator) {
        return res.status(404).json({ error: 'No available operator for the requested time' });
      }
      res.json(toOperatorResponse(operator));
    } catch (error: unknown) {
      respondWithServiceError(req, res, error, 'Failed to find an available operator');
    }
  });

  router.get('/api/operators/sessions/assigned', requireRoles('station_operator'), async (req: Request, res: Response) => {
    const user = requireSessionUser(req, res);
    if (!user) return;

    const parsed = parseInput(assignedSessionsQuerySchema, req.query);
    if (!parsed.ok) {
      return res.status(400).json({ error: parsed.message });
    }

    try {
      res.json(await sessions.getAssignedSessions(user.id, parsed.data.status));
    } catch (error: unknown) {
      respondWithServiceError(req, res, error, 'Failed to fetch assigned sessions');
    }
  });

  router.get('/api/operators/station/:stationId', requireAdmin, async (req: Request, res: Response) => {
    try {
      const list = await operators.listOperatorsByStation(req.params.stationId);
      res.json(list.map(toOperatorResponse));
    } catch (error: unknown) {
      respondWithServiceError(req, res, error, 'Failed to fetch station operators');
    }
  });

  router.get('/api/operators/:id', requireAdmin, async (req: Request, res: Response) => {
    try {
      res.json(toOperatorResponse(await operators.getOperator(req.params.id)));
    } catch (error: unknown) {
      respondWithServiceError(req, res, error, 'Failed to fetch operator');
    }
  });

  router.post('/api/operators', requireAdmin, async (req: Request, res: Response) => {
    const parsed = parseInput(createOperatorSchema, req.body);
    if (!parsed.ok) {
      return res.status(400).json({ error: parsed.message });
    }

    try {
      const operator = await operators.createOperator(parsed.data);
      res.status(201).json(toOperatorResponse(operator));
    } catch (error: unknown) {
      respondWithServiceError(req, res, error, 'Failed to create operator');
    }
  });

  router.put('/api/operators/:id', requireAdmin, async (req: Request, res: Response) => {
    const parsed = parseInput(updateOperatorSchema, req.body);
    if (!parsed.ok) {
      return res.status(400).json({ error: parsed.message });
    }

    try {
      const operator = await operators.updateOperator(req.params.id, parsed.data);
      res.json(toOperatorResponse(operator));
    } catch (error: unknown) {
      respondWithServiceError(req, res, error, 'Failed to update operator');
    }
  });

  router.patch('/api/operators/:id/deactivate', requireAdmin, async (req: Request, res: Response) => {
    try {
      const operator = await operators.deactivateOperator(req.params.id);
      res.json({ success: true, operator: toOperatorResponse(operator) });
    } catch (error: unknown) {
      respondWithServiceError(req, res, error, 'Failed to deactivate operator');
    }
  });

  router.patch('/api/operators/session/:bookingId/complete', staffOrOperator, async (req: Request, res: Response) => {
    const user = requireSessionUser(req, res);
    if (!user) return;

    const parsed = parseInput(completeSessionSchema, req.body);
    if (!parsed.ok) {
      return res.status(400).json({ error: parsed.message });
    }

    try {
      const booking = await sessions.completeSession(req.params.bookingId, parsed.data, {
        userId: user.id,
        isAdmin: isAdminUser(user),
      });
      res.json({
        success: true,
        bookingId: booking.id,
        status: booking.status,
        checkOutTime: booking.checkOutTime?.toISOString() ?? null,
        energyConsumedKwh: booking.energyConsumedKwh,
        sessionDurationMinutes: booking.sessionDurationMinutes,
      });
    } catch (error: unknown) {
      respondWithServiceError(req, res, error, 'Failed to complete charging session');
    }
  });

  return router;
}
