import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import type { Reservation } from '../../shared/schema';
import { RESERVATION_STATUSES } from '../../shared/constants/statuses';
import { isAuthenticated, requireAdmin } from '../core/middleware';
import type { ReservationEngine } from '../core/reservationService';
import { reservationRateLimiter } from '../middleware/rateLimiting';
import { isAdminUser } from '../types/session';
import { canActForUser, parseInput, requireSessionUser, respondForbidden, respondWithServiceError } from './helpers';

const createReservationSchema = z.object({
  userId: z.string().trim().min(1).optional(),
  ownerNic: z.string().trim().min(1).max(20).optional(),
  chargingStationId: z.string().min(1, 'chargingStationId is required'),
  startTime: z.coerce.date(),
  endTime: z.coerce.date(),
  notes: z.string().max(500).optional(),
});

const updateReservationSchema = z.object({
  startTime: z.coerce.date().optional(),
  endTime: z.coerce.date().optional(),
  status: z.enum(RESERVATION_STATUSES).optional(),
  notes: z.string().max(500).nullable().optional(),
});

function toReservationResponse(reservation: Reservation) {
  return {
    id: reservation.id,
    userId: reservation.userId,
    chargingStationId: reservation.chargingStationId,
    startTime: reservation.startTime.toISOString(),
    endTime: reservation.endTime.toISOString(),
    status: reservation.status,
    qrCode: reservation.qrCode,
    // Account id of the assigned operator; the profile id is exposed separately
    operatorId: reservation.operatorUserId ?? reservation.operatorId,
    operatorProfileId: reservation.operatorId,
    bookingId: reservation.bookingId,
    notes: reservation.notes,
    createdAt: reservation.createdAt.toISOString(),
    updatedAt: reservation.updatedAt?.toISOString() ?? null,
  };
}

export function createReservationRouter(engine: ReservationEngine): Router {
  const router = Router();
  const { reservations } = engine;

  router.post('/api/reservations', isAuthenticated, reservationRateLimiter, async (req: Request, res: Response) => {
    const user = requireSessionUser(req, res);
    if (!user) return;

    const parsed = parseInput(createReservationSchema, req.body);
    if (!parsed.ok) {
      return res.status(400).json({ error: parsed.message });
    }
    const body = parsed.data;

    const admin = isAdminUser(user);
    if (!admin) {
      if (user.role !== 'ev_owner') {
        return respondForbidden(req, res, 'Only EV owners and back office staff can create reservations');
      }
      if (body.userId && body.userId !== user.id) {
        return respondForbidden(req, res, 'EV owners can only create reservations for themselves');
      }
    } else if (!body.userId && !body.ownerNic) {
      return res.status(400).json({ error: 'userId or ownerNic is required when creating a reservation for an EV owner' });
    }

    try {
      const reservation = await reservations.createReservation({
        userId: admin ? body.userId : user.id,
        ownerNic: body.ownerNic,
        chargingStationId: body.chargingStationId,
        startTime: body.startTime,
        endTime: body.endTime,
        notes: body.notes,
      });
      res.status(201).json(toReservationResponse(reservation));
    } catch (error: unknown) {
      respondWithServiceError(req, res, error, 'Failed to create reservation');
    }
  });

  router.get('/api/reservations', requireAdmin, async (req: Request, res: Response) => {
    try {
      const all = await reservations.listReservations();
      res.json(all.map(toReservationResponse));
    } catch (error: unknown) {
      respondWithServiceError(req, res, error, 'Failed to fetch reservations');
    }
  });

  router.get('/api/reservations/history/:nic', isAuthenticated, async (req: Request, res: Response) => {
    const user = requireSessionUser(req, res);
    if (!user) return;

    const nic = req.params.nic.trim();
    if (!isAdminUser(user) && user.nic?.toLowerCase() !== nic.toLowerCase()) {
      return respondForbidden(req, res, 'You can only view your own reservation history');
    }

    try {
      const history = await reservations.getReservationHistory(nic);
      res.json(history.map(toReservationResponse));
    } catch (error: unknown) {
      respondWithServiceError(req, res, error, 'Failed to fetch reservation history');
    }
  });

  router.get('/api/reservations/user/:userId/bookings/completed', isAuthenticated, async (req: Request, res: Response) => {
    const user = requireSessionUser(req, res);
    if (!user) return;
    if (!canActForUser(user, req.params.userId)) {
      return respondForbidden(req, res);
    }

    try {
      res.json(await reservations.getCompletedSessions(req.params.userId));
    } catch (error: unknown) {
      respondWithServiceError(req, res, error, 'Failed to fetch completed sessions');
    }
  });

  router.get('/api/reservations/user/:userId/bookings/pending', isAuthenticated, async (req: Request, res: Response) => {
    const user = requireSessionUser(req, res);
    if (!user) return;
    if (!canActForUser(user, req.params.userId)) {
      return respondForbidden(req, res);
    }

    try {
      res.json(await reservations.getPendingSessions(req.params.userId));
    } catch (error: unknown) {
      respondWithServiceError(req, res, error, 'Failed to fetch upcoming sessions');
    }
  });

  router.get('/api/reservations/:id', isAuthenticated, async (req: Request, res: Response) => {
    const user = requireSessionUser(req, res);
    if (!user) return;

    try {
      const reservation = await reservations.getReservation(req.params.id);
      const assignedOperator = reservation.operatorUserId === user.id;
      if (!canActForUser(user, reservation.userId) && !assignedOperator) {
        return respondForbidden(req, res);
      }
      res.json(toReservationResponse(reservation));
    } catch (error: unknown) {
      respondWithServiceError(req, res, error, 'Failed to fetch reservation');
    }
  });

  router.put('/api/reservations/booking/:bookingId', isAuthenticated, async (req: Request, res: Response) => {
    const user = requireSessionUser(req, res);
    if (!user) return;

    const parsed = parseInput(updateReservationSchema, req.body);
    if (!parsed.ok) {
      return res.status(400).json({ error: parsed.message });
    }

    try {
      const existing = await reservations.getReservationByBookingId(req.params.bookingId);
      if (!canActForUser(user, existing.userId)) {
        return respondForbidden(req, res, 'You can only update your own reservations');
      }
      const updated = await reservations.updateReservation(existing.id, parsed.data, {
        adminOverride: isAdminUser(user),
      });
      res.json(toReservationResponse(updated));
    } catch (error: unknown) {
      respondWithServiceError(req, res, error, 'Failed to update reservation');
    }
  });

  router.patch('/api/reservations/booking/cancel/:bookingId', isAuthenticated, async (req: Request, res: Response) => {
    const user = requireSessionUser(req, res);
    if (!user) return;

    try {
      const existing = await reservations.getReservationByBookingId(req.params.bookingId);
      if (!canActForUser(user, existing.userId)) {
        return respondForbidden(req, res, 'You can only cancel your own reservations');
      }
      await reservations.cancelReservation(existing.id, { adminOverride: isAdminUser(user) });
      res.status(204).send();
    } catch (error: unknown) {
      respondWithServiceError(req, res, error, 'Failed to cancel reservation');
    }
  });

  router.patch('/api/reservations/:id/admin-cancel', requireAdmin, async (req: Request, res: Response) => {
    try {
      const cancelled = await reservations.adminCancelReservation(req.params.id);
      res.json({ success: true, message: 'Reservation cancelled', reservation: toReservationResponse(cancelled) });
    } catch (error: unknown) {
      respondWithServiceError(req, res, error, 'Failed to cancel reservation');
    }
  });

  router.delete('/api/reservations/:id', isAuthenticated, async (req: Request, res: Response) => {
    const user = requireSessionUser(req, res);
    if (!user) return;

    try {
      const existing = await reservations.getReservation(req.params.id);
      if (!canActForUser(user, existing.userId)) {
        return respondForbidden(req, res, 'You can only delete your own reservations');
      }
      await reservations.deleteReservation(existing.id);
      res.status(204).send();
    } catch (error: unknown) {
      respondWithServiceError(req, res, error, 'Failed to delete reservation');
    }
  });

  return router;
}
