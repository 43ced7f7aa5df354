import { z } from 'zod';
import type { Booking } from '../../../shared/schema';
import type { BookingStatus } from '../../../shared/constants/statuses';
import { logger } from '../logger';
import { minutesBetween, type Clock } from '../../utils/dateUtils';
import { conflict, forbidden, notFound, validationFailure } from './errors';
import { MAX_SESSION_ENERGY_KWH } from './policy';
import type { ReservationLifecycleService } from './lifecycle';
import type { ScanTokenService } from './scanToken';
import { toSessionView, type BookingSessionView } from './sessionView';
import { pairLockKeys, type BookingUpdate, type ChargingStore } from './store';

export const completeSessionSchema = z.object({
  energyConsumedKwh: z.number().min(0).max(MAX_SESSION_ENERGY_KWH),
  notes: z.string().max(1000).optional(),
});

export type CompleteSessionInput = z.infer<typeof completeSessionSchema>;

export interface SessionCaller {
  userId?: string;
  isAdmin: boolean;
}

export interface SessionServiceDeps {
  store: ChargingStore;
  clock: Clock;
  scanTokens: ScanTokenService;
  lifecycle: ReservationLifecycleService;
}

export class SessionService {
  constructor(private readonly deps: SessionServiceDeps) {}

  async getBooking(bookingId: string): Promise<Booking> {
    const booking = await this.deps.store.findBookingById(bookingId);
    if (!booking) {
      throw notFound('Booking not found', { bookingId });
    }
    return booking;
  }

  /**
   * Start the charging session for the booking a scan token refers to. Holds the
   * same keys as reservation writes so a cancel cannot interleave.
   */
  async checkIn(token: string): Promise<Booking> {
    const { store, clock, scanTokens, lifecycle } = this.deps;
    const resolved = await scanTokens.resolveBooking(token);

    const booking = await store.exclusive(pairLockKeys(resolved.stationId, resolved.id), async (tx) => {
      const current = await tx.findBookingById(resolved.id);
      if (!current) {
        throw notFound('Booking not found', { bookingId: resolved.id });
      }
      if (current.status !== 'approved') {
        throw conflict('Booking is not ready for check-in.', { bookingId: current.id, status: current.status });
      }
      const now = clock.now();
      return lifecycle.recordSessionTransition(tx, current.id, {
        status: 'in_progress',
        checkInTime: now,
        updatedAt: now,
      });
    });

    logger.info('[Session] Owner checked in', {
      bookingId: booking.id,
      stationId: booking.stationId,
      operatorId: booking.operatorId ?? undefined,
    });
    return booking;
  }

  async completeSession(bookingId: string, input: CompleteSessionInput, caller: SessionCaller): Promise<Booking> {
    const { store, clock, lifecycle } = this.deps;
    const parsed = completeSessionSchema.safeParse(input);
    if (!parsed.success) {
      throw validationFailure(`Energy consumed must be between 0 and ${MAX_SESSION_ENERGY_KWH} kWh.`, { bookingId });
    }

    const existing = await this.getBooking(bookingId);

    const booking = await store.exclusive(pairLockKeys(existing.stationId, existing.id), async (tx) => {
      const current = await tx.findBookingById(bookingId);
      if (!current) {
        throw notFound('Booking not found', { bookingId });
      }
      if (current.status !== 'in_progress') {
        throw conflict('Session is not in progress.', { bookingId, status: current.status });
      }
      if (!caller.isAdmin) {
        await this.assertAssignedOperator(tx, current, caller.userId);
      }

      const now = clock.now();
      const patch: BookingUpdate = {
        status: 'completed',
        checkOutTime: now,
        energyConsumedKwh: parsed.data.energyConsumedKwh,
        sessionNotes: parsed.data.notes ?? null,
        updatedAt: now,
      };
      if (current.checkInTime) {
        patch.sessionDurationMinutes = minutesBetween(current.checkInTime, now);
      }
      return lifecycle.recordSessionTransition(tx, current.id, patch);
    });

    logger.info('[Session] Charging session completed', {
      bookingId: booking.id,
      stationId: booking.stationId,
      operatorId: booking.operatorId ?? undefined,
      extra: {
        energyConsumedKwh: booking.energyConsumedKwh,
        sessionDurationMinutes: booking.sessionDurationMinutes,
      },
    });
    return booking;
  }

  async getAssignedSessions(operatorUserId: string, status?: BookingStatus): Promise<BookingSessionView[]> {
    const operator = await this.deps.store.findOperatorByUserId(operatorUserId);
    if (!operator || !operator.isActive) {
      return [];
    }
    const assigned = await this.deps.store.listBookingsByOperator(operator.id, status);
    return assigned.map(toSessionView);
  }

  private async assertAssignedOperator(store: ChargingStore, booking: Booking, userId: string | undefined): Promise<void> {
    if (!userId) {
      throw forbidden('Operator identity is required to complete a session.', { bookingId: booking.id });
    }
    const operator = await store.findOperatorByUserId(userId);
    if (!operator || !operator.isActive) {
      throw forbidden('Operator profile not found or inactive.', { bookingId: booking.id });
    }
    if (booking.operatorId !== operator.id) {
      throw forbidden('You are not assigned to this booking.', { bookingId: booking.id, operatorId: operator.id });
    }
  }
}
