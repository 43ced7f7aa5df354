import type { Booking, Reservation, User } from '../../../shared/schema';
import {
  isTerminalReservationStatus,
  mapReservationStatusToBookingStatus,
  SESSION_RESERVATION_STATUS,
  type ReservationStatus,
} from '../../../shared/constants/statuses';
import { logger } from '../logger';
import { addDays, addHours, formatZonedDateTime, type Clock } from '../../utils/dateUtils';
import { getErrorMessage, isConstraintError } from '../../utils/errorUtils';
import { ADVANCE_BOOKING_DAYS, MODIFICATION_LOCKOUT_HOURS, describeWorkingHours } from './policy';
import { conflict, consistencyFailure, notFound, validationFailure } from './errors';
import { hasConflict } from './timeWindow';
import { findAvailableOperator } from './operatorMatcher';
import type { ScanTokenService } from './scanToken';
import { toSessionView, type BookingSessionView } from './sessionView';
import {
  pairLockKeys,
  stationLockKey,
  type BookingUpdate,
  type ChargingStore,
  type NewBooking,
  type ReservationUpdate,
} from './store';

export interface CreateReservationInput {
  userId?: string | null;
  ownerNic?: string | null;
  chargingStationId: string;
  startTime: Date;
  endTime: Date;
  notes?: string | null;
}

export interface ReservationPatch {
  startTime?: Date;
  endTime?: Date;
  status?: ReservationStatus;
  notes?: string | null;
}

export interface LifecycleOptions {
  // Lifts the 12-hour modification lockout and the terminal-status guard on updates.
  // Reviving a terminal reservation re-runs the station and operator checks.
  adminOverride?: boolean;
}

export interface ReservationLifecycleDeps {
  store: ChargingStore;
  clock: Clock;
  timeZone: string;
  scanTokens: ScanTokenService;
}

type ModificationAction = 'updated' | 'cancelled';

/**
 * Owns every status transition of a reservation and its paired booking. Nothing
 * else writes either record's status.
 */
export class ReservationLifecycleService {
  constructor(private readonly deps: ReservationLifecycleDeps) {}

  async createReservation(input: CreateReservationInput): Promise<Reservation> {
    const { store, clock, timeZone } = this.deps;
    const now = clock.now();
    const { startTime, endTime } = input;

    if (Number.isNaN(startTime.getTime()) || Number.isNaN(endTime.getTime())) {
      throw validationFailure('Start time and end time must be valid timestamps.');
    }
    if (endTime.getTime() <= startTime.getTime()) {
      throw validationFailure('End time must be after start time.');
    }
    if (startTime.getTime() < now.getTime()) {
      throw validationFailure('Reservation start time must be in the future.');
    }
    if (startTime.getTime() > addDays(now, ADVANCE_BOOKING_DAYS).getTime()) {
      throw validationFailure(`Reservations can only be made within ${ADVANCE_BOOKING_DAYS} days from now.`);
    }

    const owner = await this.resolveOwner(input);

    const station = await store.findStationById(input.chargingStationId);
    if (!station) {
      throw notFound('Charging station not found.', { stationId: input.chargingStationId });
    }
    if (!station.isActive) {
      throw validationFailure('Charging station is not active.', { stationId: station.id });
    }

    return store.exclusive([stationLockKey(station.id)], async (tx) => {
      if (await hasConflict(tx, station.id, startTime, endTime)) {
        throw conflict('The charging station is already reserved for the selected time period.', { stationId: station.id });
      }

      const operator = await findAvailableOperator(tx, station.id, startTime, timeZone);
      if (!operator) {
        const localTime = formatZonedDateTime(startTime, timeZone);
        throw conflict(
          `No available operator for the selected time slot. Reservation time: ${localTime} (${timeZone}). ` +
          `Operator working hours: ${describeWorkingHours()}.`,
          { stationId: station.id }
        );
      }

      const booking = await this.insertBooking(tx, {
        userId: owner.id,
        stationId: station.id,
        reservationAt: startTime,
        status: 'approved',
        operatorId: operator.id,
        createdAt: now,
        updatedAt: now,
      });

      let reservation: Reservation;
      try {
        reservation = await tx.insertReservation({
          userId: owner.id,
          chargingStationId: station.id,
          startTime,
          endTime,
          status: 'confirmed',
          operatorId: operator.id,
          operatorUserId: operator.userId,
          bookingId: booking.id,
          notes: input.notes ?? null,
          createdAt: now,
          updatedAt: null,
        });
      } catch (error: unknown) {
        await this.discard(tx, { bookingId: booking.id }, error);
        throw error;
      }

      const persisted = await tx.findReservationById(reservation.id);
      if (!persisted || !persisted.operatorId || !persisted.bookingId) {
        await this.discard(tx, { bookingId: booking.id, reservationId: reservation.id });
        throw consistencyFailure('Reservation was not persisted with its operator and booking.', {
          reservationId: reservation.id,
          bookingId: booking.id,
        });
      }

      logger.info('[Reservation] Created reservation', {
        reservationId: persisted.id,
        bookingId: booking.id,
        stationId: station.id,
        operatorId: operator.id,
        userId: owner.id,
      });
      return persisted;
    });
  }

  async updateReservation(id: string, patch: ReservationPatch, options: LifecycleOptions = {}): Promise<Reservation> {
    const { store, clock } = this.deps;
    const admin = options.adminOverride === true;
    const existing = await this.getReservationRecord(id);

    return store.exclusive(pairLockKeys(existing.chargingStationId, existing.bookingId), async (tx) => {
      const current = await this.getReservationRecord(id, tx);
      const now = clock.now();
      if (!admin) {
        this.assertModifiable(current, now, 'updated');
      }
      this.validatePatch(current, patch, now, admin);

      const start = patch.startTime ?? current.startTime;
      const end = patch.endTime ?? current.endTime;
      const windowChanged = patch.startTime !== undefined || patch.endTime !== undefined;
      const revived = patch.status !== undefined
        && isTerminalReservationStatus(current.status)
        && !isTerminalReservationStatus(patch.status);

      if (windowChanged || revived) {
        if (await hasConflict(tx, current.chargingStationId, start, end, current.id)) {
          throw conflict('The charging station is already reserved for the selected time period.', {
            reservationId: current.id,
            stationId: current.chargingStationId,
          });
        }
      }
      if ((patch.startTime || revived) && current.operatorId) {
        const busy = await tx.countOpenBookingsForOperatorAt(current.operatorId, start, current.bookingId ?? undefined);
        if (busy > 0) {
          const message = patch.startTime
            ? 'The assigned operator is already booked at the new start time.'
            : 'The assigned operator is already booked at this start time.';
          throw conflict(message, { reservationId: current.id, operatorId: current.operatorId });
        }
      }

      const reservationPatch: ReservationUpdate = { updatedAt: now };
      if (patch.startTime) reservationPatch.startTime = patch.startTime;
      if (patch.endTime) reservationPatch.endTime = patch.endTime;
      if (patch.status) reservationPatch.status = patch.status;
      if (patch.notes !== undefined) reservationPatch.notes = patch.notes;

      let updated = await tx.updateReservation(current.id, reservationPatch);
      if (!updated) {
        throw notFound('Reservation not found.', { reservationId: id });
      }

      if (current.bookingId) {
        const bookingPatch: BookingUpdate = { updatedAt: now };
        if (patch.startTime) bookingPatch.reservationAt = patch.startTime;
        if (patch.status) bookingPatch.status = mapReservationStatusToBookingStatus(patch.status);
        await this.writeBooking(tx, current.bookingId, bookingPatch);

        if (patch.status === 'confirmed' && !current.qrCode) {
          await this.deps.scanTokens.issue(current.bookingId, tx);
          updated = (await tx.findReservationById(current.id)) ?? updated;
        }
      }

      logger.info('[Reservation] Updated reservation', {
        reservationId: current.id,
        bookingId: current.bookingId ?? undefined,
        extra: { fields: Object.keys(reservationPatch), adminOverride: admin, revived },
      });
      return updated;
    });
  }

  /**
   * Cancel a reservation and its booking. The status and lockout checks run on
   * the record as read under the pair's locks.
   */
  async cancelReservation(id: string, options: LifecycleOptions = {}): Promise<Reservation> {
    const admin = options.adminOverride === true;
    const existing = await this.getReservationRecord(id);

    return this.deps.store.exclusive(pairLockKeys(existing.chargingStationId, existing.bookingId), async (tx) => {
      const current = await this.getReservationRecord(id, tx);
      const now = this.deps.clock.now();
      if (admin) {
        if (isTerminalReservationStatus(current.status)) {
          throw conflict('Reservation is already cancelled or completed.', { reservationId: id, status: current.status });
        }
      } else {
        this.assertModifiable(current, now, 'cancelled');
      }
      return this.applyStatus(tx, current, 'cancelled', now, admin ? 'staff' : 'owner');
    });
  }

  async adminCancelReservation(id: string): Promise<Reservation> {
    return this.cancelReservation(id, { adminOverride: true });
  }

  async deleteReservation(id: string): Promise<void> {
    const existing = await this.getReservationRecord(id);

    await this.deps.store.exclusive(pairLockKeys(existing.chargingStationId, existing.bookingId), async (tx) => {
      if (existing.bookingId) {
        await tx.deleteBooking(existing.bookingId);
      }
      const removed = await tx.deleteReservation(existing.id);
      if (!removed) {
        throw notFound('Reservation not found.', { reservationId: id });
      }
    });

    logger.info('[Reservation] Deleted reservation', {
      reservationId: existing.id,
      bookingId: existing.bookingId ?? undefined,
    });
  }

  /**
   * Write a session transition onto a booking and mirror it onto the paired
   * reservation. Callers check the current status under the pair's keys.
   */
  async recordSessionTransition(store: ChargingStore, bookingId: string, patch: BookingUpdate): Promise<Booking> {
    const booking = await this.writeBooking(store, bookingId, patch);
    const mirrored = patch.status ? SESSION_RESERVATION_STATUS[patch.status] : undefined;
    if (mirrored) {
      const reservation = await store.findReservationByBookingId(bookingId);
      if (reservation) {
        await store.updateReservation(reservation.id, { status: mirrored, updatedAt: patch.updatedAt ?? this.deps.clock.now() });
      }
    }
    return booking;
  }

  async getReservation(id: string): Promise<Reservation> {
    const reservation = (await this.deps.store.findReservationById(id))
      ?? (await this.deps.store.findReservationByBookingId(id));
    if (!reservation) {
      throw notFound('Reservation not found.', { reservationId: id });
    }
    return reservation;
  }

  async getReservationByBookingId(bookingId: string): Promise<Reservation> {
    const reservation = await this.deps.store.findReservationByBookingId(bookingId);
    if (!reservation) {
      throw notFound('Reservation not found for booking.', { bookingId });
    }
    return reservation;
  }

  async listReservations(): Promise<Reservation[]> {
    return this.deps.store.listReservations();
  }

  async getReservationHistory(ownerNic: string): Promise<Reservation[]> {
    const owner = await this.deps.store.findUserByNic(ownerNic.trim());
    if (!owner) {
      return [];
    }
    return this.deps.store.listReservationsByUser(owner.id);
  }

  async getCompletedSessions(userId: string): Promise<BookingSessionView[]> {
    const completed = await this.deps.store.listBookingsByUser(userId, 'completed');
    return completed.map(toSessionView);
  }

  async getPendingSessions(userId: string): Promise<BookingSessionView[]> {
    const upcoming = await this.deps.store.listBookingsByUser(userId, 'approved');
    return upcoming.map(toSessionView);
  }

  private async resolveOwner(input: CreateReservationInput): Promise<User> {
    const { store } = this.deps;
    const userId = input.userId?.trim();
    const nic = input.ownerNic?.trim();

    let owner: User | undefined;
    if (userId) {
      owner = await store.findUserById(userId);
      if (!owner || owner.role !== 'ev_owner') {
        throw notFound('EV owner was not found for the provided userId.', { userId });
      }
      if (nic && owner.nic?.toLowerCase() !== nic.toLowerCase()) {
        throw validationFailure('Provided userId and ownerNic do not refer to the same EV owner.');
      }
    } else if (nic) {
      owner = await store.findUserByNic(nic);
      if (!owner || owner.role !== 'ev_owner') {
        throw notFound(`EV owner with NIC '${nic}' was not found.`);
      }
    } else {
      throw validationFailure('Either userId or ownerNic must be provided to create a reservation.');
    }

    if (!owner.isActive) {
      throw validationFailure('Cannot create reservation because the EV owner account is deactivated.', { userId: owner.id });
    }
    return owner;
  }

  private assertModifiable(reservation: Reservation, now: Date, action: ModificationAction): void {
    if (isTerminalReservationStatus(reservation.status)) {
      throw conflict(`Reservation is already ${reservation.status} and cannot be ${action}.`, {
        reservationId: reservation.id,
        status: reservation.status,
      });
    }
    if (reservation.startTime.getTime() <= addHours(now, MODIFICATION_LOCKOUT_HOURS).getTime()) {
      throw conflict(`Reservations can only be ${action} at least ${MODIFICATION_LOCKOUT_HOURS} hours before the start time.`, {
        reservationId: reservation.id,
      });
    }
  }

  private validatePatch(existing: Reservation, patch: ReservationPatch, now: Date, admin: boolean): void {
    if (patch.startTime && Number.isNaN(patch.startTime.getTime())) {
      throw validationFailure('Start time must be a valid timestamp.');
    }
    if (patch.endTime && Number.isNaN(patch.endTime.getTime())) {
      throw validationFailure('End time must be a valid timestamp.');
    }

    const start = patch.startTime ?? existing.startTime;
    const end = patch.endTime ?? existing.endTime;
    if (end.getTime() <= start.getTime()) {
      throw validationFailure('End time must be after start time.');
    }

    if (patch.startTime) {
      if (patch.startTime.getTime() > addDays(now, ADVANCE_BOOKING_DAYS).getTime()) {
        throw validationFailure(`Start time cannot be more than ${ADVANCE_BOOKING_DAYS} days in the future.`);
      }
      if (!admin && patch.startTime.getTime() <= addHours(now, MODIFICATION_LOCKOUT_HOURS).getTime()) {
        throw validationFailure(`Reservations can only be updated at least ${MODIFICATION_LOCKOUT_HOURS} hours before the start time.`);
      }
    }
  }

  private async applyStatus(
    tx: ChargingStore,
    current: Reservation,
    status: ReservationStatus,
    now: Date,
    source: 'owner' | 'staff'
  ): Promise<Reservation> {
    const updated = await tx.updateReservation(current.id, { status, updatedAt: now });
    if (!updated) {
      throw notFound('Reservation not found.', { reservationId: current.id });
    }
    if (current.bookingId) {
      await this.writeBooking(tx, current.bookingId, {
        status: mapReservationStatusToBookingStatus(status),
        updatedAt: now,
      });
    }
    logger.info(`[Reservation] Reservation ${status}`, {
      reservationId: current.id,
      bookingId: current.bookingId ?? undefined,
      extra: { source },
    });
    return updated;
  }

  private async getReservationRecord(id: string, store: ChargingStore = this.deps.store): Promise<Reservation> {
    const reservation = await store.findReservationById(id);
    if (!reservation) {
      throw notFound('Reservation not found.', { reservationId: id });
    }
    return reservation;
  }

  private async insertBooking(store: ChargingStore, values: NewBooking): Promise<Booking> {
    try {
      return await store.insertBooking(values);
    } catch (error: unknown) {
      if (isConstraintError(error).type === 'unique') {
        throw conflict('The selected operator was booked concurrently. Please choose another time.', {
          operatorId: values.operatorId ?? undefined,
        });
      }
      throw error;
    }
  }

  private async writeBooking(store: ChargingStore, bookingId: string, patch: BookingUpdate): Promise<Booking> {
    let booking: Booking | undefined;
    try {
      booking = await store.updateBooking(bookingId, patch);
    } catch (error: unknown) {
      if (isConstraintError(error).type === 'unique') {
        throw conflict('The assigned operator is already booked at the new start time.', { bookingId });
      }
      throw error;
    }
    if (!booking) {
      throw notFound('Booking not found.', { bookingId });
    }
    return booking;
  }

  /**
   * Remove records left behind by a create that could not finish. A failure
   * here is logged so the first error reaches the caller.
   */
  private async discard(
    store: ChargingStore,
    records: { bookingId?: string; reservationId?: string },
    cause?: unknown
  ): Promise<void> {
    try {
      if (records.reservationId) {
        await store.deleteReservation(records.reservationId);
      }
      if (records.bookingId) {
        await store.deleteBooking(records.bookingId);
      }
    } catch (cleanupError: unknown) {
      logger.error('[Reservation] Failed to discard partially created reservation', {
        error: getErrorMessage(cleanupError),
        bookingId: records.bookingId,
        reservationId: records.reservationId,
        extra: { cause: cause === undefined ? undefined : getErrorMessage(cause) },
      });
    }
  }
}
