import type { Booking } from '../../../shared/schema';
import type { BookingStatus } from '../../../shared/constants/statuses';
import { addHours } from '../../utils/dateUtils';
import { DEFAULT_SESSION_HOURS } from './policy';

export interface BookingSessionView {
  bookingId: string;
  userId: string;
  stationId: string;
  operatorId: string | null;
  status: BookingStatus;
  startTime: Date;
  endTime: Date;
  checkInTime: Date | null;
  checkOutTime: Date | null;
  energyConsumedKwh: number | null;
  sessionDurationMinutes: number | null;
  sessionNotes: string | null;
}

export function toSessionView(booking: Booking): BookingSessionView {
  return {
    bookingId: booking.id,
    userId: booking.userId,
    stationId: booking.stationId,
    operatorId: booking.operatorId,
    status: booking.status,
    startTime: booking.reservationAt,
    // Sessions without a recorded check-out are shown as one-hour slots
    endTime: booking.checkOutTime ?? addHours(booking.reservationAt, DEFAULT_SESSION_HOURS),
    checkInTime: booking.checkInTime,
    checkOutTime: booking.checkOutTime,
    energyConsumedKwh: booking.energyConsumedKwh,
    sessionDurationMinutes: booking.sessionDurationMinutes,
    sessionNotes: booking.sessionNotes,
  };
}
