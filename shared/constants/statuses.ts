export const RESERVATION_STATUSES = [
  'pending',
  'confirmed',
  'active',
  'completed',
  'cancelled'
] as const;

export type ReservationStatus = typeof RESERVATION_STATUSES[number];

export const BOOKING_STATUSES = [
  'pending',
  'approved',
  'in_progress',
  'completed',
  'cancelled',
  'no_show'
] as const;

export type BookingStatus = typeof BOOKING_STATUSES[number];

export const TERMINAL_RESERVATION_STATUSES: ReservationStatus[] = ['completed', 'cancelled'];

// Bookings in these states no longer hold an operator or a station slot
export const RELEASED_BOOKING_STATUSES: BookingStatus[] = ['completed', 'cancelled'];

export type UserRole = 'admin' | 'backoffice' | 'station_operator' | 'ev_owner';

export function isTerminalReservationStatus(status: ReservationStatus): boolean {
  return TERMINAL_RESERVATION_STATUSES.includes(status);
}

/**
 * Single source of truth for how an owner-facing reservation status is reflected
 * on the operator-facing booking.
 */
export function mapReservationStatusToBookingStatus(status: ReservationStatus): BookingStatus {
  switch (status) {
    case 'confirmed':
      return 'approved';
    case 'active':
      return 'in_progress';
    case 'completed':
      return 'completed';
    case 'cancelled':
      return 'cancelled';
    default:
      return 'pending';
  }
}

// Reservation status mirrored when an operator moves a booking through its session
export const SESSION_RESERVATION_STATUS: Partial<Record<BookingStatus, ReservationStatus>> = {
  in_progress: 'active',
  completed: 'completed',
};
