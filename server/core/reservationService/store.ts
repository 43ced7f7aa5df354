import type {
  Booking,
  Operator,
  Reservation,
  Station,
  User,
  bookings,
  operators,
  reservations,
} from '../../../shared/schema';
import type { BookingStatus } from '../../../shared/constants/statuses';

export type NewBooking = typeof bookings.$inferInsert;
export type NewReservation = typeof reservations.$inferInsert;
export type NewOperator = typeof operators.$inferInsert;

export type BookingUpdate = Partial<Omit<Booking, 'id' | 'createdAt'>>;
export type ReservationUpdate = Partial<Omit<Reservation, 'id' | 'createdAt' | 'userId' | 'chargingStationId'>>;
export type OperatorUpdate = Partial<Omit<Operator, 'id' | 'createdAt' | 'userId'>>;
export type UserUpdate = Partial<Pick<User, 'name' | 'email' | 'phone' | 'role' | 'stationId' | 'updatedAt'>>;

/**
 * Persistence seam for the reservation engine. Every read that drives an
 * availability decision must observe the latest committed state.
 */
export interface ChargingStore {
  findUserById(id: string): Promise<User | undefined>;
  findUserByNic(nic: string): Promise<User | undefined>;
  updateUser(id: string, patch: UserUpdate): Promise<User | undefined>;

  findStationById(id: string): Promise<Station | undefined>;

  findOperatorById(id: string): Promise<Operator | undefined>;
  findOperatorByUserId(userId: string): Promise<Operator | undefined>;
  /** Creation order, oldest first */
  listOperatorsByStation(stationId: string, options?: { activeOnly?: boolean }): Promise<Operator[]>;
  insertOperator(values: NewOperator): Promise<Operator>;
  updateOperator(id: string, patch: OperatorUpdate): Promise<Operator | undefined>;

  findReservationById(id: string): Promise<Reservation | undefined>;
  findReservationByBookingId(bookingId: string): Promise<Reservation | undefined>;
  /** Newest first by creation time */
  listReservations(): Promise<Reservation[]>;
  /** Newest first by creation time */
  listReservationsByUser(userId: string): Promise<Reservation[]>;
  /** Reservations at the station that are neither completed nor cancelled */
  listOpenReservationsAtStation(stationId: string): Promise<Reservation[]>;
  insertReservation(values: NewReservation): Promise<Reservation>;
  updateReservation(id: string, patch: ReservationUpdate): Promise<Reservation | undefined>;
  deleteReservation(id: string): Promise<boolean>;

  findBookingById(id: string): Promise<Booking | undefined>;
  /** Non-terminal bookings holding the operator at exactly this instant */
  countOpenBookingsForOperatorAt(operatorId: string, instant: Date, excludeBookingId?: string): Promise<number>;
  /** Non-terminal bookings for the operator scheduled at or after `from` */
  countUpcomingBookingsForOperator(operatorId: string, from: Date): Promise<number>;
  /** Non-cancelled bookings at the station with reservation instant in [from, to) */
  listBookingsAtStation(stationId: string, from: Date, to: Date): Promise<Booking[]>;
  /** Newest first by reservation instant */
  listBookingsByUser(userId: string, status: BookingStatus): Promise<Booking[]>;
  /** Newest first by reservation instant */
  listBookingsByOperator(operatorId: string, status?: BookingStatus): Promise<Booking[]>;
  insertBooking(values: NewBooking): Promise<Booking>;
  updateBooking(id: string, patch: BookingUpdate): Promise<Booking | undefined>;
  deleteBooking(id: string): Promise<boolean>;

  /**
   * Run `work` as a single writer for every key. Reads and writes made through
   * the store handed to `work` commit together.
   */
  exclusive<T>(keys: string[], work: (store: ChargingStore) => Promise<T>): Promise<T>;
}

export function stationLockKey(stationId: string): string {
  return `station:${stationId}`;
}

function bookingLockKey(bookingId: string): string {
  return `booking:${bookingId}`;
}

/**
 * Keys held by every write to a reservation/booking pair. Creation holds only the
 * station key since the booking does not exist yet.
 */
export function pairLockKeys(stationId: string, bookingId?: string | null): string[] {
  return bookingId ? [stationLockKey(stationId), bookingLockKey(bookingId)] : [stationLockKey(stationId)];
}

// One writer per account while its operator profile is created
export function accountLockKey(userId: string): string {
  return `account:${userId}`;
}
