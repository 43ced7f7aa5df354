import { and, asc, desc, eq, gte, lt, ne, notInArray, sql, type SQL } from 'drizzle-orm';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import type { NodePgQueryResultHKT } from 'drizzle-orm/node-postgres';
import * as schema from '../../../shared/schema';
import { RELEASED_BOOKING_STATUSES, TERMINAL_RESERVATION_STATUSES, type BookingStatus } from '../../../shared/constants/statuses';
import type {
  BookingUpdate,
  ChargingStore,
  NewBooking,
  NewOperator,
  NewReservation,
  OperatorUpdate,
  ReservationUpdate,
  UserUpdate,
} from './store';

const { users, stations, operators, reservations, bookings } = schema;

// Satisfied by both the root database and a transaction handle
export type DbExecutor = PgDatabase<NodePgQueryResultHKT, typeof schema>;

export class DrizzleChargingStore implements ChargingStore {
  constructor(private readonly executor: DbExecutor) {}

  async findUserById(id: string) {
    const [row] = await this.executor.select().from(users).where(eq(users.id, id)).limit(1);
    return row;
  }

  async findUserByNic(nic: string) {
    const [row] = await this.executor.select().from(users)
      .where(sql`LOWER(${users.nic}) = LOWER(${nic})`)
      .limit(1);
    return row;
  }

  async updateUser(id: string, patch: UserUpdate) {
    const [row] = await this.executor.update(users).set(patch).where(eq(users.id, id)).returning();
    return row;
  }

  async findStationById(id: string) {
    const [row] = await this.executor.select().from(stations).where(eq(stations.id, id)).limit(1);
    return row;
  }

  async findOperatorById(id: string) {
    const [row] = await this.executor.select().from(operators).where(eq(operators.id, id)).limit(1);
    return row;
  }

  async findOperatorByUserId(userId: string) {
    const [row] = await this.executor.select().from(operators).where(eq(operators.userId, userId)).limit(1);
    return row;
  }

  async listOperatorsByStation(stationId: string, options: { activeOnly?: boolean } = {}) {
    const conditions: SQL[] = [eq(operators.stationId, stationId)];
    if (options.activeOnly) {
      conditions.push(eq(operators.isActive, true));
    }
    return this.executor.select().from(operators)
      .where(and(...conditions))
      .orderBy(asc(operators.createdAt), asc(operators.id));
  }

  async insertOperator(values: NewOperator) {
    const [row] = await this.executor.insert(operators).values(values).returning();
    return row;
  }

  async updateOperator(id: string, patch: OperatorUpdate) {
    const [row] = await this.executor.update(operators).set(patch).where(eq(operators.id, id)).returning();
    return row;
  }

  async findReservationById(id: string) {
    const [row] = await this.executor.select().from(reservations).where(eq(reservations.id, id)).limit(1);
    return row;
  }

  async findReservationByBookingId(bookingId: string) {
    const [row] = await this.executor.select().from(reservations).where(eq(reservations.bookingId, bookingId)).limit(1);
    return row;
  }

  async listReservations() {
    return this.executor.select().from(reservations).orderBy(desc(reservations.createdAt));
  }

  async listReservationsByUser(userId: string) {
    return this.executor.select().from(reservations)
      .where(eq(reservations.userId, userId))
      .orderBy(desc(reservations.createdAt));
  }

  async listOpenReservationsAtStation(stationId: string) {
    return this.executor.select().from(reservations)
      .where(and(
        eq(reservations.chargingStationId, stationId),
        notInArray(reservations.status, TERMINAL_RESERVATION_STATUSES)
      ));
  }

  async insertReservation(values: NewReservation) {
    const [row] = await this.executor.insert(reservations).values(values).returning();
    return row;
  }

  async updateReservation(id: string, patch: ReservationUpdate) {
    const [row] = await this.executor.update(reservations).set(patch).where(eq(reservations.id, id)).returning();
    return row;
  }

  async deleteReservation(id: string) {
    const deleted = await this.executor.delete(reservations).where(eq(reservations.id, id)).returning({ id: reservations.id });
    return deleted.length > 0;
  }

  async findBookingById(id: string) {
    const [row] = await this.executor.select().from(bookings).where(eq(bookings.id, id)).limit(1);
    return row;
  }

  async countOpenBookingsForOperatorAt(operatorId: string, instant: Date, excludeBookingId?: string) {
    const conditions: SQL[] = [
      eq(bookings.operatorId, operatorId),
      eq(bookings.reservationAt, instant),
      notInArray(bookings.status, RELEASED_BOOKING_STATUSES),
    ];
    if (excludeBookingId) {
      conditions.push(ne(bookings.id, excludeBookingId));
    }
    const [row] = await this.executor.select({ count: sql<number>`count(*)::int` })
      .from(bookings)
      .where(and(...conditions));
    return row?.count ?? 0;
  }

  async countUpcomingBookingsForOperator(operatorId: string, from: Date) {
    const [row] = await this.executor.select({ count: sql<number>`count(*)::int` })
      .from(bookings)
      .where(and(
        eq(bookings.operatorId, operatorId),
        notInArray(bookings.status, RELEASED_BOOKING_STATUSES),
        gte(bookings.reservationAt, from)
      ));
    return row?.count ?? 0;
  }

  async listBookingsAtStation(stationId: string, from: Date, to: Date) {
    return this.executor.select().from(bookings)
      .where(and(
        eq(bookings.stationId, stationId),
        gte(bookings.reservationAt, from),
        lt(bookings.reservationAt, to),
        ne(bookings.status, 'cancelled')
      ));
  }

  async listBookingsByUser(userId: string, status: BookingStatus) {
    return this.executor.select().from(bookings)
      .where(and(eq(bookings.userId, userId), eq(bookings.status, status)))
      .orderBy(desc(bookings.reservationAt));
  }

  async listBookingsByOperator(operatorId: string, status?: BookingStatus) {
    const conditions: SQL[] = [eq(bookings.operatorId, operatorId)];
    if (status) {
      conditions.push(eq(bookings.status, status));
    }
    return this.executor.select().from(bookings)
      .where(and(...conditions))
      .orderBy(desc(bookings.reservationAt));
  }

  async insertBooking(values: NewBooking) {
    const [row] = await this.executor.insert(bookings).values(values).returning();
    return row;
  }

  async updateBooking(id: string, patch: BookingUpdate) {
    const [row] = await this.executor.update(bookings).set(patch).where(eq(bookings.id, id)).returning();
    return row;
  }

  async deleteBooking(id: string) {
    const deleted = await this.executor.delete(bookings).where(eq(bookings.id, id)).returning({ id: bookings.id });
    return deleted.length > 0;
  }

  async exclusive<T>(keys: string[], work: (store: ChargingStore) => Promise<T>): Promise<T> {
    // Sorted so two writers needing the same keys never wait on each other in a cycle
    const ordered = [...new Set(keys)].sort();
    return this.executor.transaction(async (tx) => {
      for (const key of ordered) {
        await tx.execute(sql`SELECT pg_advisory_xact_lock(hashtext(${key}))`);
      }
      return work(new DrizzleChargingStore(tx));
    });
  }
}
