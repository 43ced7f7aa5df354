import { sql } from "drizzle-orm";
import { index, uniqueIndex, jsonb, pgTable, timestamp, varchar, boolean, text, integer, doublePrecision } from "drizzle-orm/pg-core";
import type { BookingStatus, ReservationStatus } from "../constants/statuses";

export interface DaySchedule {
  dayOfWeek: string;
  isOpen: boolean;
  openTime: string;
  closeTime: string;
}

export const stations = pgTable("stations", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  name: varchar("name").notNull(),
  address: varchar("address").notNull().default(""),
  latitude: doublePrecision("latitude"),
  longitude: doublePrecision("longitude"),
  type: varchar("type").notNull().default("AC"),
  totalSlots: integer("total_slots").notNull().default(1),
  schedule: jsonb("schedule").$type<DaySchedule[]>().notNull().default([]),
  isActive: boolean("is_active").notNull().default(true),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
});

// Station-scoped assignable worker; name/email/phone mirror the linked account
export const operators = pgTable("operators", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  userId: varchar("user_id").notNull(),
  stationId: varchar("station_id").notNull(),
  name: varchar("name").notNull(),
  email: varchar("email").notNull(),
  phone: varchar("phone").notNull().default(""),
  isActive: boolean("is_active").notNull().default(true),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  uniqueIndex("operators_user_id_idx").on(table.userId),
  index("idx_operators_station_active").on(table.stationId, table.isActive),
]);

export const reservations = pgTable("reservations", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  userId: varchar("user_id").notNull(),
  chargingStationId: varchar("charging_station_id").notNull(),
  startTime: timestamp("start_time", { withTimezone: true }).notNull(),
  endTime: timestamp("end_time", { withTimezone: true }).notNull(),
  status: varchar("status").$type<ReservationStatus>().notNull().default("pending"),
  qrCode: text("qr_code"),
  operatorId: varchar("operator_id"),
  operatorUserId: varchar("operator_user_id"),
  bookingId: varchar("booking_id"),
  notes: text("notes"),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }),
}, (table) => [
  index("idx_reservations_station_status").on(table.chargingStationId, table.status),
  index("idx_reservations_user").on(table.userId),
  uniqueIndex("reservations_booking_id_idx").on(table.bookingId),
]);

export const bookings = pgTable("bookings", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  userId: varchar("user_id").notNull(),
  stationId: varchar("station_id").notNull(),
  reservationAt: timestamp("reservation_at", { withTimezone: true }).notNull(),
  status: varchar("status").$type<BookingStatus>().notNull().default("pending"),
  operatorId: varchar("operator_id"),
  checkInTime: timestamp("check_in_time", { withTimezone: true }),
  checkOutTime: timestamp("check_out_time", { withTimezone: true }),
  energyConsumedKwh: doublePrecision("energy_consumed_kwh"),
  sessionDurationMinutes: integer("session_duration_minutes"),
  sessionNotes: text("session_notes"),
  qrCode: text("qr_code"),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  index("idx_bookings_station_time").on(table.stationId, table.reservationAt),
  index("idx_bookings_user_status").on(table.userId, table.status),
  uniqueIndex("bookings_operator_slot_idx")
    .on(table.operatorId, table.reservationAt)
    .where(sql`${table.status} NOT IN ('cancelled', 'completed')`),
]);

export type Station = typeof stations.$inferSelect;
export type Operator = typeof operators.$inferSelect;
export type Reservation = typeof reservations.$inferSelect;
export type Booking = typeof bookings.$inferSelect;
