import { sql } from "drizzle-orm";
import { index, pgTable, timestamp, varchar, boolean } from "drizzle-orm/pg-core";
import type { UserRole } from "../constants/statuses";

// Accounts for every role: back office staff, station operators and EV owners.
// EV owners are additionally addressable by their national identity card number (NIC).
export const users = pgTable("users", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  name: varchar("name").notNull(),
  email: varchar("email").notNull().unique(),
  nic: varchar("nic").unique(),
  phone: varchar("phone"),
  role: varchar("role").$type<UserRole>().notNull().default("ev_owner"),
  isActive: boolean("is_active").notNull().default(true),
  stationId: varchar("station_id"),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  index("idx_users_role").on(table.role),
]);

export type User = typeof users.$inferSelect;
