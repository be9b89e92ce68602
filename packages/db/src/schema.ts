import { check, date, index, jsonb, pgEnum, pgTable, time, timestamp, varchar, uuid } from "drizzle-orm/pg-core";
import { sql } from "drizzle-orm";
import type { ChatTurn, ReservationDraft } from "@farmdesk/shared";

const timestamps = {
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull()
};

export const reservationStatus = pgEnum("reservation_status", ["pending", "confirmed", "rejected"]);

export const reservations = pgTable(
  "reservations",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    serviceId: varchar("service_id", { length: 60 }).notNull(),
    resourceId: varchar("resource_id", { length: 60 }).notNull(),
    contactName: varchar("contact_name", { length: 160 }).notNull(),
    contactPhone: varchar("contact_phone", { length: 40 }),
    contactEmail: varchar("contact_email", { length: 255 }),
    slotDate: date("slot_date").notNull(),
    slotStart: time("slot_start").notNull(),
    slotEnd: time("slot_end").notNull(),
    startAt: timestamp("start_at", { withTimezone: true }).notNull(),
    endAt: timestamp("end_at", { withTimezone: true }).notNull(),
    status: reservationStatus("status").default("pending").notNull(),
    sessionId: varchar("session_id", { length: 120 }),
    note: varchar("note", { length: 300 }),
    fingerprint: varchar("fingerprint", { length: 64 }).notNull(),
    decisionNote: varchar("decision_note", { length: 300 }),
    decidedAt: timestamp("decided_at", { withTimezone: true }),
    ...timestamps
  },
  (table) => [
    check("reservations_range_check", sql`${table.endAt} > ${table.startAt}`),
    check(
      "reservations_contact_check",
      sql`(${table.contactPhone} IS NOT NULL) OR (${table.contactEmail} IS NOT NULL)`
    ),
    index("reservations_resource_start_idx").on(table.resourceId, table.startAt),
    index("reservations_status_start_idx").on(table.status, table.startAt),
    index("reservations_fingerprint_idx").on(table.fingerprint)
  ]
);

export const conversationSessions = pgTable(
  "conversation_sessions",
  {
    sessionId: varchar("session_id", { length: 120 }).primaryKey(),
    history: jsonb("history_jsonb").$type<ChatTurn[]>().default(sql`'[]'::jsonb`).notNull(),
    draft: jsonb("draft_jsonb").$type<ReservationDraft>(),
    ...timestamps
  },
  (table) => [index("conversation_sessions_updated_idx").on(table.updatedAt)]
);
