import { and, asc, eq, gt, gte, inArray, lt } from "drizzle-orm";
import { sql } from "drizzle-orm";
import { reservations, type DbClient, type DbExecutor } from "@farmdesk/db";
import { ACTIVE_RESERVATION_STATUSES } from "@farmdesk/shared";
import type { ReservationStatus } from "@farmdesk/shared";
import type { NewReservation, Reservation, ReservationFilter } from "../reservations/types";

export type ActiveReservationQuery = {
  resourceIds: readonly string[];
  from: Date;
  to: Date;
};

export interface ReservationReader {
  listActive(query: ActiveReservationQuery): Promise<Reservation[]>;
  findActiveByFingerprint(fingerprint: string): Promise<Reservation | undefined>;
}

export interface ReservationWriter extends ReservationReader {
  insert(input: NewReservation): Promise<Reservation>;
}

export interface ReservationRepository extends ReservationReader {
  withWriteLock<T>(work: (writer: ReservationWriter) => Promise<T>): Promise<T>;
  findById(id: string): Promise<Reservation | undefined>;
  list(filter: ReservationFilter): Promise<Reservation[]>;
  updateStatus(
    id: string,
    expected: ReservationStatus,
    next: ReservationStatus,
    decisionNote?: string
  ): Promise<Reservation | undefined>;
}

// Arbitrary application-wide key for pg_advisory_xact_lock.
const RESERVATION_WRITE_LOCK = 72_410_318;

type ReservationRow = typeof reservations.$inferSelect;

function toReservation(row: ReservationRow): Reservation {
  return {
    id: row.id,
    serviceId: row.serviceId,
    resourceId: row.resourceId,
    contact: {
      name: row.contactName,
      ...(row.contactPhone ? { phone: row.contactPhone } : {}),
      ...(row.contactEmail ? { email: row.contactEmail } : {})
    },
    // Postgres returns TIME values as HH:MM:SS.
    slot: { date: row.slotDate, start: row.slotStart.slice(0, 5), end: row.slotEnd.slice(0, 5) },
    startAt: row.startAt,
    endAt: row.endAt,
    status: row.status,
    ...(row.sessionId ? { sessionId: row.sessionId } : {}),
    ...(row.note ? { note: row.note } : {}),
    fingerprint: row.fingerprint,
    ...(row.decisionNote ? { decisionNote: row.decisionNote } : {}),
    ...(row.decidedAt ? { decidedAt: row.decidedAt } : {}),
    createdAt: row.createdAt,
    updatedAt: row.updatedAt
  };
}

class DrizzleReservationQueries implements ReservationWriter {
  constructor(protected readonly executor: DbExecutor) {}

  async listActive(query: ActiveReservationQuery): Promise<Reservation[]> {
    if (query.resourceIds.length === 0) return [];
    const rows = await this.executor
      .select()
      .from(reservations)
      .where(
        and(
          inArray(reservations.resourceId, [...query.resourceIds]),
          inArray(reservations.status, [...ACTIVE_RESERVATION_STATUSES]),
          lt(reservations.startAt, query.to),
          gt(reservations.endAt, query.from)
        )
      )
      .orderBy(asc(reservations.startAt));
    return rows.map(toReservation);
  }

  async findActiveByFingerprint(fingerprint: string): Promise<Reservation | undefined> {
    const rows = await this.executor
      .select()
      .from(reservations)
      .where(
        and(eq(reservations.fingerprint, fingerprint), inArray(reservations.status, [...ACTIVE_RESERVATION_STATUSES]))
      )
      .limit(1);
    return rows[0] ? toReservation(rows[0]) : undefined;
  }

  async insert(input: NewReservation): Promise<Reservation> {
    const rows = await this.executor
      .insert(reservations)
      .values({
        serviceId: input.serviceId,
        resourceId: input.resourceId,
        contactName: input.contact.name,
        contactPhone: input.contact.phone ?? null,
        contactEmail: input.contact.email ?? null,
        slotDate: input.slot.date,
        slotStart: input.slot.start,
        slotEnd: input.slot.end,
        startAt: input.startAt,
        endAt: input.endAt,
        status: "pending",
        fingerprint: input.fingerprint,
        ...(input.sessionId ? { sessionId: input.sessionId } : {}),
        ...(input.note ? { note: input.note } : {})
      })
      .returning();
    return toReservation(rows[0]!);
  }
}

export class DrizzleReservationRepository extends DrizzleReservationQueries implements ReservationRepository {
  constructor(private readonly db: DbClient) {
    super(db);
  }

  withWriteLock<T>(work: (writer: ReservationWriter) => Promise<T>): Promise<T> {
    return this.db.transaction(async (tx) => {
      await tx.execute(sql`select pg_advisory_xact_lock(${RESERVATION_WRITE_LOCK})`);
      return work(new DrizzleReservationQueries(tx));
    });
  }

  async findById(id: string): Promise<Reservation | undefined> {
    const row = await this.db.query.reservations.findFirst({ where: eq(reservations.id, id) });
    return row ? toReservation(row) : undefined;
  }

  async list(filter: ReservationFilter): Promise<Reservation[]> {
    const rows = await this.db
      .select()
      .from(reservations)
      .where(
        and(
          ...(filter.status ? [eq(reservations.status, filter.status)] : []),
          ...(filter.from ? [gte(reservations.startAt, filter.from)] : []),
          ...(filter.to ? [lt(reservations.startAt, filter.to)] : [])
        )
      )
      .orderBy(asc(reservations.startAt));
    return rows.map(toReservation);
  }

  async updateStatus(
    id: string,
    expected: ReservationStatus,
    next: ReservationStatus,
    decisionNote?: string
  ): Promise<Reservation | undefined> {
    const now = new Date();
    const rows = await this.db
      .update(reservations)
      .set({ status: next, decidedAt: now, updatedAt: now, ...(decisionNote ? { decisionNote } : {}) })
      .where(and(eq(reservations.id, id), eq(reservations.status, expected)))
      .returning();
    return rows[0] ? toReservation(rows[0]) : undefined;
  }
}
