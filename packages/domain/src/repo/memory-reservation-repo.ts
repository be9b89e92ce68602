import { randomUUID } from "node:crypto";
import { createSemaphore, withPermit } from "@farmdesk/shared";
import type { ReservationStatus } from "@farmdesk/shared";
import { overlaps } from "../availability/interval";
import { holdsSlot } from "../reservations/lifecycle";
import type { NewReservation, Reservation, ReservationFilter } from "../reservations/types";
import type { ActiveReservationQuery, ReservationRepository, ReservationWriter } from "./reservation-repo";

export class InMemoryReservationRepository implements ReservationRepository {
  private readonly rows = new Map<string, Reservation>();
  private readonly writeLock = createSemaphore(1);
  private readonly writer: ReservationWriter = {
    listActive: (query) => this.listActive(query),
    findActiveByFingerprint: (fingerprint) => this.findActiveByFingerprint(fingerprint),
    insert: (input) => this.insert(input)
  };

  constructor(private readonly clock: () => Date = () => new Date()) {}

  withWriteLock<T>(work: (writer: ReservationWriter) => Promise<T>): Promise<T> {
    return withPermit(this.writeLock, () => work(this.writer));
  }

  async listActive(query: ActiveReservationQuery): Promise<Reservation[]> {
    const window = { start: query.from, end: query.to };
    return this.snapshot()
      .filter(
        (row) =>
          holdsSlot(row.status) &&
          query.resourceIds.includes(row.resourceId) &&
          overlaps(window, { start: row.startAt, end: row.endAt })
      )
      .sort((a, b) => a.startAt.getTime() - b.startAt.getTime());
  }

  async findActiveByFingerprint(fingerprint: string): Promise<Reservation | undefined> {
    return this.snapshot().find((row) => row.fingerprint === fingerprint && holdsSlot(row.status));
  }

  async findById(id: string): Promise<Reservation | undefined> {
    const row = this.rows.get(id);
    return row ? structuredClone(row) : undefined;
  }

  async list(filter: ReservationFilter): Promise<Reservation[]> {
    return this.snapshot()
      .filter(
        (row) =>
          (!filter.status || row.status === filter.status) &&
          (!filter.from || row.startAt >= filter.from) &&
          (!filter.to || row.startAt < filter.to)
      )
      .sort((a, b) => a.startAt.getTime() - b.startAt.getTime());
  }

  async updateStatus(
    id: string,
    expected: ReservationStatus,
    next: ReservationStatus,
    decisionNote?: string
  ): Promise<Reservation | undefined> {
    const row = this.rows.get(id);
    if (!row || row.status !== expected) return undefined;
    const now = this.clock();
    const updated: Reservation = {
      ...row,
      status: next,
      decidedAt: now,
      updatedAt: now,
      ...(decisionNote ? { decisionNote } : {})
    };
    this.rows.set(id, updated);
    return structuredClone(updated);
  }

  private async insert(input: NewReservation): Promise<Reservation> {
    const now = this.clock();
    const row: Reservation = { ...structuredClone(input), id: randomUUID(), status: "pending", createdAt: now, updatedAt: now };
    this.rows.set(row.id, row);
    return structuredClone(row);
  }

  private snapshot(): Reservation[] {
    return [...this.rows.values()].map((row) => structuredClone(row));
  }
}
