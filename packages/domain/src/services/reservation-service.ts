import { createHash } from "node:crypto";
import { z } from "zod";
import {
  ConflictError,
  InvalidTransitionError,
  NotFoundError,
  ValidationError,
  createLogger,
  isoDateSchema,
  localTimeSchema
} from "@farmdesk/shared";
import type { RequestContext, RequestedSlot, ReservationDraft, ReservationStatus } from "@farmdesk/shared";
import type { AvailabilityChecker } from "../availability/checker";
import { localDateTime, slotToInterval } from "../availability/slots";
import type { Availability } from "../availability/types";
import type { ReservationRepository } from "../repo/reservation-repo";
import { canTransition } from "../reservations/lifecycle";
import type { Reservation } from "../reservations/types";

const completeDraftSchema = z
  .object({
    serviceId: z.string().min(1),
    date: isoDateSchema,
    time: localTimeSchema,
    name: z.string().trim().min(2),
    phone: z.string().trim().min(6).optional(),
    email: z.string().trim().email().optional(),
    note: z.string().trim().max(300).optional()
  })
  .refine((draft) => Boolean(draft.phone || draft.email), { path: ["phone"], message: "phone or email is required" });

export type CreateReservationOptions = {
  sessionId?: string;
};

export type ReservationListQuery = {
  status?: ReservationStatus;
  from?: string;
  to?: string;
};

type CreateOutcome =
  | { ok: true; reservation: Reservation; created: boolean }
  | { ok: false; availability: Exclude<Availability, { isAvailable: true }> };

function missingFields(error: z.ZodError): string[] {
  const fields = error.issues.map((issue) => String(issue.path[0] ?? "draft"));
  return [...new Set(fields)];
}

export function reservationFingerprint(input: {
  serviceId: string;
  slot: RequestedSlot;
  phone?: string | undefined;
  email?: string | undefined;
}): string {
  const contact = input.phone ? input.phone.replace(/\D/g, "") : (input.email ?? "").toLowerCase();
  return createHash("sha256")
    .update([input.serviceId, input.slot.date, input.slot.start, input.slot.end, contact].join("|"))
    .digest("hex");
}

export class ReservationService {
  private readonly logger = createLogger({ module: "reservation-service" });

  constructor(
    private readonly repo: ReservationRepository,
    private readonly availability: AvailabilityChecker
  ) {}

  /**
   * Writes a `pending` reservation for a complete draft. The availability
   * re-check and the insert share one write lock, so two requests for the
   * same slot cannot both succeed. Re-sending a draft that already produced
   * an active reservation returns that reservation.
   */
  async create(draft: ReservationDraft, options: CreateReservationOptions = {}): Promise<Reservation> {
    const parsed = completeDraftSchema.safeParse(draft);
    if (!parsed.success) {
      throw new ValidationError("Reservation draft is incomplete", missingFields(parsed.error));
    }
    const input = parsed.data;
    const slot = this.availability.slotFor(input.serviceId, input.date, input.time);
    const interval = slotToInterval(slot, this.availability.business.timezone);
    const fingerprint = reservationFingerprint({ serviceId: input.serviceId, slot, phone: input.phone, email: input.email });

    const outcome = await this.repo.withWriteLock(async (writer): Promise<CreateOutcome> => {
      const existing = await writer.findActiveByFingerprint(fingerprint);
      if (existing) {
        return { ok: true, reservation: existing, created: false };
      }

      const availability = await this.availability.check(slot, input.serviceId, { reader: writer });
      if (!availability.isAvailable) {
        return { ok: false, availability };
      }

      const reservation = await writer.insert({
        serviceId: input.serviceId,
        resourceId: availability.resourceId,
        contact: {
          name: input.name,
          ...(input.phone ? { phone: input.phone } : {}),
          ...(input.email ? { email: input.email } : {})
        },
        slot,
        startAt: interval.start,
        endAt: interval.end,
        fingerprint,
        ...(options.sessionId ? { sessionId: options.sessionId } : {}),
        ...(input.note ? { note: input.note } : {})
      });
      return { ok: true, reservation, created: true };
    });

    if (outcome.ok) {
      this.logger.info(
        { reservationId: outcome.reservation.id, created: outcome.created, sessionId: options.sessionId },
        outcome.created ? "reservation created" : "reservation request replayed"
      );
      return outcome.reservation;
    }

    const { availability } = outcome;
    if (availability.reason === "conflict") {
      const alternatives = await this.availability.suggestAlternatives(slot, input.serviceId);
      this.logger.info({ slot, serviceId: input.serviceId, conflicts: availability.conflicts.length }, "reservation conflict");
      throw new ConflictError(
        "Requested slot is already taken",
        availability.conflicts.map((reservation) => ({
          reservationId: reservation.id,
          resourceId: reservation.resourceId,
          startAt: reservation.startAt,
          endAt: reservation.endAt
        })),
        alternatives
      );
    }
    throw new ValidationError(`Requested slot cannot be reserved: ${availability.reason}`, ["time"], {
      context: { reason: availability.reason }
    });
  }

  async get(id: string): Promise<Reservation> {
    const reservation = await this.repo.findById(id);
    if (!reservation) throw new NotFoundError("Reservation", id);
    return reservation;
  }

  list(query: ReservationListQuery = {}): Promise<Reservation[]> {
    const { timezone } = this.availability.business;
    return this.repo.list({
      ...(query.status ? { status: query.status } : {}),
      ...(query.from ? { from: localDateTime(query.from, "00:00", timezone).toJSDate() } : {}),
      ...(query.to ? { to: localDateTime(query.to, "00:00", timezone).plus({ days: 1 }).toJSDate() } : {})
    });
  }

  async transition(id: string, to: ReservationStatus, note?: string, context?: RequestContext): Promise<Reservation> {
    const current = await this.get(id);
    if (!canTransition(current.status, to)) {
      throw new InvalidTransitionError(current.status, to);
    }

    const updated = await this.repo.updateStatus(id, current.status, to, note);
    if (!updated) {
      const latest = await this.get(id);
      throw new InvalidTransitionError(latest.status, to);
    }

    this.logger.info(
      { reservationId: id, from: current.status, to, actor: context?.actor, requestId: context?.requestId },
      "reservation status changed"
    );
    return updated;
  }

  confirm(id: string, note?: string, context?: RequestContext): Promise<Reservation> {
    return this.transition(id, "confirmed", note, context);
  }

  reject(id: string, note?: string, context?: RequestContext): Promise<Reservation> {
    return this.transition(id, "rejected", note, context);
  }
}
