import { describe, expect, it } from "vitest";
import { ConflictError, InvalidTransitionError, NotFoundError, ValidationError } from "@farmdesk/shared";
import type { ReservationDraft } from "@farmdesk/shared";
import { AvailabilityChecker, InMemoryReservationRepository, ReservationService } from "../src";
import { TEST_BUSINESS, TEST_NOW } from "./fixtures/business";

function setup() {
  const repo = new InMemoryReservationRepository(() => TEST_NOW);
  const checker = new AvailabilityChecker(TEST_BUSINESS, repo, () => TEST_NOW);
  return { repo, service: new ReservationService(repo, checker) };
}

const draft: ReservationDraft = {
  step: "await_confirmation",
  serviceId: "pregled",
  date: "2026-03-10",
  time: "09:00",
  name: "Ana Novak",
  phone: "041 123 456"
};

describe("ReservationService.create", () => {
  it("stores a pending reservation for the service's standard length", async () => {
    const { service } = setup();
    const reservation = await service.create(draft, { sessionId: "s-1" });

    expect(reservation.status).toBe("pending");
    expect(reservation.resourceId).toBe("ordinacija");
    expect(reservation.slot).toEqual({ date: "2026-03-10", start: "09:00", end: "09:30" });
    expect(reservation.startAt.toISOString()).toBe("2026-03-10T08:00:00.000Z");
    expect(reservation.endAt.toISOString()).toBe("2026-03-10T08:30:00.000Z");
    expect(reservation.contact).toEqual({ name: "Ana Novak", phone: "041 123 456" });
    expect(reservation.sessionId).toBe("s-1");
  });

  it("lists the missing fields of an incomplete draft", async () => {
    const { service } = setup();

    const noName = await service.create({ step: "collect_contact", serviceId: "pregled", date: "2026-03-10", time: "09:00" }).catch(
      (error: unknown) => error
    );
    const noContact = await service.create({ ...draft, phone: undefined }).catch((error: unknown) => error);

    expect(noName).toBeInstanceOf(ValidationError);
    expect(noName instanceof ValidationError && noName.missingFields).toEqual(["name"]);
    expect(noContact instanceof ValidationError && noContact.missingFields).toEqual(["phone"]);
  });

  it("refuses slots outside business hours without writing", async () => {
    const { repo, service } = setup();

    const error = await service.create({ ...draft, time: "15:00" }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ValidationError);
    expect(error instanceof ValidationError && error.context.reason).toBe("outside_business_hours");
    expect(await repo.list({})).toEqual([]);
  });

  it("raises a conflict with alternatives when the slot is taken", async () => {
    const { service } = setup();
    const first = await service.create(draft);

    const error = await service
      .create({ ...draft, name: "Bojan Kralj", phone: "031 555 111" })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ConflictError);
    if (!(error instanceof ConflictError)) return;
    expect(error.conflicts.map((conflict) => conflict.reservationId)).toEqual([first.id]);
    expect(error.alternatives[0]).toEqual({ date: "2026-03-10", start: "08:00", end: "08:30" });
  });

  it("returns the existing reservation when the same draft is sent again", async () => {
    const { repo, service } = setup();

    const first = await service.create(draft);
    const second = await service.create({ ...draft, phone: "041123456" });

    expect(second.id).toBe(first.id);
    expect(await repo.list({})).toHaveLength(1);
  });

  it("creates exactly one reservation for a draft re-sent after a conflict clears", async () => {
    const { repo, service } = setup();
    const blocker = await service.create({ ...draft, name: "Bojan Kralj", phone: "031 555 111" });

    await expect(service.create(draft)).rejects.toBeInstanceOf(ConflictError);
    await service.reject(blocker.id, "double booking");

    const created = await service.create(draft);
    const replayed = await service.create(draft);

    expect(replayed.id).toBe(created.id);
    expect(await repo.list({ status: "pending" })).toHaveLength(1);
  });

  it("lets only one of two concurrent requests for the same slot through", async () => {
    const { repo, service } = setup();

    const results = await Promise.allSettled([
      service.create(draft),
      service.create({ ...draft, name: "Bojan Kralj", phone: "031 555 111" })
    ]);

    expect(results.filter((result) => result.status === "fulfilled")).toHaveLength(1);
    const rejected = results.find((result) => result.status === "rejected");
    expect(rejected?.status === "rejected" && rejected.reason).toBeInstanceOf(ConflictError);
    expect(await repo.list({ status: "pending" })).toHaveLength(1);
  });
});

describe("ReservationService transitions", () => {
  it("confirms and rejects pending reservations only", async () => {
    const { service } = setup();
    const first = await service.create(draft);
    const second = await service.create({ ...draft, time: "10:00" });

    const confirmed = await service.confirm(first.id, "see you");
    const rejected = await service.reject(second.id);

    expect(confirmed.status).toBe("confirmed");
    expect(confirmed.decisionNote).toBe("see you");
    expect(confirmed.decidedAt?.toISOString()).toBe(TEST_NOW.toISOString());
    expect(rejected.status).toBe("rejected");
    await expect(service.confirm(first.id)).rejects.toBeInstanceOf(InvalidTransitionError);
    await expect(service.confirm(second.id)).rejects.toBeInstanceOf(InvalidTransitionError);
    await expect(service.transition(first.id, "pending")).rejects.toBeInstanceOf(InvalidTransitionError);
  });

  it("reports unknown reservations", async () => {
    const { service } = setup();

    await expect(service.confirm("missing")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("filters the admin listing by status and local date range", async () => {
    const { service } = setup();
    const tuesday = await service.create(draft);
    const wednesday = await service.create({ ...draft, date: "2026-03-11" });
    await service.confirm(wednesday.id);

    const onTuesday = await service.list({ from: "2026-03-10", to: "2026-03-10" });
    const confirmed = await service.list({ status: "confirmed" });

    expect(onTuesday.map((reservation) => reservation.id)).toEqual([tuesday.id]);
    expect(confirmed.map((reservation) => reservation.id)).toEqual([wednesday.id]);
  });
});
