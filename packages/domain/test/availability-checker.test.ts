import { describe, expect, it } from "vitest";
import { ValidationError } from "@farmdesk/shared";
import { AvailabilityChecker, InMemoryReservationRepository } from "../src";
import { TEST_BUSINESS, TEST_NOW, seedReservation } from "./fixtures/business";

function setup(now = TEST_NOW) {
  const repo = new InMemoryReservationRepository(() => now);
  const checker = new AvailabilityChecker(TEST_BUSINESS, repo, () => now);
  return { repo, checker };
}

describe("AvailabilityChecker.check", () => {
  it("accepts a free slot inside opening hours", async () => {
    const { checker } = setup();
    const result = await checker.check({ date: "2026-03-10", start: "09:00", end: "09:30" }, "pregled");

    expect(result).toEqual({
      isAvailable: true,
      reason: "available",
      slot: { date: "2026-03-10", start: "09:00", end: "09:30" },
      resourceId: "ordinacija",
      conflicts: []
    });
  });

  it("rejects slots outside opening hours before looking at reservations", async () => {
    const { checker } = setup();

    const afternoon = await checker.check({ date: "2026-03-10", start: "13:00", end: "13:30" }, "pregled");
    const saturday = await checker.check({ date: "2026-03-07", start: "09:00", end: "09:30" }, "pregled");
    const pastClosing = await checker.check({ date: "2026-03-10", start: "11:45", end: "12:15" }, "pregled");

    expect(afternoon.reason).toBe("outside_business_hours");
    expect(saturday.reason).toBe("outside_business_hours");
    expect(pastClosing.reason).toBe("outside_business_hours");
    expect(afternoon.isAvailable).toBe(false);
  });

  it("treats closure days as outside business hours", async () => {
    const { checker } = setup();
    const result = await checker.check({ date: "2026-12-24", start: "09:00", end: "09:30" }, "pregled");

    expect(result.reason).toBe("outside_business_hours");
  });

  it("enforces the last start time", async () => {
    const { checker } = setup();
    const result = await checker.check({ date: "2026-03-10", start: "11:31", end: "11:59" }, "pregled");

    expect(result.reason).toBe("outside_business_hours");
  });

  it("requires the configured notice", async () => {
    // 09:00 in Ljubljana is 08:00Z in March; 07:30Z leaves only 30 minutes.
    const { checker } = setup(new Date("2026-03-10T07:30:00.000Z"));
    const result = await checker.check({ date: "2026-03-10", start: "09:00", end: "09:30" }, "pregled");

    expect(result.reason).toBe("insufficient_notice");
  });

  it("reports every overlapping active reservation as a conflict", async () => {
    const { repo, checker } = setup();
    const existing = await seedReservation(repo, {
      serviceId: "pregled",
      resourceId: "ordinacija",
      date: "2026-03-10",
      start: "09:00",
      end: "09:30"
    });

    const result = await checker.check({ date: "2026-03-10", start: "09:15", end: "09:45" }, "pregled");

    expect(result.isAvailable).toBe(false);
    expect(result.reason).toBe("conflict");
    expect(result.conflicts.map((reservation) => reservation.id)).toEqual([existing.id]);
  });

  it("treats back-to-back slots as free", async () => {
    const { repo, checker } = setup();
    await seedReservation(repo, { serviceId: "pregled", resourceId: "ordinacija", date: "2026-03-10", start: "09:00", end: "09:30" });

    const before = await checker.check({ date: "2026-03-10", start: "08:30", end: "09:00" }, "pregled");
    const after = await checker.check({ date: "2026-03-10", start: "09:30", end: "10:00" }, "pregled");

    expect(before.isAvailable).toBe(true);
    expect(after.isAvailable).toBe(true);
  });

  it("ignores rejected reservations and counts confirmed ones", async () => {
    const { repo, checker } = setup();
    await seedReservation(repo, {
      serviceId: "pregled",
      resourceId: "ordinacija",
      date: "2026-03-10",
      start: "09:00",
      end: "09:30",
      status: "rejected"
    });
    await seedReservation(repo, {
      serviceId: "pregled",
      resourceId: "ordinacija",
      date: "2026-03-10",
      start: "10:00",
      end: "10:30",
      status: "confirmed"
    });

    const rejectedSlot = await checker.check({ date: "2026-03-10", start: "09:00", end: "09:30" }, "pregled");
    const confirmedSlot = await checker.check({ date: "2026-03-10", start: "10:00", end: "10:30" }, "pregled");

    expect(rejectedSlot.isAvailable).toBe(true);
    expect(confirmedSlot.reason).toBe("conflict");
  });

  it("assigns the next free resource when the service has several", async () => {
    const { repo, checker } = setup();
    await seedReservation(repo, { serviceId: "masaza", resourceId: "soba-1", date: "2026-03-10", start: "14:00", end: "15:00" });

    const result = await checker.check({ date: "2026-03-10", start: "14:00", end: "15:00" }, "masaza");

    expect(result.isAvailable).toBe(true);
    expect(result.isAvailable && result.resourceId).toBe("soba-2");
  });

  it("conflicts only when every resource is taken", async () => {
    const { repo, checker } = setup();
    await seedReservation(repo, { serviceId: "masaza", resourceId: "soba-1", date: "2026-03-10", start: "14:00", end: "15:00" });
    await seedReservation(repo, { serviceId: "masaza", resourceId: "soba-2", date: "2026-03-10", start: "14:30", end: "15:30" });

    const result = await checker.check({ date: "2026-03-10", start: "14:00", end: "15:00" }, "masaza");

    expect(result.reason).toBe("conflict");
    expect(result.conflicts.map((reservation) => reservation.resourceId)).toEqual(["soba-1", "soba-2"]);
  });

  it("rejects unknown services and inverted ranges", async () => {
    const { checker } = setup();

    await expect(checker.check({ date: "2026-03-10", start: "09:00", end: "09:30" }, "sauna")).rejects.toBeInstanceOf(
      ValidationError
    );
    await expect(checker.check({ date: "2026-03-10", start: "10:00", end: "09:30" }, "pregled")).rejects.toBeInstanceOf(
      ValidationError
    );
  });
});

describe("AvailabilityChecker.slotFor", () => {
  it("uses the service duration when no end time is given", () => {
    const { checker } = setup();

    expect(checker.slotFor("masaza", "2026-03-10", "14:00")).toEqual({ date: "2026-03-10", start: "14:00", end: "15:00" });
    expect(checker.slotFor("pregled", "2026-03-10", "09:00", "10:00")).toEqual({
      date: "2026-03-10",
      start: "09:00",
      end: "10:00"
    });
  });
});
