import { parseBusinessConfig, slotToInterval } from "../../src";
import type { BusinessConfigInput, InMemoryReservationRepository, Reservation } from "../../src";
import type { ReservationStatus } from "@farmdesk/shared";

const weekdays = [1, 2, 3, 4, 5];

export const TEST_BUSINESS_INPUT: BusinessConfigInput = {
  name: "Ordinacija Test",
  address: "Testna ulica 1, 1000 Ljubljana",
  phone: "01 000 00 00",
  email: "info@example.com",
  timezone: "Europe/Ljubljana",
  leadTimeMinutes: 60,
  slotGranularityMinutes: 30,
  alternativeSearchDays: 7,
  closures: [{ from: "2026-12-24", to: "2026-12-26", label: "Prazniki" }],
  services: [
    {
      id: "pregled",
      name: "Pregled",
      aliases: ["pregled", "posvet"],
      durationMinutes: 30,
      resourceIds: ["ordinacija"],
      openingHours: weekdays.map((weekday) => ({ weekday, start: "08:00", end: "12:00" })),
      lastStart: "11:30"
    },
    {
      id: "masaza",
      name: "Masaža",
      aliases: ["masaz", "massage"],
      durationMinutes: 60,
      resourceIds: ["soba-1", "soba-2"],
      openingHours: [
        { weekday: 2, start: "12:00", end: "18:00" },
        { weekday: 4, start: "12:00", end: "18:00" }
      ]
    }
  ]
};

export const TEST_BUSINESS = parseBusinessConfig(TEST_BUSINESS_INPUT);

/** Sunday before the test week; every slot below is far enough ahead. */
export const TEST_NOW = new Date("2026-03-01T08:00:00.000Z");

export async function seedReservation(
  repo: InMemoryReservationRepository,
  input: {
    serviceId: string;
    resourceId: string;
    date: string;
    start: string;
    end: string;
    status?: ReservationStatus;
    phone?: string;
  }
): Promise<Reservation> {
  const slot = { date: input.date, start: input.start, end: input.end };
  const interval = slotToInterval(slot, TEST_BUSINESS.timezone);
  const created = await repo.withWriteLock((writer) =>
    writer.insert({
      serviceId: input.serviceId,
      resourceId: input.resourceId,
      contact: { name: "Seed", phone: input.phone ?? "040 000 000" },
      slot,
      startAt: interval.start,
      endAt: interval.end,
      fingerprint: `seed-${input.resourceId}-${input.date}-${input.start}`
    })
  );
  if (!input.status || input.status === "pending") return created;
  const updated = await repo.updateStatus(created.id, "pending", input.status);
  if (!updated) throw new Error("seed status update failed");
  return updated;
}
