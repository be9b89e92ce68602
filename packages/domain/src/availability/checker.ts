import { ValidationError } from "@farmdesk/shared";
import type { RequestedSlot } from "@farmdesk/shared";
import { findService, type BusinessConfig, type ServiceDefinition } from "../business/business-config";
import { isWithinBusinessHours, passesLeadTime } from "../policies/rules";
import type { ReservationReader } from "../repo/reservation-repo";
import { generateAlternativeSlots } from "./alternatives";
import { overlaps } from "./interval";
import { isoDateOf, localDateTime, minutesOf, slotOfDuration, slotToInterval } from "./slots";
import type { Availability } from "./types";

export type CheckOptions = {
  resourceId?: string;
  reader?: Pick<ReservationReader, "listActive">;
};

export class AvailabilityChecker {
  constructor(
    readonly business: BusinessConfig,
    private readonly reservations: Pick<ReservationReader, "listActive">,
    private readonly clock: () => Date = () => new Date()
  ) {}

  requireService(serviceId: string): ServiceDefinition {
    const service = findService(this.business, serviceId);
    if (!service) {
      throw new ValidationError(`Unknown service ${serviceId}`, ["serviceId"]);
    }
    return service;
  }

  slotFor(serviceId: string, date: string, time: string, endTime?: string): RequestedSlot {
    const service = this.requireService(serviceId);
    return endTime ? { date, start: time, end: endTime } : slotOfDuration(date, time, service.durationMinutes);
  }

  async check(slot: RequestedSlot, serviceId: string, options: CheckOptions = {}): Promise<Availability> {
    const service = this.requireService(serviceId);
    if (minutesOf(slot.end) <= minutesOf(slot.start)) {
      throw new ValidationError("Slot must end after it starts", ["time"]);
    }
    if (options.resourceId && !service.resourceIds.includes(options.resourceId)) {
      throw new ValidationError(`Resource ${options.resourceId} does not offer ${serviceId}`, ["resourceId"]);
    }

    const { timezone, closures, leadTimeMinutes } = this.business;
    if (!isWithinBusinessHours(slot, service, closures, timezone)) {
      return { isAvailable: false, reason: "outside_business_hours", slot, conflicts: [] };
    }

    const interval = slotToInterval(slot, timezone);
    if (!passesLeadTime(this.clock(), interval.start, leadTimeMinutes)) {
      return { isAvailable: false, reason: "insufficient_notice", slot, conflicts: [] };
    }

    const resourceIds = options.resourceId ? [options.resourceId] : service.resourceIds;
    const reader = options.reader ?? this.reservations;
    const active = await reader.listActive({ resourceIds, from: interval.start, to: interval.end });
    const conflicts = active.filter(
      (reservation) =>
        resourceIds.includes(reservation.resourceId) &&
        overlaps(interval, { start: reservation.startAt, end: reservation.endAt })
    );

    const free = resourceIds.find((resourceId) => !conflicts.some((reservation) => reservation.resourceId === resourceId));
    if (free === undefined) {
      return { isAvailable: false, reason: "conflict", slot, conflicts };
    }
    return { isAvailable: true, reason: "available", slot, resourceId: free, conflicts: [] };
  }

  async suggestAlternatives(slot: RequestedSlot, serviceId: string, limit = 3): Promise<RequestedSlot[]> {
    const service = this.requireService(serviceId);
    const { timezone, closures, alternativeSearchDays, slotGranularityMinutes, leadTimeMinutes } = this.business;
    const durationMinutes = Math.max(minutesOf(slot.end) - minutesOf(slot.start), service.durationMinutes);
    const firstDay = localDateTime(slot.date, "00:00", timezone);
    const lastDay = firstDay.plus({ days: alternativeSearchDays });

    const reservations = await this.reservations.listActive({
      resourceIds: service.resourceIds,
      from: firstDay.toJSDate(),
      to: lastDay.toJSDate()
    });

    return generateAlternativeSlots(
      {
        service,
        timezone,
        closures,
        fromDate: isoDateOf(firstDay),
        days: alternativeSearchDays,
        durationMinutes,
        granularityMinutes: slotGranularityMinutes,
        leadTimeMinutes,
        limit,
        exclude: slotToInterval(slot, timezone)
      },
      reservations,
      this.clock()
    );
  }
}
