import { DateTime } from "luxon";
import type { RequestedSlot } from "@farmdesk/shared";
import type { Closure, ServiceDefinition } from "../business/business-config";
import { closureOn, passesLeadTime } from "../policies/rules";
import type { Reservation } from "../reservations/types";
import { freeGaps, overlaps } from "./interval";
import { intervalToSlot, isoDateOf, localDateTime, minutesOf, weekdayOf } from "./slots";
import type { TimeInterval } from "./types";

export type AlternativeSearch = {
  service: ServiceDefinition;
  timezone: string;
  closures: readonly Closure[];
  fromDate: string;
  days: number;
  durationMinutes: number;
  granularityMinutes: number;
  leadTimeMinutes: number;
  limit: number;
  exclude?: TimeInterval;
};

function alignToGranularity(date: Date, granularityMinutes: number): Date {
  const ms = granularityMinutes * 60_000;
  const aligned = Math.ceil(date.getTime() / ms) * ms;
  return new Date(aligned);
}

function workingSegments(date: string, search: AlternativeSearch): TimeInterval[] {
  if (closureOn(date, search.closures)) return [];
  const weekday = weekdayOf(date, search.timezone);
  return search.service.openingHours
    .filter((window) => window.weekday === weekday)
    .sort((a, b) => minutesOf(a.start) - minutesOf(b.start))
    .map((window) => ({
      start: localDateTime(date, window.start, search.timezone).toJSDate(),
      end: localDateTime(date, window.end, search.timezone).toJSDate()
    }));
}

export function generateAlternativeSlots(
  search: AlternativeSearch,
  reservations: readonly Reservation[],
  now = new Date()
): RequestedSlot[] {
  const output: RequestedSlot[] = [];
  const spanMs = search.durationMinutes * 60_000;
  const stepMs = search.granularityMinutes * 60_000;
  const lastStart = search.service.lastStart ? minutesOf(search.service.lastStart) : undefined;
  const busyByResource = search.service.resourceIds.map((resourceId) =>
    reservations
      .filter((reservation) => reservation.resourceId === resourceId)
      .map((reservation) => ({ start: reservation.startAt, end: reservation.endAt }))
  );
  const firstDay = localDateTime(search.fromDate, "00:00", search.timezone);

  for (let offset = 0; offset < search.days && output.length < search.limit; offset++) {
    const date = isoDateOf(firstDay.plus({ days: offset }));

    for (const segment of workingSegments(date, search)) {
      const freeByResource = busyByResource.map((busy) => freeGaps(segment, busy));
      let cursor = alignToGranularity(segment.start, search.granularityMinutes);

      while (cursor.getTime() + spanMs <= segment.end.getTime() && output.length < search.limit) {
        const candidate = { start: cursor, end: new Date(cursor.getTime() + spanMs) };
        const localStart = DateTime.fromJSDate(candidate.start, { zone: search.timezone });
        const startMinutes = localStart.hour * 60 + localStart.minute;
        const fits = freeByResource.some((free) =>
          free.some((segmentFree) => segmentFree.start <= candidate.start && candidate.end <= segmentFree.end)
        );

        if (
          fits &&
          (lastStart === undefined || startMinutes <= lastStart) &&
          passesLeadTime(now, candidate.start, search.leadTimeMinutes) &&
          !(search.exclude && overlaps(search.exclude, candidate))
        ) {
          output.push(intervalToSlot(candidate, search.timezone));
        }

        cursor = new Date(cursor.getTime() + stepMs);
      }
    }
  }

  return output;
}
