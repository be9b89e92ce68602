import { DateTime } from "luxon";
import { ValidationError } from "@farmdesk/shared";
import type { RequestedSlot } from "@farmdesk/shared";
import type { TimeInterval } from "./types";

export function minutesOf(time: string): number {
  const [hours, minutes] = time.split(":").map(Number);
  return (hours ?? 0) * 60 + (minutes ?? 0);
}

export function formatMinutes(total: number): string {
  const hours = Math.floor(total / 60);
  const minutes = total % 60;
  return `${String(hours).padStart(2, "0")}:${String(minutes).padStart(2, "0")}`;
}

export function localDateTime(date: string, time: string, timezone: string): DateTime {
  const value = DateTime.fromISO(`${date}T${time}`, { zone: timezone });
  if (!value.isValid) {
    throw new ValidationError(`Invalid date or time: ${date} ${time}`, ["date"]);
  }
  return value;
}

export function isoDateOf(value: DateTime): string {
  const date = value.toISODate();
  if (!date) {
    throw new ValidationError(`Invalid date value: ${value.invalidReason ?? "unknown"}`, ["date"]);
  }
  return date;
}

export function weekdayOf(date: string, timezone: string): number {
  return localDateTime(date, "12:00", timezone).weekday;
}

export function slotToInterval(slot: RequestedSlot, timezone: string): TimeInterval {
  return {
    start: localDateTime(slot.date, slot.start, timezone).toJSDate(),
    end: localDateTime(slot.date, slot.end, timezone).toJSDate()
  };
}

export function intervalToSlot(interval: TimeInterval, timezone: string): RequestedSlot {
  const start = DateTime.fromJSDate(interval.start, { zone: timezone });
  const end = DateTime.fromJSDate(interval.end, { zone: timezone });
  return { date: isoDateOf(start), start: start.toFormat("HH:mm"), end: end.toFormat("HH:mm") };
}

export function slotOfDuration(date: string, time: string, durationMinutes: number): RequestedSlot {
  const end = minutesOf(time) + durationMinutes;
  if (end > 24 * 60) {
    throw new ValidationError(`Slot starting at ${time} would run past midnight`, ["time"]);
  }
  return { date, start: time, end: formatMinutes(end) };
}
