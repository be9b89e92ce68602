import type { RequestedSlot } from "@farmdesk/shared";
import type { Closure, ServiceDefinition } from "../business/business-config";
import { minutesOf, weekdayOf } from "../availability/slots";

export function passesLeadTime(now: Date, slotStart: Date, leadTimeMinutes: number): boolean {
  const minStart = new Date(now.getTime() + leadTimeMinutes * 60_000);
  return slotStart >= minStart;
}

export function closureOn(date: string, closures: readonly Closure[]): Closure | undefined {
  return closures.find((closure) => closure.from <= date && date <= closure.to);
}

export function fitsOpeningHours(slot: RequestedSlot, service: ServiceDefinition, timezone: string): boolean {
  const start = minutesOf(slot.start);
  const end = minutesOf(slot.end);
  if (end <= start) return false;
  if (service.lastStart && start > minutesOf(service.lastStart)) return false;

  const weekday = weekdayOf(slot.date, timezone);
  return service.openingHours.some(
    (window) => window.weekday === weekday && start >= minutesOf(window.start) && end <= minutesOf(window.end)
  );
}

export function isWithinBusinessHours(
  slot: RequestedSlot,
  service: ServiceDefinition,
  closures: readonly Closure[],
  timezone: string
): boolean {
  return !closureOn(slot.date, closures) && fitsOpeningHours(slot, service, timezone);
}
