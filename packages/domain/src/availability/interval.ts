import type { TimeInterval } from "./types";

/** Intervals are half-open, so a reservation ending at 10:00 leaves 10:00 free. */
export function overlaps(a: TimeInterval, b: TimeInterval): boolean {
  return a.start < b.end && b.start < a.end;
}

export function freeGaps(window: TimeInterval, busy: readonly TimeInterval[]): TimeInterval[] {
  const end = window.end.getTime();
  const blocking = busy
    .filter((interval) => overlaps(window, interval))
    .sort((a, b) => a.start.getTime() - b.start.getTime());

  const gaps: TimeInterval[] = [];
  let cursor = window.start.getTime();
  for (const interval of blocking) {
    const blockStart = interval.start.getTime();
    if (blockStart > cursor) gaps.push({ start: new Date(cursor), end: new Date(blockStart) });
    cursor = Math.max(cursor, interval.end.getTime());
    if (cursor >= end) return gaps;
  }
  if (cursor < end) gaps.push({ start: new Date(cursor), end: window.end });
  return gaps;
}
