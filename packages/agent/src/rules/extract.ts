import { DateTime } from "luxon";
import { normalizeText } from "@farmdesk/domain";
import type { ServiceDefinition } from "@farmdesk/domain";
import type { DraftPatch } from "../state/draft";

export type ExtractionContext = {
  now: DateTime;
  services: readonly ServiceDefinition[];
  expectName?: boolean;
};

type Match<T> = { value: T; span: string };

const WEEKDAYS: Array<[RegExp, number]> = [
  [/^(ponedelj|monday)/, 1],
  [/^(tor(ek|ka)|tuesday)/, 2],
  [/^(sred[aoe]|wednesday)/, 3],
  [/^(cetrt(ek|ka)|thursday)/, 4],
  [/^(pet(ek|ka)|friday)/, 5],
  [/^(sobot[aoe]|saturday)/, 6],
  [/^(nedelj[aoe]|sunday)/, 7]
];

const WEEKDAY_PATTERN =
  /\b(?:(?:naslednj[iao]|next)\s+)?(ponedelj\w*|tor(?:ek|ka)|sred[aoe]|cetrt(?:ek|ka)|pet(?:ek|ka)|sobot[aoe]|nedelj[aoe]|monday|tuesday|wednesday|thursday|friday|saturday|sunday)\b/;

const RELATIVE_DAYS: Array<[RegExp, number]> = [
  [/\bpojutri(?:snjem)?\b/, 2],
  [/\b(?:jutri|tomorrow)\b/, 1],
  [/\b(?:danes|today)\b/, 0]
];

const NAME_PATTERN =
  /(?:[Ii]me mi je|[Mm]oje ime je|[Jj]az sem|\b[Ss]em|[Mm]y name is|I am|I'm)\s+(\p{Lu}\p{Ll}+(?:[ -]\p{Lu}\p{Ll}+){0,2})/u;
const EMAIL_ADDRESS = /[\w.%+-]+@[\w.-]+\.[a-z]{2,}/gi;
const BARE_NAME_PATTERN = /^\s*(\p{Lu}\p{Ll}+(?:\s+\p{Lu}\p{Ll}+){1,2})\s*(?:[,.;]|$)/u;

function isoDate(value: DateTime): string {
  return value.toFormat("yyyy-MM-dd");
}

function calendarDate(now: DateTime, year: number, month: number, day: number): DateTime | undefined {
  const value = DateTime.fromObject({ year, month, day }, { zone: now.zone });
  return value.isValid ? value : undefined;
}

export function extractDate(text: string, now: DateTime): Match<string> | undefined {
  const iso = /\b(\d{4})-(\d{2})-(\d{2})\b/.exec(text);
  if (iso) {
    const value = calendarDate(now, Number(iso[1]), Number(iso[2]), Number(iso[3]));
    if (value) return { value: isoDate(value), span: iso[0] };
  }

  const full = /\b(\d{1,2})\.\s?(\d{1,2})\.\s?(\d{4})\b/.exec(text);
  if (full) {
    const value = calendarDate(now, Number(full[3]), Number(full[2]), Number(full[1]));
    if (value) return { value: isoDate(value), span: full[0] };
  }

  const yearless = /\b(\d{1,2})\.\s?(\d{1,2})\.(?!\d)/.exec(text);
  if (yearless) {
    const value = calendarDate(now, now.year, Number(yearless[2]), Number(yearless[1]));
    if (value) {
      const next = value.toMillis() < now.startOf("day").toMillis() ? value.plus({ years: 1 }) : value;
      return { value: isoDate(next), span: yearless[0] };
    }
  }

  for (const [pattern, offset] of RELATIVE_DAYS) {
    const relative = pattern.exec(text);
    if (relative) return { value: isoDate(now.plus({ days: offset })), span: relative[0] };
  }

  const weekday = WEEKDAY_PATTERN.exec(text);
  const weekdayName = weekday?.[1];
  if (weekday && weekdayName) {
    const target = WEEKDAYS.find(([pattern]) => pattern.test(weekdayName))?.[1];
    if (target !== undefined) {
      const ahead = (target - now.weekday + 7) % 7 || 7;
      return { value: isoDate(now.plus({ days: ahead })), span: weekday[0] };
    }
  }
  return undefined;
}

export function extractTime(text: string): Match<string> | undefined {
  const clock = /\b([01]?\d|2[0-3])[:.]([0-5]\d)\b/.exec(text);
  if (clock) {
    return { value: `${(clock[1] ?? "").padStart(2, "0")}:${clock[2] ?? "00"}`, span: clock[0] };
  }
  const hour = /\b(?:ob|at)\s+([01]?\d|2[0-3])(?:\s*h|\s*uri)?\b/.exec(text);
  if (hour) {
    return { value: `${(hour[1] ?? "").padStart(2, "0")}:00`, span: hour[0] };
  }
  return undefined;
}

export function extractEmail(text: string): Match<string> | undefined {
  const email = /[a-z0-9._%+-]+@[a-z0-9.-]+\.[a-z]{2,}/.exec(text);
  return email ? { value: email[0], span: email[0] } : undefined;
}

export function extractPhone(text: string): Match<string> | undefined {
  for (const candidate of text.matchAll(/\+?\d[\d\s/-]{4,}\d/g)) {
    const digits = candidate[0].replace(/\D/g, "");
    if (digits.length >= 6 && digits.length <= 15) {
      return { value: candidate[0].trim(), span: candidate[0] };
    }
  }
  return undefined;
}

export function extractService(text: string, services: readonly ServiceDefinition[]): string | undefined {
  const words = text.split(/[^a-z0-9]+/).filter((word) => word.length > 0);
  const matched = services.filter((service) =>
    [service.id, ...service.aliases].some((alias) => {
      const stem = normalizeText(alias);
      return words.some((word) => word.startsWith(stem));
    })
  );
  return matched.length === 1 ? matched[0]?.id : undefined;
}

export function extractName(message: string, expectName: boolean): string | undefined {
  const introduced = NAME_PATTERN.exec(message);
  if (introduced?.[1]) return introduced[1];
  if (!expectName) return undefined;
  return BARE_NAME_PATTERN.exec(message)?.[1];
}

function without(text: string, span: string | undefined): string {
  return span ? text.replace(span, " ") : text;
}

/**
 * Deterministic entity extraction for the reservation draft. Dates are taken
 * out of the text before times, and both before phone numbers, so "10.3. ob
 * 14:00" never reads as a phone number.
 */
export function extractEntities(message: string, context: ExtractionContext): DraftPatch {
  const normalized = normalizeText(message);
  const patch: DraftPatch = {};

  const serviceId = extractService(normalized, context.services);
  if (serviceId) patch.serviceId = serviceId;

  const date = extractDate(normalized, context.now);
  if (date) patch.date = date.value;
  let rest = without(normalized, date?.span);

  const time = extractTime(rest);
  if (time) patch.time = time.value;
  rest = without(rest, time?.span);

  const email = extractEmail(rest);
  if (email) patch.email = email.value;
  rest = without(rest, email?.span);

  const phone = extractPhone(rest);
  if (phone) patch.phone = phone.value;

  const nameSource = message.replace(EMAIL_ADDRESS, " ");
  const name = extractName(phone ? nameSource.replace(phone.value, " ") : nameSource, context.expectName ?? false);
  if (name) patch.name = name;

  return patch;
}
