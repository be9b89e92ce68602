import { normalizeText } from "@farmdesk/domain";

const RESERVATION_STEMS = ["rezerv", "naroc", "termin", "book", "reserv", "appoint"];
const AFFIRMATIVE = new Set(["da", "ja", "seveda", "potrdi", "potrdim", "potrjujem", "drzi", "ok", "okej", "yes", "sure", "confirm"]);
const NEGATIVE = new Set(["ne", "no", "nikakor", "nope"]);
const AVAILABILITY_STEMS = ["prost", "zaseden", "razpoloz", "availab"];
const CANCEL_STEMS = ["preklic", "prekin", "pozabi", "cancel"];

function words(text: string): string[] {
  return normalizeText(text)
    .split(/[^a-z0-9]+/)
    .filter((word) => word.length > 0);
}

export function hasReservationIntent(text: string): boolean {
  return words(text).some((word) => RESERVATION_STEMS.some((stem) => word.startsWith(stem)));
}

export function isAvailabilityQuery(text: string): boolean {
  if (normalizeText(text).includes("na voljo")) return true;
  return words(text).some(
    (word) => !word.startsWith("prostor") && AVAILABILITY_STEMS.some((stem) => word.startsWith(stem))
  );
}

export function isAffirmative(text: string): boolean {
  const tokens = words(text);
  if (tokens.length === 0 || tokens.length > 4 || tokens.some((word) => NEGATIVE.has(word))) return false;
  const [first, second] = tokens;
  return (first !== undefined && AFFIRMATIVE.has(first)) || (first === "v" && second === "redu");
}

export function isNegative(text: string): boolean {
  const [first, ...rest] = words(text);
  return first !== undefined && NEGATIVE.has(first) && rest.length <= 4;
}

export function isCancel(text: string): boolean {
  return words(text).some((word) => CANCEL_STEMS.some((stem) => word.startsWith(stem)));
}
