import type { RequestedSlot, ReservationDraft } from "@farmdesk/shared";
import { findService } from "@farmdesk/domain";
import type { Availability, BusinessConfig, KnowledgeDocument, Reservation, ServiceDefinition } from "@farmdesk/domain";

const WEEKDAY_NAMES = ["", "ponedeljek", "torek", "sreda", "četrtek", "petek", "sobota", "nedelja"];

function displayDate(date: string): string {
  const [year, month, day] = date.split("-");
  return `${Number(day)}. ${Number(month)}. ${year}`;
}

function serviceName(business: BusinessConfig, serviceId: string | undefined): string {
  return (serviceId && findService(business, serviceId)?.name) || "storitev";
}

function formatSlot(slot: RequestedSlot): string {
  return `${displayDate(slot.date)} ob ${slot.start}`;
}

export function askService(business: BusinessConfig): string {
  return `Za katero storitev želite termin? Na voljo imamo: ${business.services.map((service) => service.name).join(", ")}.`;
}

export function askSlot(draft: ReservationDraft): string {
  if (draft.date && !draft.time) return `Ob kateri uri vam ${displayDate(draft.date)} ustreza?`;
  if (!draft.date && draft.time) return `Kateri dan vam ustreza ob ${draft.time}?`;
  return "Kateri dan in ob kateri uri bi želeli priti?";
}

export function askContact(draft: ReservationDraft): string {
  if (!draft.name && !draft.phone && !draft.email) return "Prosim še za vaše ime in telefonsko številko ali e-naslov.";
  if (!draft.name) return "Prosim še za vaše ime in priimek.";
  return "Prosim še za telefonsko številko ali e-naslov.";
}

export function confirmSummary(business: BusinessConfig, draft: ReservationDraft): string {
  const contact = [draft.phone, draft.email].filter(Boolean).join(", ");
  const when = draft.date && draft.time ? `${displayDate(draft.date)} ob ${draft.time}` : "";
  return `Povzetek: ${serviceName(business, draft.serviceId)}, ${when}, ${draft.name ?? ""} (${contact}). Želite oddati to povpraševanje? Odgovorite z "da" ali "ne".`;
}

export function nextQuestion(business: BusinessConfig, draft: ReservationDraft): string {
  switch (draft.step) {
    case "collect_service":
      return askService(business);
    case "collect_slot":
      return askSlot(draft);
    case "collect_contact":
      return askContact(draft);
    case "await_confirmation":
      return confirmSummary(business, draft);
  }
}

export function slotAvailable(business: BusinessConfig, draft: ReservationDraft, slot: RequestedSlot): string {
  const follow = draft.step === "await_confirmation" ? confirmSummary(business, draft) : askContact(draft);
  return `Termin ${formatSlot(slot)} (${serviceName(business, draft.serviceId)}) je prost. ${follow}`;
}

function alternativesLine(alternatives: readonly RequestedSlot[]): string {
  if (alternatives.length === 0) return "Predlagajte prosim drug dan.";
  return `Prosti termini: ${alternatives.map(formatSlot).join("; ")}.`;
}

export function slotUnavailable(
  business: BusinessConfig,
  service: ServiceDefinition,
  availability: Exclude<Availability, { isAvailable: true }>,
  alternatives: readonly RequestedSlot[]
): string {
  switch (availability.reason) {
    case "outside_business_hours":
      return `Termin ${formatSlot(availability.slot)} je izven delovnega časa za ${service.name}. ${openingHoursSummary(service)} ${alternativesLine(alternatives)}`;
    case "insufficient_notice":
      return `Termin ${formatSlot(availability.slot)} je prekmalu, rezervacije sprejemamo vsaj ${business.leadTimeMinutes} minut vnaprej. ${alternativesLine(alternatives)}`;
    case "conflict":
      return `Termin ${formatSlot(availability.slot)} je že zaseden. ${alternativesLine(alternatives)}`;
  }
}

export function openingHoursSummary(service: ServiceDefinition): string {
  const days = [...service.openingHours]
    .sort((a, b) => a.weekday - b.weekday || a.start.localeCompare(b.start))
    .map((window) => `${WEEKDAY_NAMES[window.weekday] ?? window.weekday} ${window.start}-${window.end}`);
  return `Delovni čas: ${days.join(", ")}.`;
}

export function pendingReservation(business: BusinessConfig, reservation: Reservation): string {
  return `Hvala, vaše povpraševanje za ${serviceName(business, reservation.serviceId)} ${formatSlot(reservation.slot)} smo prejeli. Rezervacija čaka na potrditev, o odločitvi vas obvestimo.`;
}

export function slotTakenMeanwhile(alternatives: readonly RequestedSlot[]): string {
  return `Izbrani termin medtem ni več prost. ${alternativesLine(alternatives)}`;
}

export const DECLINED = "V redu, povpraševanja nisem oddal. Če želite drug termin, mi napišite dan in uro.";
export const CANCELLED = "Prekinil sem pripravo rezervacije. Kako vam lahko še pomagam?";
export const EMPTY_MESSAGE = "Prosim, napišite vaše vprašanje.";
export const RESTATE = "Oprostite, nisem razumel. Lahko prosim ponovite dan, uro in storitev?";

export function continueDraft(business: BusinessConfig, draft: ReservationDraft): string {
  return `Za nadaljevanje rezervacije: ${nextQuestion(business, draft)}`;
}

export function routingUnavailable(business: BusinessConfig, draft: ReservationDraft | undefined): string {
  const apology = "Oprostite, trenutno ne morem obdelati vašega sporočila.";
  return draft ? `${apology} ${nextQuestion(business, draft)}` : `${apology} ${manualContact(business)}`;
}

export function manualContact(business: BusinessConfig): string {
  return `Za pomoč nas pokličite na ${business.phone} ali pišite na ${business.email}.`;
}

export function lowConfidence(business: BusinessConfig): string {
  return `Na to vprašanje žal nimam zanesljivega odgovora. ${manualContact(business)}`;
}

export function formatSnippet(document: KnowledgeDocument): string {
  return document.url ? `${document.text}\nVeč: ${document.url}` : document.text;
}
