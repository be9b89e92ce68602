import type { DraftStep, ReservationDraft } from "@farmdesk/shared";

type DraftFields = Omit<ReservationDraft, "step">;

export function nextDraftStep(draft: DraftFields): DraftStep {
  if (!draft.serviceId) return "collect_service";
  if (!draft.date || !draft.time) return "collect_slot";
  if (!draft.name || !(draft.phone || draft.email)) return "collect_contact";
  return "await_confirmation";
}
