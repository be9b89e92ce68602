import type { ReservationDraft, VerifiedSlot } from "@farmdesk/shared";
import { nextDraftStep } from "./machine";

export type DraftPatch = Partial<Omit<ReservationDraft, "step" | "verified">>;

const PATCH_KEYS = ["serviceId", "date", "time", "name", "phone", "email", "note"] as const;
const SLOT_KEYS: ReadonlySet<string> = new Set(["serviceId", "date", "time"]);

export function emptyDraft(): ReservationDraft {
  return { step: "collect_service" };
}

export function changedFields(draft: ReservationDraft | undefined, patch: DraftPatch): Array<keyof DraftPatch> {
  return PATCH_KEYS.filter((key) => patch[key] !== undefined && patch[key] !== draft?.[key]);
}

export function mergeDraft(draft: ReservationDraft | undefined, patch: DraftPatch): ReservationDraft {
  const base = draft ?? emptyDraft();
  const changed = changedFields(base, patch);
  const merged: ReservationDraft = { ...base };
  for (const key of changed) {
    const value = patch[key];
    if (value !== undefined) merged[key] = value;
  }
  if (changed.some((key) => SLOT_KEYS.has(key))) {
    delete merged.verified;
  }
  merged.step = nextDraftStep(merged);
  return merged;
}

export function markVerified(draft: ReservationDraft, slot: VerifiedSlot): ReservationDraft {
  return { ...draft, verified: slot };
}

export function isVerified(draft: ReservationDraft): boolean {
  const { verified } = draft;
  return (
    verified !== undefined &&
    verified.serviceId === draft.serviceId &&
    verified.date === draft.date &&
    verified.time === draft.time
  );
}

export function clearSlot(draft: ReservationDraft): ReservationDraft {
  const { date: _date, time: _time, verified: _verified, ...rest } = draft;
  return { ...rest, step: nextDraftStep(rest) };
}

export function missingContactFields(draft: ReservationDraft): Array<"name" | "contact"> {
  const missing: Array<"name" | "contact"> = [];
  if (!draft.name) missing.push("name");
  if (!draft.phone && !draft.email) missing.push("contact");
  return missing;
}
