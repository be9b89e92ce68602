import { ACTIVE_RESERVATION_STATUSES } from "@farmdesk/shared";
import type { ReservationStatus } from "@farmdesk/shared";

const TRANSITIONS: Record<ReservationStatus, readonly ReservationStatus[]> = {
  pending: ["confirmed", "rejected"],
  confirmed: [],
  rejected: []
};

export function canTransition(from: ReservationStatus, to: ReservationStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(status: ReservationStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

export function holdsSlot(status: ReservationStatus): boolean {
  return ACTIVE_RESERVATION_STATUSES.some((active) => active === status);
}
