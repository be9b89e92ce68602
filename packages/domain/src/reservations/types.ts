import type { RequestedSlot, ReservationStatus } from "@farmdesk/shared";

export type ReservationContact = {
  name: string;
  phone?: string;
  email?: string;
};

export type Reservation = {
  id: string;
  serviceId: string;
  resourceId: string;
  contact: ReservationContact;
  slot: RequestedSlot;
  startAt: Date;
  endAt: Date;
  status: ReservationStatus;
  sessionId?: string;
  note?: string;
  fingerprint: string;
  decisionNote?: string;
  decidedAt?: Date;
  createdAt: Date;
  updatedAt: Date;
};

export type NewReservation = Pick<
  Reservation,
  "serviceId" | "resourceId" | "contact" | "slot" | "startAt" | "endAt" | "fingerprint"
> &
  Partial<Pick<Reservation, "sessionId" | "note">>;

export type ReservationFilter = {
  status?: ReservationStatus;
  from?: Date;
  to?: Date;
};
