import type { RequestedSlot } from "@farmdesk/shared";
import type { Reservation } from "../reservations/types";

export type TimeInterval = {
  start: Date;
  end: Date;
};

export type UnavailableReason = "outside_business_hours" | "insufficient_notice" | "conflict";
export type AvailabilityReason = "available" | UnavailableReason;

export type Availability =
  | {
      isAvailable: true;
      reason: "available";
      slot: RequestedSlot;
      resourceId: string;
      conflicts: [];
    }
  | {
      isAvailable: false;
      reason: UnavailableReason;
      slot: RequestedSlot;
      conflicts: Reservation[];
    };
