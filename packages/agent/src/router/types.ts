import type { ReservationDraft } from "@farmdesk/shared";
import type { Availability } from "@farmdesk/domain";

export type FallbackReason = "routing_unavailable" | "restate" | "tool_misuse" | "low_confidence" | "empty_message";

export type RouteOutcome =
  | { kind: "static_faq"; reply: string; faqId: string }
  | { kind: "rule_based"; reply: string; availability?: Availability }
  | { kind: "reservation"; reply: string; reservationId?: string; availability?: Availability }
  | { kind: "knowledge"; reply: string; sources: string[]; synthesized: boolean }
  | { kind: "fallback"; reply: string; reason: FallbackReason };

export type RouteKind = RouteOutcome["kind"];

export type RouteInput = {
  message: string;
  history: readonly { role: "user" | "assistant"; content: string }[];
  draft: ReservationDraft | undefined;
  sessionId?: string;
};

export type RouteResult = {
  outcome: RouteOutcome;
  draft: ReservationDraft | undefined;
};

export interface MessageRouter {
  route(input: RouteInput): Promise<RouteResult>;
}
