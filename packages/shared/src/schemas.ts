import { z } from "zod";

export const reservationStatusEnum = z.enum(["pending", "confirmed", "rejected"]);
export type ReservationStatus = z.infer<typeof reservationStatusEnum>;

export const ACTIVE_RESERVATION_STATUSES = ["pending", "confirmed"] as const satisfies readonly ReservationStatus[];

export const isoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD");
export const localTimeSchema = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, "expected HH:MM");

export const requestedSlotSchema = z.object({
  date: isoDateSchema,
  start: localTimeSchema,
  end: localTimeSchema
});
export type RequestedSlot = z.infer<typeof requestedSlotSchema>;

export const draftStepEnum = z.enum(["collect_service", "collect_slot", "collect_contact", "await_confirmation"]);
export type DraftStep = z.infer<typeof draftStepEnum>;

export const verifiedSlotSchema = z.object({
  serviceId: z.string(),
  date: isoDateSchema,
  time: localTimeSchema,
  resourceId: z.string()
});
export type VerifiedSlot = z.infer<typeof verifiedSlotSchema>;

export const reservationDraftSchema = z.object({
  step: draftStepEnum,
  serviceId: z.string().optional(),
  date: isoDateSchema.optional(),
  time: localTimeSchema.optional(),
  name: z.string().optional(),
  phone: z.string().optional(),
  email: z.string().optional(),
  note: z.string().max(300).optional(),
  verified: verifiedSlotSchema.optional()
});
export type ReservationDraft = z.infer<typeof reservationDraftSchema>;

export const chatTurnSchema = z.object({
  role: z.enum(["user", "assistant"]),
  content: z.string(),
  at: z.string()
});
export type ChatTurn = z.infer<typeof chatTurnSchema>;

export const chatRequestSchema = z.object({
  session_id: z.string().min(1).max(120).optional(),
  message: z.string().min(1).max(2000)
});

export const availabilityQuerySchema = z.object({
  service: z.string().min(1),
  date: isoDateSchema,
  time: localTimeSchema,
  end_time: localTimeSchema.optional()
});

export const reservationListQuerySchema = z.object({
  status: reservationStatusEnum.optional(),
  from: isoDateSchema.optional(),
  to: isoDateSchema.optional()
});

export const reservationDecisionSchema = z.object({
  note: z.string().max(300).optional()
});
