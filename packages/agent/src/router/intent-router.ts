import { DateTime } from "luxon";
import {
  ConflictError,
  MalformedToolCallError,
  RoutingUnavailableError,
  ToolMisuseError,
  ValidationError,
  createLogger
} from "@farmdesk/shared";
import type { ReservationDraft } from "@farmdesk/shared";
import type { AvailabilityChecker, BusinessConfig, ReservationService } from "@farmdesk/domain";
import { extractEntities } from "../rules/extract";
import { hasReservationIntent, isAffirmative, isAvailabilityQuery, isCancel, isNegative } from "../rules/keywords";
import { changedFields, clearSlot, emptyDraft, isVerified, markVerified, mergeDraft } from "../state/draft";
import type { KnowledgeResponder } from "./knowledge-answer";
import * as replies from "./replies";
import type { StaticFaq } from "./static-faq";
import type { ReservationToolCycle } from "./tool-cycle";
import type { MessageRouter, RouteInput, RouteOutcome, RouteResult } from "./types";

export type IntentRouterDeps = {
  business: BusinessConfig;
  faq: StaticFaq;
  checker: AvailabilityChecker;
  reservations: ReservationService;
  toolCycle: ReservationToolCycle;
  knowledge: KnowledgeResponder;
  clock?: () => Date;
};

export class IntentRouter implements MessageRouter {
  private readonly business: BusinessConfig;
  private readonly clock: () => Date;

  constructor(private readonly deps: IntentRouterDeps) {
    this.business = deps.business;
    this.clock = deps.clock ?? (() => new Date());
  }

  async route(input: RouteInput): Promise<RouteResult> {
    const logger = createLogger({ module: "router", sessionId: input.sessionId });
    const result = await this.dispatch(input);
    logger.info(
      {
        kind: result.outcome.kind,
        ...(result.outcome.kind === "fallback" ? { reason: result.outcome.reason } : {}),
        step: result.draft?.step
      },
      "message routed"
    );
    return result;
  }

  private async dispatch(input: RouteInput): Promise<RouteResult> {
    const message = input.message.trim();
    const { draft } = input;

    if (!message) {
      return { outcome: { kind: "fallback", reply: replies.EMPTY_MESSAGE, reason: "empty_message" }, draft };
    }

    const faq = this.deps.faq.match(message);
    if (faq) {
      const reply = draft ? `${faq.answer}\n\n${replies.continueDraft(this.business, draft)}` : faq.answer;
      return { outcome: { kind: "static_faq", reply, faqId: faq.id }, draft };
    }

    if (draft) {
      if (isCancel(message)) {
        return { outcome: { kind: "rule_based", reply: replies.CANCELLED }, draft: undefined };
      }
      if (draft.step === "await_confirmation") {
        if (isAffirmative(message)) return this.submit(draft, input.sessionId);
        if (isNegative(message)) {
          return { outcome: { kind: "rule_based", reply: replies.DECLINED }, draft: undefined };
        }
      }
    }

    const intent = hasReservationIntent(message) || isAvailabilityQuery(message);
    if (intent || draft) {
      const patch = extractEntities(message, {
        now: DateTime.fromJSDate(this.clock(), { zone: this.business.timezone }),
        services: this.business.services,
        expectName: draft?.step === "collect_contact"
      });
      const changed = changedFields(draft, patch);
      // A service named in a plain question about an open draft is a topic, not a switch.
      const mentionsOtherService =
        !intent && draft?.serviceId !== undefined && changed.length === 1 && changed[0] === "serviceId";
      if (changed.length > 0 && !mentionsOtherService) {
        return this.applyRules(mergeDraft(draft, patch));
      }
      const slotMissing = draft?.step === "collect_service" || draft?.step === "collect_slot";
      if (intent || (slotMissing && !mentionsOtherService)) {
        return this.runToolCycle(input, message);
      }
    }

    const outcome = await this.deps.knowledge.answer(message);
    if (draft && outcome.kind === "knowledge") {
      return { outcome: { ...outcome, reply: `${outcome.reply}\n\n${replies.continueDraft(this.business, draft)}` }, draft };
    }
    return { outcome, draft };
  }

  private async applyRules(draft: ReservationDraft): Promise<RouteResult> {
    const { serviceId, date, time } = draft;
    if (!serviceId || !date || !time || isVerified(draft)) {
      return { outcome: { kind: "rule_based", reply: replies.nextQuestion(this.business, draft) }, draft };
    }

    const { checker } = this.deps;
    try {
      const service = checker.requireService(serviceId);
      const slot = checker.slotFor(serviceId, date, time);
      const availability = await checker.check(slot, serviceId);
      if (availability.isAvailable) {
        const verified = markVerified(draft, { serviceId, date, time, resourceId: availability.resourceId });
        return {
          outcome: { kind: "rule_based", reply: replies.slotAvailable(this.business, verified, slot), availability },
          draft: verified
        };
      }
      const alternatives = await checker.suggestAlternatives(slot, serviceId);
      return {
        outcome: {
          kind: "rule_based",
          reply: replies.slotUnavailable(this.business, service, availability, alternatives),
          availability
        },
        draft: clearSlot(draft)
      };
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      return { outcome: { kind: "fallback", reply: replies.RESTATE, reason: "restate" }, draft: clearSlot(draft) };
    }
  }

  private async submit(draft: ReservationDraft, sessionId: string | undefined): Promise<RouteResult> {
    try {
      const reservation = await this.deps.reservations.create(draft, sessionId ? { sessionId } : {});
      return {
        outcome: {
          kind: "reservation",
          reply: replies.pendingReservation(this.business, reservation),
          reservationId: reservation.id
        },
        draft: undefined
      };
    } catch (error) {
      if (error instanceof ConflictError) {
        return {
          outcome: { kind: "reservation", reply: replies.slotTakenMeanwhile(error.alternatives) },
          draft: clearSlot(draft)
        };
      }
      if (error instanceof ValidationError) {
        const next = error.missingFields.includes("time") ? clearSlot(draft) : mergeDraft(draft, {});
        return {
          outcome: { kind: "fallback", reply: replies.nextQuestion(this.business, next), reason: "restate" },
          draft: next
        };
      }
      throw error;
    }
  }

  private async runToolCycle(input: RouteInput, message: string): Promise<RouteResult> {
    const logger = createLogger({ module: "router", sessionId: input.sessionId });
    const draft = input.draft ?? emptyDraft();
    try {
      const result = await this.deps.toolCycle.run({
        message,
        history: input.history,
        draft,
        ...(input.sessionId ? { sessionId: input.sessionId } : {})
      });
      const outcome: RouteOutcome = {
        kind: "reservation",
        reply: result.reply,
        ...(result.availability ? { availability: result.availability } : {})
      };
      return { outcome, draft: result.draft };
    } catch (error) {
      if (error instanceof MalformedToolCallError) {
        logger.warn({ err: error }, "malformed tool call");
        return { outcome: { kind: "fallback", reply: replies.RESTATE, reason: "restate" }, draft };
      }
      if (error instanceof ToolMisuseError) {
        logger.warn({ err: error }, "tool misuse limit reached");
        return { outcome: { kind: "fallback", reply: replies.manualContact(this.business), reason: "tool_misuse" }, draft };
      }
      if (error instanceof RoutingUnavailableError) {
        logger.warn({ err: error }, "routing unavailable");
        return {
          outcome: { kind: "fallback", reply: replies.routingUnavailable(this.business, draft), reason: "routing_unavailable" },
          draft
        };
      }
      throw error;
    }
  }
}
