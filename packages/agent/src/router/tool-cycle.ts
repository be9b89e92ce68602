import { DateTime } from "luxon";
import { RoutingUnavailableError, ToolMisuseError, ValidationError, createLogger } from "@farmdesk/shared";
import type { RequestedSlot, ReservationDraft } from "@farmdesk/shared";
import { normalizeText } from "@farmdesk/domain";
import type { Availability, AvailabilityChecker } from "@farmdesk/domain";
import { invokeWithTimeout } from "../oracle/timeout";
import type { LlmOracle, OracleMessage, ToolChoice, ToolDefinition } from "../oracle/types";
import {
  BOOKING_CLAIM_REMINDER,
  CHECK_CONTRADICTED_REMINDER,
  TOOL_REQUIRED_REMINDER,
  reservationSystemPrompt
} from "../prompt/system-prompt";
import { clearSlot, emptyDraft, markVerified, mergeDraft } from "../state/draft";
import type { DraftPatch } from "../state/draft";
import { parseToolCall, toolDefinitions } from "../tools/tool-schemas";
import type { ParsedToolCall } from "../tools/tool-schemas";

export type ToolCycleOptions = {
  maxToolRounds: number;
  misuseRetries: number;
  timeoutMs: number;
};

export type ToolCycleInput = {
  message: string;
  history: readonly { role: "user" | "assistant"; content: string }[];
  draft: ReservationDraft | undefined;
  sessionId?: string;
};

export type ToolCycleResult = {
  reply: string;
  draft: ReservationDraft;
  availability?: Availability;
};

type CycleState = {
  draft: ReservationDraft;
  checked: boolean;
  availability?: Availability;
  alternatives: RequestedSlot[];
};

export type ReplyViolation = "unchecked" | "booking_claim" | "contradicts_check";

const AVAILABILITY_CLAIM =
  /\b(prost[aoei]?|prostih|na voljo|zaseden\w*|rezervirano|rezerviran[aoi]?|potrjen\w*|available|booked|confirmed)\b/;
const BOOKING_CLAIM = /\b(rezervirano|rezerviran[aoi]?|potrjen\w*|booked|confirmed)\b/;
const FREE_CLAIM = /\b(prost[aoei]?|prostih|na voljo|available)\b/;
const NEGATED_FREE = /\b(?:ni|niso|ne|not)\s+(?:vec\s+)?(?:prost[aoei]?|prostih|na voljo|available)\b/g;
const CLOCK_TIME = /\b(\d{1,2})[:.](\d{2})\b/g;

export function assertsAvailability(text: string): boolean {
  return AVAILABILITY_CLAIM.test(normalizeText(text));
}

function mentionedTimes(text: string): string[] {
  return [...text.matchAll(CLOCK_TIME)].map(([, hour = "", minute = ""]) => `${hour.padStart(2, "0")}:${minute}`);
}

/**
 * Why a model reply may not reach the user. Nothing is booked inside the tool
 * cycle, and a slot may only be called free when the last check found it free
 * or it is one of the alternatives that check returned.
 */
export function findReplyViolation(
  text: string,
  checked: boolean,
  availability: Availability | undefined,
  alternatives: readonly RequestedSlot[]
): ReplyViolation | undefined {
  const normalized = normalizeText(text);
  if (!checked) return AVAILABILITY_CLAIM.test(normalized) ? "unchecked" : undefined;
  if (BOOKING_CLAIM.test(normalized)) return "booking_claim";
  if (availability?.isAvailable) return undefined;
  if (!FREE_CLAIM.test(normalized.replace(NEGATED_FREE, " "))) return undefined;
  const offered = new Set(alternatives.map((slot) => slot.start));
  return mentionedTimes(normalized).some((time) => offered.has(time)) ? undefined : "contradicts_check";
}

const REMINDERS: Record<ReplyViolation, string> = {
  unchecked: TOOL_REQUIRED_REMINDER,
  booking_claim: BOOKING_CLAIM_REMINDER,
  contradicts_check: CHECK_CONTRADICTED_REMINDER
};

export class ReservationToolCycle {
  private readonly tools: ToolDefinition[];

  constructor(
    private readonly checker: AvailabilityChecker,
    private readonly oracle: LlmOracle,
    private readonly options: ToolCycleOptions,
    private readonly clock: () => Date = () => new Date()
  ) {
    this.tools = toolDefinitions(checker.business.services);
  }

  async run(input: ToolCycleInput): Promise<ToolCycleResult> {
    const logger = createLogger({ module: "tool-cycle", sessionId: input.sessionId });
    const business = this.checker.business;
    const state: CycleState = { draft: { ...(input.draft ?? emptyDraft()) }, checked: false, alternatives: [] };
    const today = DateTime.fromJSDate(this.clock(), { zone: business.timezone }).toFormat("yyyy-MM-dd");

    const messages: OracleMessage[] = [
      { type: "message", role: "system", content: reservationSystemPrompt({ business, today, draft: input.draft }) },
      ...input.history.map((turn): OracleMessage => ({ type: "message", role: turn.role, content: turn.content })),
      { type: "message", role: "user", content: input.message }
    ];

    let rounds = 0;
    let misuses = 0;
    let toolChoice: ToolChoice = "auto";

    for (;;) {
      const response = await invokeWithTimeout(
        this.oracle,
        { messages, tools: this.tools, toolChoice },
        this.options.timeoutMs
      );

      if (response.type === "tool_calls") {
        rounds++;
        if (rounds > this.options.maxToolRounds) {
          throw new RoutingUnavailableError("Tool round limit reached", { context: { rounds } });
        }
        for (const call of response.calls) {
          const parsed = parseToolCall(call);
          logger.info({ tool: parsed.name, args: parsed.args }, "tool call");
          messages.push({ type: "tool_call", callId: call.id, name: call.name, arguments: call.arguments });
          const output = await this.execute(parsed, state);
          messages.push({ type: "tool_result", callId: call.id, output: JSON.stringify(output) });
        }
        toolChoice = "auto";
        continue;
      }

      const text = response.text.trim();
      const violation = findReplyViolation(text, state.checked, state.availability, state.alternatives);
      if (violation) {
        misuses++;
        logger.warn({ misuses, violation, text }, "reply rejected");
        if (misuses > this.options.misuseRetries) {
          throw new ToolMisuseError("Oracle kept breaking the availability rules", { context: { misuses, violation } });
        }
        messages.push({ type: "message", role: "assistant", content: text });
        messages.push({ type: "message", role: "system", content: REMINDERS[violation] });
        toolChoice = violation === "unchecked" ? { name: "check_availability" } : "auto";
        continue;
      }

      if (!text) {
        throw new RoutingUnavailableError("Oracle returned an empty reply");
      }
      return {
        reply: text,
        draft: state.draft,
        ...(state.availability ? { availability: state.availability } : {})
      };
    }
  }

  private async execute(call: ParsedToolCall, state: CycleState): Promise<Record<string, unknown>> {
    switch (call.name) {
      case "check_availability": {
        const { service, date, time } = call.args;
        state.checked = true;
        state.alternatives = [];
        try {
          const slot = this.checker.slotFor(service, date, time);
          const availability = await this.checker.check(slot, service);
          state.availability = availability;
          if (availability.isAvailable) {
            state.draft = markVerified(mergeDraft(state.draft, { serviceId: service, date, time }), {
              serviceId: service,
              date,
              time,
              resourceId: availability.resourceId
            });
            return { available: true, slot };
          }
          state.draft = clearSlot(mergeDraft(state.draft, { serviceId: service }));
          state.alternatives = await this.checker.suggestAlternatives(slot, service);
          return { available: false, reason: availability.reason, alternatives: state.alternatives };
        } catch (error) {
          if (!(error instanceof ValidationError)) throw error;
          delete state.availability;
          return { available: false, error: error.message };
        }
      }
      case "update_reservation_draft": {
        const { name, phone, email, note } = call.args;
        const patch: DraftPatch = {
          ...(name ? { name } : {}),
          ...(phone ? { phone } : {}),
          ...(email ? { email } : {}),
          ...(note ? { note } : {})
        };
        state.draft = mergeDraft(state.draft, patch);
        return { step: state.draft.step };
      }
    }
  }
}
