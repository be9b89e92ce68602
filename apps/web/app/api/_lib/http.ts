import { NextResponse } from "next/server";
import { ZodError } from "zod";
import {
  AssistantError,
  ConflictError,
  InvalidTransitionError,
  NotFoundError,
  ValidationError,
  createLogger
} from "@farmdesk/shared";
import type { Reservation } from "@farmdesk/domain";

const logger = createLogger({ module: "http" });

export function toReservationJson(reservation: Reservation) {
  return {
    reservation_id: reservation.id,
    service_id: reservation.serviceId,
    resource_id: reservation.resourceId,
    status: reservation.status,
    slot: reservation.slot,
    start_at: reservation.startAt.toISOString(),
    end_at: reservation.endAt.toISOString(),
    contact: reservation.contact,
    note: reservation.note ?? null,
    decision_note: reservation.decisionNote ?? null,
    decided_at: reservation.decidedAt?.toISOString() ?? null,
    session_id: reservation.sessionId ?? null,
    created_at: reservation.createdAt.toISOString()
  };
}

export function errorResponse(error: unknown): NextResponse {
  if (error instanceof SyntaxError) {
    return NextResponse.json({ error: "request body is not valid JSON" }, { status: 400 });
  }
  if (error instanceof ZodError) {
    return NextResponse.json({ error: "invalid request", issues: error.issues }, { status: 400 });
  }
  if (error instanceof ValidationError) {
    return NextResponse.json(
      { error: error.message, code: error.code, missing_fields: error.missingFields, context: error.context },
      { status: 400 }
    );
  }
  if (error instanceof NotFoundError) {
    return NextResponse.json({ error: error.message, code: error.code }, { status: 404 });
  }
  if (error instanceof ConflictError) {
    return NextResponse.json(
      { error: error.message, code: error.code, alternatives: error.alternatives },
      { status: 409 }
    );
  }
  if (error instanceof InvalidTransitionError) {
    return NextResponse.json({ error: error.message, code: error.code }, { status: 409 });
  }

  logger.error({ err: error instanceof AssistantError ? error.toJSON() : error }, "request failed");
  return NextResponse.json({ error: "internal error" }, { status: 500 });
}
