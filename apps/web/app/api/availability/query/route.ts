import { availabilityQuerySchema } from "@farmdesk/shared";
import { NextResponse } from "next/server";
import { errorResponse } from "../../_lib/http";
import { getAssistant } from "../../_lib/services";

export async function POST(req: Request) {
  try {
    const input = availabilityQuerySchema.parse(await req.json());
    const { availability } = await getAssistant();

    const slot = availability.slotFor(input.service, input.date, input.time, input.end_time);
    const result = await availability.check(slot, input.service);
    const alternatives = result.isAvailable ? [] : await availability.suggestAlternatives(slot, input.service);

    return NextResponse.json(
      {
        is_available: result.isAvailable,
        reason: result.reason,
        slot: result.slot,
        resource_id: result.isAvailable ? result.resourceId : null,
        conflicts: result.conflicts.map((reservation) => ({
          reservation_id: reservation.id,
          resource_id: reservation.resourceId,
          start_at: reservation.startAt.toISOString(),
          end_at: reservation.endAt.toISOString()
        })),
        alternatives
      },
      { status: 200 }
    );
  } catch (error) {
    return errorResponse(error);
  }
}
