import { NextResponse } from "next/server";
import { reservationListQuerySchema } from "@farmdesk/shared";
import { errorResponse, toReservationJson } from "../../_lib/http";
import { getAssistant } from "../../_lib/services";

export async function GET(req: Request) {
  try {
    const params = new URL(req.url).searchParams;
    const query = reservationListQuerySchema.parse({
      status: params.get("status") ?? undefined,
      from: params.get("from") ?? undefined,
      to: params.get("to") ?? undefined
    });
    const { reservations } = await getAssistant();

    const rows = await reservations.list({
      ...(query.status ? { status: query.status } : {}),
      ...(query.from ? { from: query.from } : {}),
      ...(query.to ? { to: query.to } : {})
    });
    return NextResponse.json({ reservations: rows.map(toReservationJson) }, { status: 200 });
  } catch (error) {
    return errorResponse(error);
  }
}
