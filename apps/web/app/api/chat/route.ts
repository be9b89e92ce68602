import { NextResponse } from "next/server";
import { chatRequestSchema } from "@farmdesk/shared";
import { errorResponse } from "../_lib/http";
import { getAssistant } from "../_lib/services";

export async function POST(req: Request) {
  try {
    const input = chatRequestSchema.parse(await req.json());
    const { chat } = await getAssistant();

    const result = await chat.handle({
      message: input.message,
      ...(input.session_id ? { sessionId: input.session_id } : {})
    });

    return NextResponse.json({ reply: result.reply, session_id: result.sessionId, kind: result.kind }, { status: 200 });
  } catch (error) {
    return errorResponse(error);
  }
}
