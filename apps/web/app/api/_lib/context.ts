import { randomUUID } from "node:crypto";
import { headers } from "next/headers";
import type { RequestContext } from "@farmdesk/shared";

export async function getDashboardContext(): Promise<RequestContext> {
  const h = await headers();
  return {
    actor: { type: "admin", id: h.get("x-actor-id") ?? "dashboard" },
    requestId: h.get("x-request-id") ?? randomUUID()
  };
}
