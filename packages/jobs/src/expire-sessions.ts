import { createLogger } from "@farmdesk/shared";
import type { SessionStore } from "@farmdesk/agent";

const logger = createLogger({ module: "session-janitor" });

export async function expireSessions(store: SessionStore, ttlHours: number, now = new Date()): Promise<number> {
  const cutoff = new Date(now.getTime() - ttlHours * 60 * 60 * 1000);
  const removed = await store.expireBefore(cutoff);
  logger.info({ removed, cutoff: cutoff.toISOString() }, "expired idle sessions");
  return removed;
}
