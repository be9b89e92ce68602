import { eq, lt } from "drizzle-orm";
import { z } from "zod";
import { chatTurnSchema, createLogger, reservationDraftSchema } from "@farmdesk/shared";
import { conversationSessions } from "@farmdesk/db";
import type { DbClient } from "@farmdesk/db";
import type { ConversationSession, SessionStore } from "./types";

export type SessionRow = {
  sessionId: string;
  history: unknown;
  draft: unknown;
  createdAt: Date;
  updatedAt: Date;
};

const storedStateSchema = z.object({
  history: z.array(chatTurnSchema),
  draft: reservationDraftSchema.nullable()
});

const logger = createLogger({ module: "session-store" });

export function sessionFromRow(row: SessionRow): ConversationSession | undefined {
  const state = storedStateSchema.safeParse({ history: row.history, draft: row.draft ?? null });
  if (!state.success) {
    const issues = state.error.issues.map((issue) => issue.path.join("."));
    logger.warn({ sessionId: row.sessionId, issues }, "discarding unreadable session");
    return undefined;
  }
  return {
    sessionId: row.sessionId,
    history: state.data.history,
    ...(state.data.draft ? { draft: state.data.draft } : {}),
    createdAt: row.createdAt,
    updatedAt: row.updatedAt
  };
}

export class DrizzleSessionStore implements SessionStore {
  constructor(private readonly db: DbClient) {}

  async load(sessionId: string): Promise<ConversationSession | undefined> {
    const rows = await this.db
      .select()
      .from(conversationSessions)
      .where(eq(conversationSessions.sessionId, sessionId))
      .limit(1);
    const row = rows[0];
    return row ? sessionFromRow(row) : undefined;
  }

  async save(session: ConversationSession): Promise<void> {
    const values = {
      history: session.history,
      draft: session.draft ?? null,
      updatedAt: session.updatedAt
    };
    await this.db
      .insert(conversationSessions)
      .values({ sessionId: session.sessionId, createdAt: session.createdAt, ...values })
      .onConflictDoUpdate({ target: conversationSessions.sessionId, set: values });
  }

  async expireBefore(cutoff: Date): Promise<number> {
    const removed = await this.db
      .delete(conversationSessions)
      .where(lt(conversationSessions.updatedAt, cutoff))
      .returning({ sessionId: conversationSessions.sessionId });
    return removed.length;
  }
}
