import type { ConversationSession, SessionStore } from "./types";

export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, ConversationSession>();

  async load(sessionId: string): Promise<ConversationSession | undefined> {
    const session = this.sessions.get(sessionId);
    return session ? structuredClone(session) : undefined;
  }

  async save(session: ConversationSession): Promise<void> {
    this.sessions.set(session.sessionId, structuredClone(session));
  }

  async expireBefore(cutoff: Date): Promise<number> {
    let removed = 0;
    for (const [sessionId, session] of this.sessions) {
      if (session.updatedAt < cutoff) {
        this.sessions.delete(sessionId);
        removed++;
      }
    }
    return removed;
  }
}
