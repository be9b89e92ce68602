import { randomUUID } from "node:crypto";
import { createLogger } from "@farmdesk/shared";
import type { ChatTurn } from "@farmdesk/shared";
import type { MessageRouter, RouteKind, RouteOutcome } from "./router/types";
import { KeyedMutex } from "./session/keyed-mutex";
import type { ConversationSession, SessionStore } from "./session/types";

export type ChatServiceOptions = {
  historyLimit: number;
  ttlHours: number;
};

export type ChatRequest = {
  sessionId?: string;
  message: string;
};

export type ChatReply = {
  sessionId: string;
  reply: string;
  kind: RouteKind;
  outcome: RouteOutcome;
};

export class ChatService {
  private readonly logger = createLogger({ module: "chat-service" });
  private readonly mutex = new KeyedMutex();

  constructor(
    private readonly router: MessageRouter,
    private readonly sessions: SessionStore,
    private readonly options: ChatServiceOptions,
    private readonly clock: () => Date = () => new Date()
  ) {}

  handle(request: ChatRequest): Promise<ChatReply> {
    const sessionId = request.sessionId ?? randomUUID();
    return this.mutex.run(sessionId, () => this.turn(sessionId, request.message));
  }

  private async turn(sessionId: string, message: string): Promise<ChatReply> {
    const now = this.clock();
    const stored = await this.sessions.load(sessionId);
    let session: ConversationSession;
    if (stored && stored.updatedAt >= this.cutoff(now)) {
      session = stored;
    } else {
      if (stored) this.logger.info({ sessionId }, "session idle past retention, starting fresh");
      session = { sessionId, history: [], createdAt: now, updatedAt: now };
    }

    const { outcome, draft } = await this.router.route({
      message,
      history: session.history.map(({ role, content }) => ({ role, content })),
      draft: session.draft,
      sessionId
    });

    const at = now.toISOString();
    const turns: ChatTurn[] = [
      { role: "user", content: message, at },
      { role: "assistant", content: outcome.reply, at }
    ];
    await this.sessions.save({
      sessionId,
      history: [...session.history, ...turns].slice(-this.options.historyLimit),
      draft,
      createdAt: session.createdAt,
      updatedAt: now
    });

    return { sessionId, reply: outcome.reply, kind: outcome.kind, outcome };
  }

  private cutoff(now: Date): Date {
    return new Date(now.getTime() - this.options.ttlHours * 60 * 60 * 1000);
  }
}
