import type { ChatTurn, ReservationDraft } from "@farmdesk/shared";

export type ConversationSession = {
  sessionId: string;
  history: ChatTurn[];
  draft?: ReservationDraft | undefined;
  createdAt: Date;
  updatedAt: Date;
};

export interface SessionStore {
  load(sessionId: string): Promise<ConversationSession | undefined>;
  save(session: ConversationSession): Promise<void>;
  expireBefore(cutoff: Date): Promise<number>;
}
