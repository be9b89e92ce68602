import { db } from "@farmdesk/db";
import type { AppConfig } from "@farmdesk/shared";
import {
  AvailabilityChecker,
  DrizzleReservationRepository,
  InMemoryReservationRepository,
  KnowledgeRetriever,
  KnowledgeStore,
  ReservationService,
  loadBusinessConfig
} from "@farmdesk/domain";
import type { BusinessConfig, ReservationRepository } from "@farmdesk/domain";
import { ChatService } from "./chat-service";
import { DisabledOracle, OpenAiOracle } from "./oracle/openai-oracle";
import type { LlmOracle } from "./oracle/types";
import { IntentRouter } from "./router/intent-router";
import { KnowledgeResponder } from "./router/knowledge-answer";
import { StaticFaq } from "./router/static-faq";
import { ReservationToolCycle } from "./router/tool-cycle";
import { DrizzleSessionStore } from "./session/drizzle-session-store";
import { InMemorySessionStore } from "./session/memory-session-store";
import type { SessionStore } from "./session/types";

export type Assistant = {
  business: BusinessConfig;
  chat: ChatService;
  reservations: ReservationService;
  availability: AvailabilityChecker;
};

export type AssistantOverrides = {
  oracle?: LlmOracle;
  clock?: () => Date;
};

export function createOracle(config: AppConfig): LlmOracle {
  if (!config.OPENAI_API_KEY) return new DisabledOracle();
  return new OpenAiOracle({ apiKey: config.OPENAI_API_KEY, model: config.OPENAI_MODEL, timeoutMs: config.LLM_TIMEOUT_MS });
}

export function createSessionStore(config: AppConfig): SessionStore {
  return config.STORE_DRIVER === "postgres" ? new DrizzleSessionStore(db) : new InMemorySessionStore();
}

export async function createAssistant(config: AppConfig, overrides: AssistantOverrides = {}): Promise<Assistant> {
  const clock = overrides.clock ?? (() => new Date());
  const [business, faq, store] = await Promise.all([
    loadBusinessConfig(config.BUSINESS_CONFIG_PATH),
    StaticFaq.fromFile(config.FAQ_PATH),
    KnowledgeStore.fromFile(config.KNOWLEDGE_PATH)
  ]);

  const repo: ReservationRepository =
    config.STORE_DRIVER === "postgres" ? new DrizzleReservationRepository(db) : new InMemoryReservationRepository(clock);
  const availability = new AvailabilityChecker(business, repo, clock);
  const reservations = new ReservationService(repo, availability);
  const oracle = overrides.oracle ?? createOracle(config);

  const router = new IntentRouter({
    business,
    faq,
    checker: availability,
    reservations,
    clock,
    toolCycle: new ReservationToolCycle(
      availability,
      oracle,
      {
        maxToolRounds: config.LLM_MAX_TOOL_ROUNDS,
        misuseRetries: config.LLM_TOOL_MISUSE_RETRIES,
        timeoutMs: config.LLM_TIMEOUT_MS
      },
      clock
    ),
    knowledge: new KnowledgeResponder(
      business,
      store,
      new KnowledgeRetriever(store, { weighting: config.RETRIEVAL_WEIGHTING }),
      oracle,
      { topK: config.RETRIEVAL_TOP_K, minCoverage: config.RETRIEVAL_MIN_COVERAGE, timeoutMs: config.LLM_TIMEOUT_MS }
    )
  });

  const sessions = createSessionStore(config);
  const chat = new ChatService(
    router,
    sessions,
    { historyLimit: config.SESSION_HISTORY_LIMIT, ttlHours: config.SESSION_TTL_HOURS },
    clock
  );
  return { business, chat, reservations, availability };
}
