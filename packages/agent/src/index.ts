export * from "./oracle/types";
export * from "./oracle/openai-oracle";
export * from "./oracle/timeout";
export * from "./tools/tool-schemas";
export * from "./rules/keywords";
export * from "./rules/extract";
export * from "./state/machine";
export * from "./state/draft";
export * from "./prompt/system-prompt";
export * from "./router/types";
export * from "./router/replies";
export * from "./router/static-faq";
export * from "./router/knowledge-answer";
export * from "./router/tool-cycle";
export * from "./router/intent-router";
export * from "./session/types";
export * from "./session/memory-session-store";
export * from "./session/drizzle-session-store";
export * from "./session/keyed-mutex";
export * from "./chat-service";
export * from "./assistant";
