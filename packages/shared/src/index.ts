export * from "./schemas";
export * from "./errors";
export * from "./config";
export * from "./logger";
export * from "./semaphore";

export type RequestContext = {
  actor: { type: "system" | "user" | "admin"; id: string };
  requestId: string;
};
