import "dotenv/config";
import { createAssistant } from "@farmdesk/agent";
import type { Assistant } from "@farmdesk/agent";
import { loadConfig } from "@farmdesk/shared";

let assistant: Promise<Assistant> | undefined;

export function getAssistant(): Promise<Assistant> {
  assistant ??= createAssistant(loadConfig()).catch((error: unknown) => {
    assistant = undefined;
    throw error;
  });
  return assistant;
}
