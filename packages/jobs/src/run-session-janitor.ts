import "dotenv/config";
import { createLogger, loadConfig } from "@farmdesk/shared";
import type { AppConfig } from "@farmdesk/shared";
import { createSessionStore } from "@farmdesk/agent";
import { expireSessions } from "./expire-sessions";

const logger = createLogger({ module: "session-janitor" });

export async function runSessionJanitorOnce(config: AppConfig) {
  return expireSessions(createSessionStore(config), config.SESSION_TTL_HOURS);
}

export async function runSessionJanitorLoop(config: AppConfig) {
  const store = createSessionStore(config);

  // eslint-disable-next-line no-constant-condition
  while (true) {
    try {
      await expireSessions(store, config.SESSION_TTL_HOURS);
    } catch (error) {
      logger.error({ err: error }, "session janitor run failed");
    }
    await new Promise((resolve) => setTimeout(resolve, config.SESSION_JANITOR_INTERVAL_MS));
  }
}

if (process.env.NODE_ENV !== "test") {
  const config = loadConfig();
  if (config.STORE_DRIVER !== "postgres") {
    logger.warn("memory sessions live inside the web process; nothing to expire here");
  } else if (config.SESSION_JANITOR_LOOP) {
    void runSessionJanitorLoop(config);
  } else {
    runSessionJanitorOnce(config)
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error({ err: error }, "session janitor run failed");
        process.exit(1);
      });
  }
}
