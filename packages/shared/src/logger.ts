import pino from "pino";
import type { Logger } from "pino";

const pretty = process.env.NODE_ENV !== "production" && process.env.NODE_ENV !== "test";

const rootLogger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level: (label: string) => ({ level: label.toUpperCase() })
  },
  ...(pretty
    ? {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:yyyy-mm-dd HH:MM:ss",
            ignore: "pid,hostname"
          }
        }
      }
    : {})
});

export type { Logger };

export function createLogger(context: Record<string, unknown>): Logger {
  return rootLogger.child(context);
}
