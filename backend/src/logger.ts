import { pino, type Logger } from "pino";

/**
 * Process-wide root logger. Components take a child logger tagged with
 * their name so log lines can be filtered per agent.
 */
export const rootLogger: Logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  base: { service: "intentflow" },
});

export function createLogger(component: string): Logger {
  return rootLogger.child({ component });
}

export function setLogLevel(level: string): void {
  rootLogger.level = level;
}

export type { Logger } from "pino";
