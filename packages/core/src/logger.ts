import pino, { type Logger } from "pino";

export type { Logger };

const rootLogger = pino({
  level: process.env.LOG_LEVEL?.trim() || "info",
  base: { service: "hedgegrid" },
  timestamp: pino.stdTimeFunctions.isoTime
});

export function createLogger(name: string, bindings: Record<string, unknown> = {}): Logger {
  return rootLogger.child({ component: name, ...bindings });
}

export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
