import { pino, type Logger } from "pino";

export type { Logger };

export function createLogger(level: string): Logger {
  return pino({
    level,
    base: { service: "clipline" },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

/** Logger for tests and tools that shouldn't write anything. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
