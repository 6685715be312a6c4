import { pino, type Logger } from "pino";

export type { Logger };

export function createLogger(level: string = process.env.LOG_LEVEL || "info"): Logger {
  return pino({ level, base: { service: "tubescribe" } });
}

// For tests and embedding: a logger that writes nothing
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
