import { pino, type Logger, type LevelWithSilent } from "pino";

export type { Logger };

export const logLevels = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export function createLogger(level: LevelWithSilent = "info", name = "ratelimiter"): Logger {
  return pino({ level, name });
}
