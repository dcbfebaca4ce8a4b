import { z } from "zod";
import { MAX_DURATION_MS, MAX_TIMER_MS } from "@quota/shared";
import { logLevels } from "./logger.js";

const configSchema = z.object({
  RATE_LIMIT_MAX: z.coerce.number().int().positive().safe().default(100),
  RATE_LIMIT_DURATION_MS: z.coerce.number().int().positive().max(MAX_DURATION_MS).default(60_000),
  RATE_LIMIT_PREFIX: z.string().default("limit:"),
  RATE_LIMIT_SWEEP_INTERVAL_MS: z.coerce.number().int().positive().max(MAX_TIMER_MS).default(60_000),
  LOG_LEVEL: z.enum(logLevels).default("info")
});

export type LimiterConfig = z.infer<typeof configSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): LimiterConfig {
  return configSchema.parse(env);
}
