import { z } from "zod";
import {
  backendResultSchema,
  describeIssues,
  durationSchema,
  limitSchema,
  MAX_TIMER_MS,
  policySchema,
  type LimitResult,
  type Policy,
  type Tier
} from "@quota/shared";
import type { LimiterBackend } from "./backend.js";
import type { LimiterConfig } from "./config.js";
import { BackendError, ValidationError } from "./errors.js";
import type { Clock } from "./key-store.js";
import { createLogger, type Logger } from "./logger.js";
import { MemoryBackend } from "./memory-backend.js";
import type { LimiterMetrics } from "./metrics.js";

const optionsSchema = z.object({
  max: limitSchema.default(100),
  duration: durationSchema.default(60_000),
  prefix: z.string().default("limit:"),
  sweepIntervalMs: z.number().int().positive().max(MAX_TIMER_MS).optional()
});

type SharedOptions = Omit<z.input<typeof optionsSchema>, "sweepIntervalMs"> & {
  logger?: Logger;
  metrics?: LimiterMetrics;
};

/** The built-in memory backend, tuned by its clock and sweep interval. */
type MemoryBackendChoice = {
  backend?: undefined;
  now?: Clock;
  sweepIntervalMs?: number;
};

/** A caller-supplied backend owns its own clock and housekeeping. */
type CustomBackendChoice = {
  backend: LimiterBackend;
  now?: never;
  sweepIntervalMs?: never;
};

export type LimiterOptions = SharedOptions & (MemoryBackendChoice | CustomBackendChoice);

export type LimiterDeps = Pick<SharedOptions, "logger" | "metrics"> &
  ({ backend?: undefined; now?: Clock } | { backend: LimiterBackend; now?: never });

export class Limiter {
  readonly prefix: string;
  private readonly defaultPolicy: Policy;
  private readonly backend: LimiterBackend;
  private readonly logger: Logger;
  private readonly metrics?: LimiterMetrics;

  constructor(options: LimiterOptions = {}) {
    const parsed = optionsSchema.safeParse({
      max: options.max,
      duration: options.duration,
      prefix: options.prefix,
      sweepIntervalMs: options.sweepIntervalMs
    });
    if (!parsed.success) throw new ValidationError("invalid limiter options", describeIssues(parsed.error));
    if (options.backend && (options.now !== undefined || options.sweepIntervalMs !== undefined)) {
      throw new ValidationError("invalid limiter options", ["now and sweepIntervalMs apply only to the memory backend"]);
    }

    this.prefix = parsed.data.prefix;
    this.defaultPolicy = [{ limit: parsed.data.max, duration: parsed.data.duration }];
    this.logger = options.logger ?? createLogger();
    this.metrics = options.metrics;
    this.backend =
      options.backend ??
      new MemoryBackend({
        now: options.now,
        sweepIntervalMs: parsed.data.sweepIntervalMs,
        logger: this.logger,
        metrics: options.metrics
      });
  }

  static fromConfig(config: LimiterConfig, deps: LimiterDeps = {}) {
    const shared: SharedOptions = {
      max: config.RATE_LIMIT_MAX,
      duration: config.RATE_LIMIT_DURATION_MS,
      prefix: config.RATE_LIMIT_PREFIX,
      logger: deps.logger ?? createLogger(config.LOG_LEVEL),
      metrics: deps.metrics
    };
    if (deps.backend) return new Limiter({ ...shared, backend: deps.backend });
    return new Limiter({ ...shared, now: deps.now, sweepIntervalMs: config.RATE_LIMIT_SWEEP_INTERVAL_MS });
  }

  /**
   * Counts one request for `id` and reports the window it landed in.
   * `remaining` is -1 once the quota is spent; that is a decision, not an error.
   * Without a policy (or with an empty one) the default `max`/`duration` tier applies.
   */
  async consume(id: string, policy?: readonly Tier[]): Promise<LimitResult> {
    const tiers = this.resolvePolicy(policy);
    const key = this.prefix + id;

    const raw = await this.backend.consume(key, tiers).catch((err: unknown) => {
      this.logger.error({ err, key }, "backend consume failed");
      throw err;
    });
    const checked = backendResultSchema.safeParse(raw);
    if (!checked.success) {
      this.logger.error({ key, issues: describeIssues(checked.error) }, "backend returned a malformed result");
      throw new BackendError("unexpected backend result", { cause: checked.error });
    }

    const { total, remaining, duration, expireAt } = checked.data;
    this.metrics?.decisions.inc({ outcome: remaining < 0 ? "limited" : "allowed" });
    return { total, remaining, duration, resetAt: new Date(expireAt) };
  }

  async remove(id: string): Promise<void> {
    const key = this.prefix + id;
    try {
      await this.backend.remove(key);
    } catch (err) {
      this.logger.error({ err, key }, "backend remove failed");
      throw err;
    }
  }

  close(): Promise<void> {
    return this.backend.close();
  }

  private resolvePolicy(policy: readonly Tier[] | undefined): Policy {
    if (!policy || policy.length === 0) return this.defaultPolicy;
    const parsed = policySchema.safeParse(policy);
    if (!parsed.success) {
      const issues = describeIssues(parsed.error);
      this.logger.warn({ issues }, "rejected policy");
      throw new ValidationError("invalid policy", issues);
    }
    return parsed.data;
  }
}
