import type { BackendResult, Policy } from "@quota/shared";
import type { LimiterBackend } from "./backend.js";
import { BackendError } from "./errors.js";
import { KeyStore, type Clock } from "./key-store.js";
import { createLogger, type Logger } from "./logger.js";
import type { LimiterMetrics } from "./metrics.js";
import { DEFAULT_SWEEP_INTERVAL_MS, Reaper } from "./reaper.js";

export type MemoryBackendOptions = {
  now?: Clock;
  sweepIntervalMs?: number;
  logger?: Logger;
  metrics?: LimiterMetrics;
};

export class MemoryBackend implements LimiterBackend {
  readonly store: KeyStore;
  readonly reaper: Reaper;
  private readonly logger: Logger;
  private readonly metrics?: LimiterMetrics;
  private closed = false;

  constructor(options: MemoryBackendOptions = {}) {
    this.logger = (options.logger ?? createLogger()).child({ component: "memory-backend" });
    this.metrics = options.metrics;
    this.store = new KeyStore(options.now);
    this.reaper = new Reaper(() => this.sweep(), this.logger, options.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS);
    this.reaper.start();
  }

  async consume(key: string, policy: Policy): Promise<BackendResult> {
    this.assertOpen();
    const result = await this.store.getOrCreate(key, policy);
    if (result.transition === "created") {
      this.metrics?.keys.set(this.store.size);
    } else if (result.escalated) {
      this.metrics?.escalations.inc();
      this.logger.debug({ key, tier: result.tierIndex, total: result.total }, "tier escalated");
    }
    return { remaining: result.remaining, total: result.total, duration: result.duration, expireAt: result.expire };
  }

  async remove(key: string): Promise<void> {
    this.assertOpen();
    this.store.remove(key);
    this.metrics?.keys.set(this.store.size);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.reaper.stop();
    this.store.clear();
    this.metrics?.keys.set(0);
  }

  private sweep(): number {
    const evicted = this.store.sweep().length;
    if (evicted > 0) this.metrics?.evictions.inc(evicted);
    this.metrics?.keys.set(this.store.size);
    return evicted;
  }

  private assertOpen() {
    if (this.closed) throw new BackendError("memory backend is closed");
  }
}
