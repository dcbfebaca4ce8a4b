import type { Logger } from "./logger.js";

export const DEFAULT_SWEEP_INTERVAL_MS = 60_000;

/** Periodic sweep with an explicit lifecycle. */
export class Reaper {
  private timer: NodeJS.Timeout | undefined;

  constructor(
    private readonly sweep: () => number,
    private readonly logger: Logger,
    private readonly intervalMs = DEFAULT_SWEEP_INTERVAL_MS
  ) {}

  get running(): boolean {
    return this.timer !== undefined;
  }

  start() {
    if (this.timer) return;
    this.timer = setInterval(() => this.runOnce(), this.intervalMs);
    this.timer.unref();
    this.logger.debug({ intervalMs: this.intervalMs }, "reaper started");
  }

  stop() {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = undefined;
    this.logger.debug("reaper stopped");
  }

  runOnce(): number {
    const evicted = this.sweep();
    if (evicted > 0) this.logger.debug({ evicted }, "reaped expired keys");
    return evicted;
  }
}
