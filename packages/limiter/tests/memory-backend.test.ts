import { afterEach, describe, expect, it, vi } from "vitest";
import { BackendError } from "../src/errors.js";
import { Limiter } from "../src/limiter.js";
import { createLogger } from "../src/logger.js";
import { MemoryBackend } from "../src/memory-backend.js";
import { LimiterMetrics } from "../src/metrics.js";
import { describeBackendConformance } from "./conformance.js";

const logger = createLogger("silent");

describeBackendConformance("MemoryBackend", (now) => new MemoryBackend({ now, logger }));

describe("MemoryBackend", () => {
  const open: Array<{ close: () => Promise<void> }> = [];

  afterEach(async () => {
    while (open.length > 0) await open.pop()?.close();
    vi.useRealTimers();
  });

  it("stores keys under the limiter prefix", async () => {
    const backend = new MemoryBackend({ logger });
    const limiter = new Limiter({ backend, prefix: "api:", logger });
    open.push(limiter);

    await limiter.consume("u-1");
    expect(backend.store.has("api:u-1")).toBe(true);
    expect(backend.store.has("u-1")).toBe(false);
  });

  it("rejects calls after close", async () => {
    const backend = new MemoryBackend({ logger });
    await backend.close();

    expect(backend.reaper.running).toBe(false);
    await expect(backend.consume("k", [{ limit: 1, duration: 1_000 }])).rejects.toBeInstanceOf(BackendError);
    await expect(backend.remove("k")).rejects.toBeInstanceOf(BackendError);
  });

  it("reaps keys on its sweep interval once the grace period is over", async () => {
    vi.useFakeTimers();
    let now = 0;
    const backend = new MemoryBackend({ now: () => now, sweepIntervalMs: 60_000, logger });
    open.push(backend);

    await backend.consume("k", [{ limit: 3, duration: 1_000 }]);
    now = 2_000;
    vi.advanceTimersByTime(60_000);
    expect(backend.store.size).toBe(1);

    now = 2_001;
    vi.advanceTimersByTime(60_000);
    expect(backend.store.size).toBe(0);
  });

  // An in-flight consume that already holds the item keeps counting against
  // it after a concurrent remove. The update is lost; the key starts over.
  it("lets an in-flight consume finish on a removed key as a lost update", async () => {
    const limiter = new Limiter({ max: 10, duration: 1_000, now: () => 1_000, logger });
    open.push(limiter);

    expect((await limiter.consume("k")).remaining).toBe(9);
    const pending = limiter.consume("k");
    await limiter.remove("k");

    expect((await pending).remaining).toBe(8);
    expect((await limiter.consume("k")).remaining).toBe(9);
  });

  it("records decisions, escalations, evictions and key count", async () => {
    let now = 0;
    const metrics = new LimiterMetrics();
    const backend = new MemoryBackend({ now: () => now, logger, metrics });
    const limiter = new Limiter({ backend, metrics, logger });
    open.push(limiter);
    const policy = [
      { limit: 2, duration: 100 },
      { limit: 1, duration: 1_000 }
    ];

    await limiter.consume("a", policy);
    await limiter.consume("a", policy);
    await limiter.consume("a", policy);
    await limiter.consume("b", policy);
    now = 100;
    await limiter.consume("a", policy);

    const decisions = (await metrics.decisions.get()).values;
    expect(decisions.find((v) => v.labels.outcome === "allowed")?.value).toBe(4);
    expect(decisions.find((v) => v.labels.outcome === "limited")?.value).toBe(1);
    expect((await metrics.escalations.get()).values[0]?.value).toBe(1);
    expect((await metrics.keys.get()).values[0]?.value).toBe(2);

    now = 10_000;
    expect(backend.reaper.runOnce()).toBe(2);
    expect((await metrics.evictions.get()).values[0]?.value).toBe(2);
    expect((await metrics.keys.get()).values[0]?.value).toBe(0);
  });
});
