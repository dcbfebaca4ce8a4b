import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createLogger } from "../src/logger.js";
import { Reaper } from "../src/reaper.js";

describe("Reaper", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("sweeps once per interval until stopped", () => {
    const sweep = vi.fn(() => 0);
    const reaper = new Reaper(sweep, createLogger("silent"), 1_000);

    reaper.start();
    expect(reaper.running).toBe(true);
    vi.advanceTimersByTime(3_000);
    expect(sweep).toHaveBeenCalledTimes(3);

    reaper.stop();
    expect(reaper.running).toBe(false);
    vi.advanceTimersByTime(3_000);
    expect(sweep).toHaveBeenCalledTimes(3);
  });

  it("ignores a second start", () => {
    const sweep = vi.fn(() => 1);
    const reaper = new Reaper(sweep, createLogger("silent"), 1_000);

    reaper.start();
    reaper.start();
    vi.advanceTimersByTime(1_000);
    reaper.stop();

    expect(sweep).toHaveBeenCalledTimes(1);
  });

  it("reports what a manual pass evicted", () => {
    const reaper = new Reaper(() => 4, createLogger("silent"));
    expect(reaper.runOnce()).toBe(4);
    expect(reaper.running).toBe(false);
  });
});
