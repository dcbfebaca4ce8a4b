import type { Tier } from "@quota/shared";
import { Mutex } from "./mutex.js";

export type CounterSnapshot = {
  total: number;
  remaining: number;
  duration: number;
  expire: number;
};

/** Quota state of the active window for one key. Fields are guarded by `lock`. */
export class CounterItem {
  readonly lock = new Mutex();

  constructor(
    public total: number,
    public remaining: number,
    public duration: number,
    public expire: number
  ) {}

  static open(tier: Tier, now: number): CounterItem {
    return new CounterItem(tier.limit, tier.limit - 1, tier.duration, now + tier.duration);
  }

  renew(tier: Tier, now: number) {
    this.total = tier.limit;
    this.remaining = tier.limit - 1;
    this.duration = tier.duration;
    this.expire = now + tier.duration;
  }

  snapshot(): CounterSnapshot {
    return { total: this.total, remaining: this.remaining, duration: this.duration, expire: this.expire };
  }
}

/** Escalation state for a key under a multi-tier policy. Read and written only while the paired item's lock is held. */
export class PolicyStatus {
  constructor(
    public tierIndex: number,
    public expire: number
  ) {}

  static open(tier: Tier, now: number): PolicyStatus {
    return new PolicyStatus(1, now + tier.duration * 2);
  }
}
