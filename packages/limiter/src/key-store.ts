import type { Policy, Tier } from "@quota/shared";
import { CounterItem, PolicyStatus, type CounterSnapshot } from "./counter-item.js";

export type Clock = () => number;

export type Transition = "created" | "consumed" | "blocked" | "renewed";

export type Consumption = CounterSnapshot & {
  transition: Transition;
  tierIndex: number;
  escalated: boolean;
};

/**
 * Owns the key → item and key → status maps. Lookups and inserts run in one
 * synchronous step, so check-then-insert cannot interleave with another
 * caller; everything done to an existing item happens under its lock.
 */
export class KeyStore {
  private items = new Map<string, CounterItem>();
  private statuses = new Map<string, PolicyStatus>();

  constructor(private readonly now: Clock = Date.now) {}

  get size(): number {
    return this.items.size;
  }

  has(key: string): boolean {
    return this.items.has(key);
  }

  /** Counts one request against `key`, creating or renewing its window as needed. */
  getOrCreate(key: string, policy: Policy): Promise<Consumption> {
    const found = this.items.get(key);
    if (!found) {
      const now = this.now();
      const item = CounterItem.open(policy[0], now);
      this.items.set(key, item);
      if (policy.length > 1) this.statuses.set(key, PolicyStatus.open(policy[0], now));
      const created: Consumption = { ...item.snapshot(), transition: "created", tierIndex: 1, escalated: false };
      return Promise.resolve(created);
    }

    const status = this.statuses.get(key);
    // The key may be removed or reaped before the lock is ours; the update then lands on a detached item.
    return found.lock.runExclusive(() => this.apply(key, found, status, policy));
  }

  remove(key: string) {
    this.items.delete(key);
    this.statuses.delete(key);
  }

  /** Drops entries whose window ended at least one full duration ago. Returns the evicted keys. */
  sweep(now = this.now()): string[] {
    const evicted: string[] = [];
    for (const [key, item] of this.items) {
      if (item.expire + item.duration < now) {
        this.items.delete(key);
        this.statuses.delete(key);
        evicted.push(key);
      }
    }
    return evicted;
  }

  clear() {
    this.items.clear();
    this.statuses.clear();
  }

  private apply(key: string, item: CounterItem, status: PolicyStatus | undefined, policy: Policy): Consumption {
    const now = this.now();
    if (now < item.expire) {
      if (item.remaining === -1) {
        return { ...item.snapshot(), transition: "blocked", tierIndex: status?.tierIndex ?? 1, escalated: false };
      }
      item.remaining -= 1;
      return { ...item.snapshot(), transition: "consumed", tierIndex: status?.tierIndex ?? 1, escalated: false };
    }

    let tier: Tier = policy[0];
    let tierIndex = 1;
    let escalated = false;
    if (policy.length > 1) {
      const current = status ?? this.adoptStatus(key, item);
      const previous = current.tierIndex;
      current.tierIndex = now >= current.expire ? 1 : Math.min(current.tierIndex + 1, policy.length);
      tier = policy[current.tierIndex - 1] ?? policy[0];
      current.expire = now + tier.duration * 2;
      tierIndex = current.tierIndex;
      escalated = tierIndex > previous;
    }

    item.renew(tier, now);
    return { ...item.snapshot(), transition: "renewed", tierIndex, escalated };
  }

  // A key first seen under a single-tier policy has no status yet. Its next
  // renewal starts from tier 1, which the expired deadline below guarantees.
  private adoptStatus(key: string, item: CounterItem): PolicyStatus {
    const status = new PolicyStatus(1, 0);
    if (this.items.get(key) === item) this.statuses.set(key, status);
    return status;
  }
}
