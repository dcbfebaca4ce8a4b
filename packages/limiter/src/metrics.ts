import { Counter, Gauge, Registry } from "prom-client";

export class LimiterMetrics {
  readonly decisions: Counter<"outcome">;
  readonly escalations: Counter;
  readonly evictions: Counter;
  readonly keys: Gauge;

  constructor(readonly registry = new Registry()) {
    this.decisions = new Counter({
      name: "ratelimiter_decisions_total",
      help: "Consume decisions by outcome",
      labelNames: ["outcome"] as const,
      registers: [registry]
    });
    this.escalations = new Counter({
      name: "ratelimiter_tier_escalations_total",
      help: "Window renewals that moved a key to a stricter tier",
      registers: [registry]
    });
    this.evictions = new Counter({
      name: "ratelimiter_evictions_total",
      help: "Keys dropped by the reaper",
      registers: [registry]
    });
    this.keys = new Gauge({ name: "ratelimiter_keys", help: "Keys held in memory", registers: [registry] });
  }
}
