export type { BackendResult, LimitResult, Policy, Tier } from "@quota/shared";
export { isLimited } from "@quota/shared";
export type { LimiterBackend } from "./backend.js";
export { loadConfig, type LimiterConfig } from "./config.js";
export { CounterItem, PolicyStatus, type CounterSnapshot } from "./counter-item.js";
export { BackendError, ValidationError } from "./errors.js";
export { KeyStore, type Clock, type Consumption, type Transition } from "./key-store.js";
export { Limiter, type LimiterDeps, type LimiterOptions } from "./limiter.js";
export { createLogger, type Logger } from "./logger.js";
export { MemoryBackend, type MemoryBackendOptions } from "./memory-backend.js";
export { LimiterMetrics } from "./metrics.js";
export { Mutex } from "./mutex.js";
export { DEFAULT_SWEEP_INTERVAL_MS, Reaper } from "./reaper.js";
