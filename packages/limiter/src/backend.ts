import type { BackendResult, Policy } from "@quota/shared";

export type { BackendResult };

/**
 * What a store has to offer the limiter. Any implementation must follow the
 * same window rules as the in-memory one, including the -1 sentinel and the
 * tier escalation and decay.
 */
export interface LimiterBackend {
  consume(key: string, policy: Policy): Promise<BackendResult>;
  remove(key: string): Promise<void>;
  close(): Promise<void>;
}
