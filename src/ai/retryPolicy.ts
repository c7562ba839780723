import { z } from 'zod';

export interface RetryPolicy {
  /** Provider calls one task may make, fallbacks included. */
  maxAttempts: number;
  perRoundTimeoutMs: number;
  /** Budget for a whole provider task; retries do not renew it. */
  sessionTimeoutMs: number;
  /** No retry starts with less time than this left. */
  minRetryWindowMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  perRoundTimeoutMs: 25_000,
  sessionTimeoutMs: 60_000,
  minRetryWindowMs: 5_000
};

export const retryPolicySchema = z.object({
  maxAttempts: z.number().int().min(1),
  perRoundTimeoutMs: z.number().int().positive(),
  sessionTimeoutMs: z.number().int().positive(),
  minRetryWindowMs: z.number().int().nonnegative()
});

export function resolveRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  return retryPolicySchema.parse({ ...DEFAULT_RETRY_POLICY, ...overrides });
}

export type Clock = () => number;

export const monotonicClock: Clock = () => performance.now();

/** Absolute point on a monotonic clock, fixed when the task starts. */
export class Deadline {
  private readonly endsAt: number;

  constructor(
    durationMs: number,
    private readonly clock: Clock = monotonicClock
  ) {
    this.endsAt = clock() + durationMs;
  }

  remainingMs(): number {
    return Math.max(0, this.endsAt - this.clock());
  }

  get expired(): boolean {
    return this.remainingMs() <= 0;
  }

  /** Timeout for the next round: the round budget, capped by what is left. */
  roundTimeoutMs(policy: RetryPolicy): number {
    return Math.min(policy.perRoundTimeoutMs, this.remainingMs());
  }

  canRetry(policy: RetryPolicy): boolean {
    const remaining = this.remainingMs();
    return remaining > 0 && remaining >= policy.minRetryWindowMs;
  }
}

export class AttemptBudget {
  private count = 0;

  constructor(readonly max: number) {}

  get used(): number {
    return this.count;
  }

  get exhausted(): boolean {
    return this.count >= this.max;
  }

  /** Claims one attempt; false once the budget is spent. */
  take(): boolean {
    if (this.exhausted) return false;
    this.count += 1;
    return true;
  }
}
