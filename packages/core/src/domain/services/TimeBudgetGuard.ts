/** Time kept in reserve before the hard deadline to stop cleanly and schedule a continuation. */
export const DEFAULT_TIME_RESERVE_MS = 3 * 60 * 1000;

/**
 * Answers whether an invocation should stop starting new dispatch rounds.
 *
 * In-flight calls are never cancelled: the guard is consulted between rounds
 * only, so a round that starts just above the reserve may still run past it.
 */
export class TimeBudgetGuard {
  constructor(
    private readonly remaining: () => number,
    readonly reserveMs: number = DEFAULT_TIME_RESERVE_MS,
  ) {}

  /** Guard for an absolute deadline (epoch milliseconds). */
  static fromDeadline(deadline: number, reserveMs?: number, now: () => number = Date.now): TimeBudgetGuard {
    return new TimeBudgetGuard(() => deadline - now(), reserveMs);
  }

  /** Guard that never asks to stop. */
  static unbounded(): TimeBudgetGuard {
    return new TimeBudgetGuard(() => Number.POSITIVE_INFINITY, 0);
  }

  /** Milliseconds left before the hard deadline. */
  remainingMs(): number {
    return this.remaining();
  }

  /** `true` once the remaining time has dropped below the reserve. */
  shouldStop(): boolean {
    return this.remaining() < this.reserveMs;
  }
}
